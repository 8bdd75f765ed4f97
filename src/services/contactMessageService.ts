/**
 * Contact Message Service
 *
 * Inquiries submitted through the public contact form.
 *
 * @module services/contactMessageService
 */

import { z } from 'zod';
import { getDatabase, toIsoString, fromIsoString } from './databaseService';
import { NotFoundError, ValidationError } from '../utils/errors';
import logger, { redactEmail } from '../utils/logger';

const contactLogger = logger.child({ component: 'contact' });

export interface ContactMessage {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  subject: string;
  message: string;
  createdAt: Date;
  isRead: boolean;
}

const contactMessageRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  email: z.string(),
  phone: z.string().nullable(),
  subject: z.string(),
  message: z.string(),
  created_at: z.string(),
  is_read: z.number(),
});

type ContactMessageRow = z.infer<typeof contactMessageRowSchema>;

export const contactMessageSchema = z.object({
  name: z.string().trim().min(2, 'Name must be at least 2 characters').max(100),
  email: z.string().trim().email('Invalid email address').max(120),
  phone: z
    .string()
    .trim()
    .max(20, 'Phone number is too long')
    .optional()
    .transform((value) => (value ? value : undefined)),
  subject: z.string().trim().min(1, 'Subject is required').max(200),
  message: z.string().trim().min(1, 'Message is required').max(5000),
});

export type ContactMessageInput = z.input<typeof contactMessageSchema>;

function toContactMessage(row: ContactMessageRow): ContactMessage {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    subject: row.subject,
    message: row.message,
    createdAt: fromIsoString(row.created_at),
    isRead: row.is_read === 1,
  };
}

function findRow(id: number): ContactMessageRow | undefined {
  return getDatabase().get(contactMessageRowSchema, 'SELECT * FROM contact_messages WHERE id = ?', [id]);
}

export async function createContactMessage(input: ContactMessageInput): Promise<ContactMessage> {
  const parsed = contactMessageSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.errors.map((e) => e.message).join(', '),
      { fields: parsed.error.flatten().fieldErrors }
    );
  }

  const { name, email, phone, subject, message } = parsed.data;
  const id = getDatabase().insert(
    `INSERT INTO contact_messages (name, email, phone, subject, message, created_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
    [name, email, phone ?? null, subject, message, toIsoString(new Date())]
  );

  const row = findRow(id);
  if (!row) {
    throw new NotFoundError('Message not found.');
  }

  contactLogger.info('Contact message received', { messageId: row.id, email: redactEmail(email) });
  return toContactMessage(row);
}

/**
 * All messages, newest first
 */
export async function listContactMessages(): Promise<ContactMessage[]> {
  return getDatabase()
    .all(contactMessageRowSchema, 'SELECT * FROM contact_messages ORDER BY created_at DESC, id DESC')
    .map(toContactMessage);
}

export async function markContactMessageRead(id: number): Promise<ContactMessage> {
  getDatabase().run('UPDATE contact_messages SET is_read = 1 WHERE id = ?', [id]);

  const row = findRow(id);
  if (!row) {
    throw new NotFoundError('Message not found.');
  }
  return toContactMessage(row);
}

export async function countUnread(): Promise<number> {
  return getDatabase().count('SELECT COUNT(*) AS count FROM contact_messages WHERE is_read = 0');
}
