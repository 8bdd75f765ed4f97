/**
 * Subscriber Service
 *
 * Subscriber registry backed by the `subscribers` table.
 * Handles newsletter signups, reactivation, unsubscribes and the recipient
 * lists campaigns are sent to.
 *
 * Emails are stored trimmed and lower-cased; the column is also NOCASE so
 * lookups are case-insensitive either way.
 *
 * @module services/subscriberService
 */

import { z } from 'zod';
import { getDatabase, toIsoString, fromIsoString, buildPage, type Page } from './databaseService';
import { NotFoundError, ValidationError } from '../utils/errors';
import logger, { redactEmail } from '../utils/logger';

const subscribersLogger = logger.child({ component: 'subscribers' });

// ========================================
// TYPES
// ========================================

export const SUBSCRIBER_STATUSES = ['active', 'unsubscribed', 'bounced'] as const;

export type SubscriberStatus = typeof SUBSCRIBER_STATUSES[number];

/** Rows written before statuses were enforced may carry an empty status. */
export type StoredSubscriberStatus = SubscriberStatus | '';

export type CampaignSegment = 'all' | 'active';

export interface Subscriber {
  id: number;
  email: string;
  name: string | null;
  phone: string | null;
  insuranceType: string | null;
  status: StoredSubscriberStatus;
  subscribedAt: Date;
  lastCampaignSentAt: Date | null;
}

export type SubscribeOutcome = 'subscribed' | 'reactivated' | 'already_subscribed';

export interface SubscribeResult {
  outcome: SubscribeOutcome;
  subscriber: Subscriber;
}

export type UnsubscribeOutcome = 'unsubscribed' | 'not_found';

export interface SubscriberQueryParams {
  status?: SubscriberStatus | 'all';
  page?: number;
  perPage?: number;
}

const subscriberRowSchema = z.object({
  id: z.number(),
  email: z.string(),
  name: z.string().nullable(),
  phone: z.string().nullable(),
  insurance_type: z.string().nullable(),
  status: z.string(),
  subscribed_at: z.string(),
  last_campaign_sent_at: z.string().nullable(),
});

type SubscriberRow = z.infer<typeof subscriberRowSchema>;

// ========================================
// VALIDATION SCHEMAS
// ========================================

export const INVALID_EMAIL_MESSAGE = 'Please provide a valid email address.';

// Blank optional fields count as "not provided"
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : undefined));

export const subscribeSchema = z.object({
  email: z.string().trim().min(1, INVALID_EMAIL_MESSAGE).max(120).email(INVALID_EMAIL_MESSAGE),
  name: optionalText(100),
  phone: optionalText(20),
  insuranceType: optionalText(50),
});

export type SubscribeInput = z.input<typeof subscribeSchema>;

// ========================================
// HELPERS
// ========================================

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isSubscriberStatus(value: string): value is SubscriberStatus {
  return SUBSCRIBER_STATUSES.some((status) => status === value);
}

function toSubscriber(row: SubscriberRow): Subscriber {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    phone: row.phone,
    insuranceType: row.insurance_type,
    status: isSubscriberStatus(row.status) ? row.status : '',
    subscribedAt: fromIsoString(row.subscribed_at),
    lastCampaignSentAt: fromIsoString(row.last_campaign_sent_at),
  };
}

function findRowByEmail(email: string): SubscriberRow | undefined {
  return getDatabase().get(subscriberRowSchema, 'SELECT * FROM subscribers WHERE email = ?', [normalizeEmail(email)]);
}

function findRowById(id: number): SubscriberRow | undefined {
  return getDatabase().get(subscriberRowSchema, 'SELECT * FROM subscribers WHERE id = ?', [id]);
}

// ========================================
// SUBSCRIBE / UNSUBSCRIBE
// ========================================

/**
 * Subscribe an address.
 * - unknown address: new active record
 * - unsubscribed address: reactivated, name updated when one is given
 * - any other existing address: left as it is
 *
 * @throws ValidationError when the email is not valid; nothing is written
 */
export async function subscribe(input: SubscribeInput): Promise<SubscribeResult> {
  const parsed = subscribeSchema.safeParse(input);
  if (!parsed.success) {
    const emailIssue = parsed.error.errors.find((issue) => issue.path[0] === 'email');
    throw new ValidationError(
      emailIssue ? INVALID_EMAIL_MESSAGE : parsed.error.errors.map((e) => e.message).join(', ')
    );
  }

  const { name, phone, insuranceType } = parsed.data;
  const email = normalizeEmail(parsed.data.email);
  const db = getDatabase();

  const existing = findRowByEmail(email);

  if (existing) {
    if (existing.status !== 'unsubscribed') {
      subscribersLogger.info('Subscribe request for existing subscriber', {
        subscriberId: existing.id,
        status: existing.status,
      });
      return { outcome: 'already_subscribed', subscriber: toSubscriber(existing) };
    }

    db.run("UPDATE subscribers SET status = 'active', name = COALESCE(?, name) WHERE id = ?", [
      name ?? null,
      existing.id,
    ]);

    const reactivated = findRowById(existing.id);
    if (!reactivated) {
      throw new NotFoundError('Subscriber not found.');
    }

    subscribersLogger.info('Subscriber reactivated', { subscriberId: existing.id });
    return { outcome: 'reactivated', subscriber: toSubscriber(reactivated) };
  }

  const id = db.insert(
    `INSERT INTO subscribers (email, name, phone, insurance_type, status, subscribed_at)
     VALUES (?, ?, ?, ?, 'active', ?)`,
    [email, name ?? null, phone ?? null, insuranceType ?? null, toIsoString(new Date())]
  );

  const created = findRowById(id);
  if (!created) {
    throw new NotFoundError('Subscriber not found.');
  }

  subscribersLogger.info('Subscriber created', {
    subscriberId: created.id,
    email: redactEmail(email),
    insuranceType,
  });

  return { outcome: 'subscribed', subscriber: toSubscriber(created) };
}

/**
 * Mark an address as unsubscribed. Callers must have verified the address
 * through an unsubscribe token first.
 */
export async function unsubscribe(email: string): Promise<UnsubscribeOutcome> {
  const changes = getDatabase().run("UPDATE subscribers SET status = 'unsubscribed' WHERE email = ?", [
    normalizeEmail(email),
  ]);

  if (changes === 0) {
    subscribersLogger.warn('Unsubscribe for unknown address', { email: redactEmail(email) });
    return 'not_found';
  }

  subscribersLogger.info('Subscriber unsubscribed', { email: redactEmail(email) });
  return 'unsubscribed';
}

/**
 * Mark a subscriber as bounced so campaigns skip it.
 */
export async function markBounced(subscriberId: number): Promise<Subscriber> {
  const changes = getDatabase().run("UPDATE subscribers SET status = 'bounced' WHERE id = ?", [subscriberId]);

  const row = changes > 0 ? findRowById(subscriberId) : undefined;
  if (!row) {
    throw new NotFoundError('Subscriber not found.');
  }

  subscribersLogger.info('Subscriber marked as bounced', { subscriberId });
  return toSubscriber(row);
}

// ========================================
// QUERIES
// ========================================

export async function getSubscriberByEmail(email: string): Promise<Subscriber | null> {
  const row = findRowByEmail(email);
  return row ? toSubscriber(row) : null;
}

export async function countActive(): Promise<number> {
  return getDatabase().count("SELECT COUNT(*) AS count FROM subscribers WHERE status = 'active'");
}

export async function countAll(): Promise<number> {
  return getDatabase().count('SELECT COUNT(*) AS count FROM subscribers');
}

/**
 * Recipients for a campaign segment. Bounced and unsubscribed subscribers are
 * never included; "all" also takes legacy rows with an empty status.
 */
export async function listRecipients(segment: CampaignSegment): Promise<Subscriber[]> {
  const sql = segment === 'active'
    ? "SELECT * FROM subscribers WHERE status = 'active' ORDER BY id"
    : "SELECT * FROM subscribers WHERE status IN ('active', '') ORDER BY id";

  return getDatabase().all(subscriberRowSchema, sql).map(toSubscriber);
}

export async function markCampaignSent(subscriberId: number, sentAt: Date): Promise<void> {
  getDatabase().run('UPDATE subscribers SET last_campaign_sent_at = ? WHERE id = ?', [
    toIsoString(sentAt),
    subscriberId,
  ]);
}

/**
 * Paginated subscriber list, newest first
 */
export async function listSubscribers(params: SubscriberQueryParams = {}): Promise<Page<Subscriber>> {
  const { status = 'all', perPage = 20 } = params;
  const page = Math.max(1, Math.floor(params.page ?? 1));
  const db = getDatabase();

  const total = db.count(
    "SELECT COUNT(*) AS count FROM subscribers WHERE (?1 = 'all' OR status = ?1)",
    [status]
  );

  const rows = db.all(
    subscriberRowSchema,
    `SELECT * FROM subscribers
     WHERE (?1 = 'all' OR status = ?1)
     ORDER BY subscribed_at DESC, id DESC
     LIMIT ?2 OFFSET ?3`,
    [status, perPage, (page - 1) * perPage]
  );

  return buildPage(rows.map(toSubscriber), page, perPage, total);
}
