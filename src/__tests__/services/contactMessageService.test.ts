/**
 * Contact Message Service Tests
 */

import {
  countUnread,
  createContactMessage,
  listContactMessages,
  markContactMessageRead,
} from '../../services/contactMessageService';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { resetDatabase } from '../helpers/database';

const validMessage = {
  name: 'Jane Doe',
  email: 'jane@example.com',
  subject: 'Home policy',
  message: 'Do you cover flood damage?',
};

describe('contactMessageService', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('stores an unread message', async () => {
    const message = await createContactMessage({ ...validMessage, phone: '555-0100' });

    expect(message).toMatchObject({
      name: 'Jane Doe',
      email: 'jane@example.com',
      phone: '555-0100',
      subject: 'Home policy',
      message: 'Do you cover flood damage?',
      isRead: false,
    });
    expect(await countUnread()).toBe(1);
  });

  it('stores a blank phone as null', async () => {
    const message = await createContactMessage({ ...validMessage, phone: '' });
    expect(message.phone).toBeNull();
  });

  it('rejects a one-letter name', async () => {
    await expect(createContactMessage({ ...validMessage, name: 'J' })).rejects.toThrow('Name must be at least 2 characters');
  });

  it('rejects an overlong message', async () => {
    await expect(createContactMessage({ ...validMessage, message: 'x'.repeat(5001) })).rejects.toThrow(ValidationError);
  });

  it('rejects an invalid email', async () => {
    await expect(createContactMessage({ ...validMessage, email: 'jane' })).rejects.toThrow('Invalid email address');
  });

  it('lists newest first', async () => {
    await createContactMessage({ ...validMessage, subject: 'First' });
    await createContactMessage({ ...validMessage, subject: 'Second' });

    expect((await listContactMessages()).map((m) => m.subject)).toEqual(['Second', 'First']);
  });

  it('marks a message read', async () => {
    const created = await createContactMessage(validMessage);

    const read = await markContactMessageRead(created.id);

    expect(read.isRead).toBe(true);
    expect(await countUnread()).toBe(0);
  });

  it('throws NotFoundError when marking an unknown message', async () => {
    await expect(markContactMessageRead(31)).rejects.toThrow(NotFoundError);
  });
});
