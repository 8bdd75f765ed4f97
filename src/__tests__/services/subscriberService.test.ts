/**
 * Subscriber Service Tests
 *
 * Runs against the in-memory SQLite database.
 */

import {
  countActive,
  countAll,
  getSubscriberByEmail,
  listRecipients,
  listSubscribers,
  markBounced,
  markCampaignSent,
  subscribe,
  unsubscribe,
} from '../../services/subscriberService';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { insertSubscriberRow, resetDatabase } from '../helpers/database';

describe('subscriberService', () => {
  beforeEach(() => {
    resetDatabase();
  });

  describe('subscribe', () => {
    it('creates an active subscriber', async () => {
      const result = await subscribe({ email: 'jane@example.com', name: 'Jane', insuranceType: 'auto' });

      expect(result.outcome).toBe('subscribed');
      expect(result.subscriber).toMatchObject({
        email: 'jane@example.com',
        name: 'Jane',
        insuranceType: 'auto',
        status: 'active',
        lastCampaignSentAt: null,
      });
    });

    it('stores the address trimmed and lower-cased', async () => {
      const result = await subscribe({ email: '  Jane@Example.COM ' });
      expect(result.subscriber.email).toBe('jane@example.com');
    });

    it('reports already_subscribed on a second subscribe and keeps one record', async () => {
      await subscribe({ email: 'jane@example.com' });
      const second = await subscribe({ email: 'JANE@example.com', name: 'Someone Else' });

      expect(second.outcome).toBe('already_subscribed');
      expect(second.subscriber.name).toBeNull();
      expect(await countAll()).toBe(1);
    });

    it('reactivates an unsubscribed address and updates the name', async () => {
      const first = await subscribe({ email: 'jane@example.com', name: 'Jane' });
      await unsubscribe('jane@example.com');

      const again = await subscribe({ email: 'jane@example.com', name: 'Jane Doe' });

      expect(again.outcome).toBe('reactivated');
      expect(again.subscriber.id).toBe(first.subscriber.id);
      expect(again.subscriber.status).toBe('active');
      expect(again.subscriber.name).toBe('Jane Doe');
    });

    it('keeps the old name when reactivating without one', async () => {
      await subscribe({ email: 'jane@example.com', name: 'Jane' });
      await unsubscribe('jane@example.com');

      const again = await subscribe({ email: 'jane@example.com', name: '   ' });
      expect(again.subscriber.name).toBe('Jane');
    });

    it('does not reactivate a bounced address', async () => {
      const first = await subscribe({ email: 'jane@example.com' });
      await markBounced(first.subscriber.id);

      const again = await subscribe({ email: 'jane@example.com' });
      expect(again.outcome).toBe('already_subscribed');
      expect(again.subscriber.status).toBe('bounced');
    });

    it.each(['', 'not-an-email', 'jane@', '@example.com'])('rejects %p without writing', async (email) => {
      await expect(subscribe({ email })).rejects.toThrow(ValidationError);
      await expect(subscribe({ email })).rejects.toThrow('Please provide a valid email address.');
      expect(await countAll()).toBe(0);
    });
  });

  describe('unsubscribe', () => {
    it('marks the subscriber unsubscribed', async () => {
      await subscribe({ email: 'jane@example.com' });

      expect(await unsubscribe('Jane@Example.com')).toBe('unsubscribed');
      expect((await getSubscriberByEmail('jane@example.com'))?.status).toBe('unsubscribed');
    });

    it('reports unknown addresses', async () => {
      expect(await unsubscribe('nobody@example.com')).toBe('not_found');
    });
  });

  describe('markBounced', () => {
    it('sets the status to bounced', async () => {
      const { subscriber } = await subscribe({ email: 'jane@example.com' });
      const bounced = await markBounced(subscriber.id);
      expect(bounced.status).toBe('bounced');
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(markBounced(999)).rejects.toThrow(NotFoundError);
    });
  });

  describe('listRecipients', () => {
    it('never includes unsubscribed or bounced subscribers', async () => {
      insertSubscriberRow('active@example.com', 'active');
      insertSubscriberRow('gone@example.com', 'unsubscribed');
      insertSubscriberRow('bounce@example.com', 'bounced');

      const all = await listRecipients('all');
      const active = await listRecipients('active');

      expect(all.map((s) => s.email)).toEqual(['active@example.com']);
      expect(active.map((s) => s.email)).toEqual(['active@example.com']);
    });

    it('treats an empty legacy status as active for the whole list only', async () => {
      insertSubscriberRow('active@example.com', 'active');
      insertSubscriberRow('legacy@example.com', '');

      expect((await listRecipients('all')).map((s) => s.email)).toEqual(['active@example.com', 'legacy@example.com']);
      expect((await listRecipients('active')).map((s) => s.email)).toEqual(['active@example.com']);
    });
  });

  describe('counts', () => {
    it('counts active and all subscribers', async () => {
      insertSubscriberRow('a@example.com', 'active');
      insertSubscriberRow('b@example.com', 'active');
      insertSubscriberRow('c@example.com', 'unsubscribed');

      expect(await countActive()).toBe(2);
      expect(await countAll()).toBe(3);
    });
  });

  describe('markCampaignSent', () => {
    it('stamps the last campaign date', async () => {
      const { subscriber } = await subscribe({ email: 'jane@example.com' });
      const at = new Date('2026-05-01T10:00:00.000Z');

      await markCampaignSent(subscriber.id, at);

      expect((await getSubscriberByEmail('jane@example.com'))?.lastCampaignSentAt).toEqual(at);
    });
  });

  describe('listSubscribers', () => {
    beforeEach(() => {
      for (let i = 1; i <= 25; i++) {
        const day = String(i).padStart(2, '0');
        insertSubscriberRow(`user${i}@example.com`, i % 5 === 0 ? 'unsubscribed' : 'active', `2026-01-${day}T00:00:00.000Z`);
      }
    });

    it('returns 20 per page, newest first', async () => {
      const page = await listSubscribers({ page: 1 });

      expect(page.total).toBe(25);
      expect(page.pages).toBe(2);
      expect(page.perPage).toBe(20);
      expect(page.items).toHaveLength(20);
      expect(page.items[0].email).toBe('user25@example.com');
    });

    it('returns the remainder on the last page', async () => {
      const page = await listSubscribers({ page: 2 });

      expect(page.page).toBe(2);
      expect(page.items.map((s) => s.email)).toEqual([
        'user5@example.com',
        'user4@example.com',
        'user3@example.com',
        'user2@example.com',
        'user1@example.com',
      ]);
    });

    it('filters by status', async () => {
      const page = await listSubscribers({ status: 'unsubscribed' });

      expect(page.total).toBe(5);
      expect(page.pages).toBe(1);
      expect(page.items.every((s) => s.status === 'unsubscribed')).toBe(true);
    });
  });
});
