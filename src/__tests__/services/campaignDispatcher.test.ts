/**
 * Campaign Dispatcher Tests
 *
 * Real database and token service; the mail transport is a fake
 * CampaignMailer whose deliveries the tests control.
 */

import { CampaignDispatcher, PREVIEW_EMAIL } from '../../services/campaignDispatcher';
import { UnsubscribeTokenService } from '../../services/unsubscribeTokenService';
import type { CampaignMailer } from '../../services/email/mailTransport';
import { createCampaign, getCampaign } from '../../services/campaignService';
import { getSubscriberByEmail, subscribe } from '../../services/subscriberService';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { insertSubscriberRow, resetDatabase, setCampaignStatus } from '../helpers/database';

type DeliverFn = CampaignMailer['deliver'];

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const tokens = new UnsubscribeTokenService({ secret: 'test-secret' });

function createDispatcher(deliver: jest.Mock<ReturnType<DeliverFn>, Parameters<DeliverFn>>, concurrency = 3) {
  const transport: CampaignMailer = { deliver };
  return new CampaignDispatcher({
    tokens,
    transport,
    publicBaseUrl: 'https://mailer.test/',
    brandName: 'InsurancePro',
    concurrency,
  });
}

function succeedingMailer() {
  return jest.fn<ReturnType<DeliverFn>, Parameters<DeliverFn>>().mockResolvedValue(true);
}

async function seedSubscribers(...emails: string[]): Promise<void> {
  for (const email of emails) {
    await subscribe({ email });
  }
}

async function draftCampaign(overrides: { templateType?: string; targetSegment?: string } = {}) {
  return createCampaign({
    name: 'Spring rates',
    subject: 'Lower premiums this spring',
    content: '<p>Rates are down.</p>',
    ...overrides,
  });
}

function extractToken(html: string): string {
  const match = /href="https:\/\/mailer\.test\/unsubscribe\/([^"]+)"/.exec(html);
  if (!match) {
    throw new Error('no unsubscribe link in rendered email');
  }
  return match[1];
}

describe('CampaignDispatcher', () => {
  beforeEach(() => {
    resetDatabase();
  });

  describe('send', () => {
    it('delivers to every active subscriber and closes the campaign as sent', async () => {
      await seedSubscribers('a@example.com', 'b@example.com', 'c@example.com');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();

      const result = await createDispatcher(deliver).send(campaign.id);

      expect(result).toEqual({ campaignId: campaign.id, outcome: 'sent', total: 3, sent: 3, failed: 0 });
      expect(deliver).toHaveBeenCalledTimes(3);

      const stored = await getCampaign(campaign.id);
      expect(stored).toMatchObject({ status: 'sent', totalRecipients: 3, sentCount: 3, failedCount: 0 });
      expect(stored?.sentAt).toBeInstanceOf(Date);
    });

    it('sends each recipient exactly once with the campaign subject', async () => {
      await seedSubscribers('a@example.com', 'b@example.com', 'c@example.com', 'd@example.com');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();

      await createDispatcher(deliver, 2).send(campaign.id);

      const recipients = deliver.mock.calls.map(([to]) => to).sort();
      expect(recipients).toEqual(['a@example.com', 'b@example.com', 'c@example.com', 'd@example.com']);
      expect(deliver.mock.calls.every(([, subject]) => subject === 'Lower premiums this spring')).toBe(true);
    });

    it('gives every recipient an unsubscribe link that verifies to their own address', async () => {
      await seedSubscribers('a@example.com', 'b@example.com');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();

      await createDispatcher(deliver).send(campaign.id);

      for (const [to, , html] of deliver.mock.calls) {
        expect(tokens.verify(extractToken(html))).toBe(to);
        expect(html).toContain('<p>Rates are down.</p>');
      }
    });

    it('counts failed and throwing deliveries without stopping the batch', async () => {
      await seedSubscribers('a@example.com', 'b@example.com', 'c@example.com', 'd@example.com');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();
      deliver.mockImplementation(async (to) => {
        if (to === 'b@example.com') return false;
        if (to === 'c@example.com') throw new Error('socket hang up');
        return true;
      });

      const result = await createDispatcher(deliver).send(campaign.id);

      expect(result).toMatchObject({ outcome: 'sent', total: 4, sent: 2, failed: 2 });
      expect(await getCampaign(campaign.id)).toMatchObject({ status: 'sent', sentCount: 2, failedCount: 2 });
    });

    it('stamps lastCampaignSentAt only for successful deliveries', async () => {
      await seedSubscribers('a@example.com', 'b@example.com');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();
      deliver.mockImplementation(async (to) => to === 'a@example.com');

      await createDispatcher(deliver).send(campaign.id);

      expect((await getSubscriberByEmail('a@example.com'))?.lastCampaignSentAt).toBeInstanceOf(Date);
      expect((await getSubscriberByEmail('b@example.com'))?.lastCampaignSentAt).toBeNull();
    });

    it('skips unsubscribed and bounced subscribers', async () => {
      insertSubscriberRow('active@example.com', 'active');
      insertSubscriberRow('gone@example.com', 'unsubscribed');
      insertSubscriberRow('bounce@example.com', 'bounced');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();

      const result = await createDispatcher(deliver).send(campaign.id);

      expect(result.total).toBe(1);
      expect(deliver.mock.calls.map(([to]) => to)).toEqual(['active@example.com']);
    });

    it('includes legacy empty-status rows only for the whole list', async () => {
      insertSubscriberRow('active@example.com', 'active');
      insertSubscriberRow('legacy@example.com', '');
      const deliver = succeedingMailer();
      const dispatcher = createDispatcher(deliver);

      const all = await dispatcher.send((await draftCampaign()).id);
      const activeOnly = await dispatcher.send((await draftCampaign({ targetSegment: 'active' })).id);

      expect(all.total).toBe(2);
      expect(activeOnly.total).toBe(1);
    });

    it('renders the campaign variant', async () => {
      await seedSubscribers('a@example.com');
      const campaign = await draftCampaign({ templateType: 'promotional' });
      const deliver = succeedingMailer();

      await createDispatcher(deliver).send(campaign.id);

      expect(deliver.mock.calls[0][2]).toContain('<h1>Special Offer!</h1>');
    });
  });

  describe('no-op outcomes', () => {
    it('leaves the campaign in draft when there are no recipients', async () => {
      insertSubscriberRow('gone@example.com', 'unsubscribed');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();

      const result = await createDispatcher(deliver).send(campaign.id);

      expect(result).toEqual({ campaignId: campaign.id, outcome: 'no_recipients', total: 0, sent: 0, failed: 0 });
      expect(deliver).not.toHaveBeenCalled();
      expect(await getCampaign(campaign.id)).toMatchObject({ status: 'draft', totalRecipients: 0 });
    });

    it('does not send a sent campaign again and keeps its tallies', async () => {
      await seedSubscribers('a@example.com', 'b@example.com');
      const campaign = await draftCampaign();
      const deliver = succeedingMailer();
      deliver.mockImplementation(async (to) => to === 'a@example.com');
      const dispatcher = createDispatcher(deliver);

      await dispatcher.send(campaign.id);
      await seedSubscribers('c@example.com');
      const second = await dispatcher.send(campaign.id);

      expect(second).toEqual({ campaignId: campaign.id, outcome: 'already_sent', total: 2, sent: 1, failed: 1 });
      expect(deliver).toHaveBeenCalledTimes(2);
      expect(await getCampaign(campaign.id)).toMatchObject({ status: 'sent', totalRecipients: 2, sentCount: 1, failedCount: 1 });
    });

    it('throws NotFoundError for an unknown campaign', async () => {
      await expect(createDispatcher(succeedingMailer()).send(9999)).rejects.toThrow(NotFoundError);
    });
  });

  describe('resending', () => {
    it('sends a failed campaign again', async () => {
      await seedSubscribers('a@example.com');
      const campaign = await draftCampaign();
      setCampaignStatus(campaign.id, 'failed');

      const result = await createDispatcher(succeedingMailer()).send(campaign.id);
      expect(result.outcome).toBe('sent');
    });

    it('sends a campaign left in sending by a previous process', async () => {
      await seedSubscribers('a@example.com');
      const campaign = await draftCampaign();
      setCampaignStatus(campaign.id, 'sending');

      const result = await createDispatcher(succeedingMailer()).send(campaign.id);
      expect(result).toMatchObject({ outcome: 'sent', sent: 1 });
    });
  });

  describe('concurrency', () => {
    it('never runs more deliveries at once than the pool size', async () => {
      await seedSubscribers(...Array.from({ length: 8 }, (_, i) => `user${i}@example.com`));
      const campaign = await draftCampaign();
      let inFlight = 0;
      let maxInFlight = 0;
      const deliver = succeedingMailer();
      deliver.mockImplementation(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return true;
      });

      const result = await createDispatcher(deliver, 2).send(campaign.id);

      expect(result.sent).toBe(8);
      expect(maxInFlight).toBe(2);
    });

    it('rejects a second start for a campaign that is already running', async () => {
      await seedSubscribers('a@example.com');
      const campaign = await draftCampaign();
      const dispatcher = createDispatcher(succeedingMailer());

      const first = dispatcher.start(campaign.id);
      const second = dispatcher.start(campaign.id);

      await expect(second).rejects.toThrow(ConflictError);
      await expect(second).rejects.toThrow('Campaign is already being sent.');
      const handle = await first;
      await expect(handle.completion).resolves.toMatchObject({ outcome: 'sent', sent: 1 });
    });

    it('keeps the campaign in sending until every recipient has settled', async () => {
      await seedSubscribers('a@example.com', 'b@example.com');
      const campaign = await draftCampaign();
      const gate = deferred<boolean>();
      const deliver = succeedingMailer();
      deliver.mockImplementation(async (to) => (to === 'b@example.com' ? gate.promise : true));
      const dispatcher = createDispatcher(deliver);

      const handle = await dispatcher.start(campaign.id);
      expect(handle).toMatchObject({ outcome: 'started', total: 2 });
      expect(dispatcher.isRunning(campaign.id)).toBe(true);

      await new Promise((resolve) => setTimeout(resolve, 10));
      expect(await getCampaign(campaign.id)).toMatchObject({ status: 'sending', totalRecipients: 2, sentCount: 0 });
      expect(dispatcher.getProgress(campaign.id)).toEqual({ total: 2, sent: 1, failed: 0, cancelled: false });

      gate.resolve(true);
      await handle.completion;

      expect(await getCampaign(campaign.id)).toMatchObject({ status: 'sent', sentCount: 2 });
      expect(dispatcher.isRunning(campaign.id)).toBe(false);
      expect(dispatcher.getProgress(campaign.id)).toBeNull();
    });
  });

  describe('cancel', () => {
    it('stops launching deliveries and closes the run as failed', async () => {
      await seedSubscribers('a@example.com', 'b@example.com', 'c@example.com');
      const campaign = await draftCampaign();
      const started = deferred<void>();
      const gate = deferred<boolean>();
      const deliver = succeedingMailer();
      deliver.mockImplementation(() => {
        started.resolve();
        return gate.promise;
      });
      const dispatcher = createDispatcher(deliver, 1);

      const handle = await dispatcher.start(campaign.id);
      await started.promise;

      expect(dispatcher.cancel(campaign.id)).toBe(true);
      gate.resolve(true);
      const result = await handle.completion;

      expect(result).toEqual({ campaignId: campaign.id, outcome: 'cancelled', total: 3, sent: 1, failed: 0 });
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(await getCampaign(campaign.id)).toMatchObject({
        status: 'failed',
        totalRecipients: 3,
        sentCount: 1,
        failedCount: 0,
        sentAt: null,
      });
    });

    it('returns false when nothing is running', () => {
      expect(createDispatcher(succeedingMailer()).cancel(1)).toBe(false);
    });
  });

  describe('drain', () => {
    it('waits for runs in progress', async () => {
      await seedSubscribers('a@example.com');
      const campaign = await draftCampaign();
      const dispatcher = createDispatcher(succeedingMailer());

      await dispatcher.start(campaign.id);
      const results = await dispatcher.drain();

      expect(results).toEqual([{ campaignId: campaign.id, outcome: 'sent', total: 1, sent: 1, failed: 0 }]);
    });
  });

  describe('preview', () => {
    it('renders with a link issued for the placeholder address', async () => {
      const campaign = await draftCampaign({ templateType: 'newsletter' });

      const html = await createDispatcher(succeedingMailer()).preview(campaign.id);

      expect(html).toContain('<h1>InsurancePro Newsletter</h1>');
      expect(tokens.verify(extractToken(html))).toBe(PREVIEW_EMAIL);
    });

    it('throws NotFoundError for an unknown campaign', async () => {
      await expect(createDispatcher(succeedingMailer()).preview(77)).rejects.toThrow(NotFoundError);
    });
  });
});
