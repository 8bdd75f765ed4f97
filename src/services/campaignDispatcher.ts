/**
 * Campaign Dispatcher
 *
 * Sends a campaign to its resolved recipient list:
 * 1. Resolve the segment to subscribers
 * 2. Commit "sending" and the recipient total
 * 3. Per recipient (bounded worker pool): fresh unsubscribe token, render, deliver
 * 4. Fold outcomes into the tally; one recipient's failure never stops the run
 * 5. After every recipient has settled, close the campaign as "sent"
 *
 * Each run owns its campaign's counters; workers only report outcomes back.
 * At most one run per campaign is active in this process.
 *
 * @module services/campaignDispatcher
 */

import pLimit from 'p-limit';
import {
  getCampaign,
  markSending,
  finalizeCampaign,
  type Campaign,
} from './campaignService';
import { listRecipients, markCampaignSent, type Subscriber } from './subscriberService';
import type { UnsubscribeTokenService } from './unsubscribeTokenService';
import type { CampaignMailer } from './email/mailTransport';
import { buildUnsubscribeUrl, renderCampaignEmail } from '../templates/emails';
import { ConflictError, NotFoundError, getErrorMessage } from '../utils/errors';
import logger, { redactEmail } from '../utils/logger';

const dispatchLogger = logger.child({ component: 'dispatcher' });

export const PREVIEW_EMAIL = 'preview@example.com';

// ========================================
// TYPES
// ========================================

export type DispatchOutcome =
  | 'sent'
  | 'already_sent'
  | 'no_recipients'
  | 'cancelled'
  | 'failed';

export interface DispatchResult {
  campaignId: number;
  outcome: DispatchOutcome;
  total: number;
  sent: number;
  failed: number;
}

export interface DispatchHandle {
  campaignId: number;
  /** "started" when a run was launched; otherwise the no-op outcome */
  outcome: 'started' | 'already_sent' | 'no_recipients';
  total: number;
  completion: Promise<DispatchResult>;
}

export interface DispatchProgress {
  total: number;
  sent: number;
  failed: number;
  cancelled: boolean;
}

export interface CampaignDispatcherOptions {
  tokens: Pick<UnsubscribeTokenService, 'issue'>;
  transport: CampaignMailer;
  publicBaseUrl: string;
  brandName?: string;
  /** Parallel deliveries per run */
  concurrency?: number;
}

interface RunState {
  total: number;
  sent: number;
  failed: number;
  cancelled: boolean;
  completion?: Promise<DispatchResult>;
}

// ========================================
// DISPATCHER
// ========================================

export class CampaignDispatcher {
  private readonly runs = new Map<number, RunState>();
  private readonly concurrency: number;

  constructor(private readonly options: CampaignDispatcherOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 5));
  }

  /**
   * Validate and launch a run. Resolves once the campaign is in "sending"
   * (or with the no-op outcome); the run itself continues in the background
   * and settles `completion`, which never rejects.
   *
   * @throws NotFoundError when the campaign does not exist
   * @throws ConflictError when a run for this campaign is already in progress
   */
  async start(campaignId: number): Promise<DispatchHandle> {
    if (this.runs.has(campaignId)) {
      throw new ConflictError('Campaign is already being sent.');
    }

    // Claimed before the first await so a concurrent start sees it
    const state: RunState = { total: 0, sent: 0, failed: 0, cancelled: false };
    this.runs.set(campaignId, state);

    let campaign: Campaign;
    let recipients: Subscriber[];
    try {
      const found = await getCampaign(campaignId);
      if (!found) {
        throw new NotFoundError('Campaign not found.');
      }
      campaign = found;

      if (campaign.status === 'sent') {
        this.runs.delete(campaignId);
        dispatchLogger.info('Campaign already sent - nothing to do', { campaignId });
        return this.settledHandle(campaign, 'already_sent');
      }

      recipients = dedupeRecipients(await listRecipients(campaign.targetSegment));
      if (recipients.length === 0) {
        this.runs.delete(campaignId);
        dispatchLogger.warn('No subscribers found for campaign', {
          campaignId,
          segment: campaign.targetSegment,
        });
        return this.settledHandle(campaign, 'no_recipients');
      }

      await markSending(campaignId, recipients.length);
    } catch (error) {
      this.runs.delete(campaignId);
      throw error;
    }

    state.total = recipients.length;
    dispatchLogger.info('Campaign dispatch started', {
      campaignId,
      recipients: recipients.length,
      segment: campaign.targetSegment,
      concurrency: this.concurrency,
    });

    state.completion = this.run(campaign, recipients, state).finally(() => {
      this.runs.delete(campaignId);
    });

    return {
      campaignId,
      outcome: 'started',
      total: recipients.length,
      completion: state.completion,
    };
  }

  /**
   * Send a campaign and wait for the run to finish.
   */
  async send(campaignId: number): Promise<DispatchResult> {
    const handle = await this.start(campaignId);
    return handle.completion;
  }

  /**
   * Stop launching new deliveries for a running campaign. Deliveries already
   * in flight finish and are counted; the campaign is closed as "failed".
   *
   * @returns false when no run is in progress for the campaign
   */
  cancel(campaignId: number): boolean {
    const state = this.runs.get(campaignId);
    if (!state || !state.completion) {
      return false;
    }
    state.cancelled = true;
    dispatchLogger.warn('Campaign dispatch cancellation requested', {
      campaignId,
      sent: state.sent,
      failed: state.failed,
      total: state.total,
    });
    return true;
  }

  isRunning(campaignId: number): boolean {
    return this.runs.has(campaignId);
  }

  /**
   * Live counters of a run in progress.
   */
  getProgress(campaignId: number): DispatchProgress | null {
    const state = this.runs.get(campaignId);
    if (!state || !state.completion) {
      return null;
    }
    return { total: state.total, sent: state.sent, failed: state.failed, cancelled: state.cancelled };
  }

  /**
   * Wait for every run in progress to finish.
   */
  async drain(): Promise<DispatchResult[]> {
    const pending: Promise<DispatchResult>[] = [];
    for (const state of this.runs.values()) {
      if (state.completion) {
        pending.push(state.completion);
      }
    }
    return Promise.all(pending);
  }

  /**
   * Render a campaign as a subscriber would receive it, with an unsubscribe
   * link issued for a placeholder address.
   *
   * @throws NotFoundError
   */
  async preview(campaignId: number): Promise<string> {
    const campaign = await getCampaign(campaignId);
    if (!campaign) {
      throw new NotFoundError('Campaign not found.');
    }
    return this.renderFor(campaign, PREVIEW_EMAIL);
  }

  // ========================================
  // RUN
  // ========================================

  private async run(campaign: Campaign, recipients: Subscriber[], state: RunState): Promise<DispatchResult> {
    const limit = pLimit(this.concurrency);

    try {
      // Completion barrier: every recipient settles before the campaign closes
      await Promise.all(
        recipients.map((recipient) =>
          limit(async () => {
            if (state.cancelled) {
              return;
            }
            const delivered = await this.deliverTo(campaign, recipient);
            if (delivered) {
              state.sent++;
            } else {
              state.failed++;
            }
          })
        )
      );

      const outcome: DispatchOutcome = state.cancelled ? 'cancelled' : 'sent';
      await finalizeCampaign(campaign.id, {
        status: outcome === 'sent' ? 'sent' : 'failed',
        sentCount: state.sent,
        failedCount: state.failed,
        sentAt: outcome === 'sent' ? new Date() : null,
      });

      dispatchLogger.info('Campaign dispatch finished', {
        campaignId: campaign.id,
        outcome,
        total: state.total,
        sent: state.sent,
        failed: state.failed,
      });

      return this.result(campaign.id, outcome, state);
    } catch (error) {
      dispatchLogger.error('Campaign dispatch aborted', {
        campaignId: campaign.id,
        sent: state.sent,
        failed: state.failed,
        error: getErrorMessage(error),
      });

      try {
        await finalizeCampaign(campaign.id, {
          status: 'failed',
          sentCount: state.sent,
          failedCount: state.failed,
          sentAt: null,
        });
      } catch (finalizeError) {
        dispatchLogger.error('Could not record failed campaign', {
          campaignId: campaign.id,
          error: getErrorMessage(finalizeError),
        });
      }

      return this.result(campaign.id, 'failed', state);
    }
  }

  /**
   * One recipient, one attempt. Any error counts as a failed delivery.
   */
  private async deliverTo(campaign: Campaign, recipient: Subscriber): Promise<boolean> {
    let delivered: boolean;
    try {
      const html = this.renderFor(campaign, recipient.email);
      delivered = await this.options.transport.deliver(recipient.email, campaign.subject, html);
    } catch (error) {
      dispatchLogger.error('Error sending to recipient', {
        campaignId: campaign.id,
        subscriberId: recipient.id,
        error: getErrorMessage(error),
      });
      return false;
    }

    if (!delivered) {
      dispatchLogger.warn('Delivery failed', {
        campaignId: campaign.id,
        subscriberId: recipient.id,
        to: redactEmail(recipient.email),
      });
      return false;
    }

    try {
      await markCampaignSent(recipient.id, new Date());
    } catch (error) {
      // The email went out; only the timestamp is missing
      dispatchLogger.warn('Could not stamp last campaign date', {
        subscriberId: recipient.id,
        error: getErrorMessage(error),
      });
    }
    return true;
  }

  private renderFor(campaign: Campaign, email: string): string {
    const token = this.options.tokens.issue(email);
    return renderCampaignEmail(
      campaign.templateType,
      campaign.content,
      buildUnsubscribeUrl(this.options.publicBaseUrl, token),
      { brandName: this.options.brandName }
    );
  }

  private settledHandle(campaign: Campaign, outcome: 'already_sent' | 'no_recipients'): DispatchHandle {
    const result: DispatchResult = {
      campaignId: campaign.id,
      outcome,
      total: outcome === 'already_sent' ? campaign.totalRecipients : 0,
      sent: outcome === 'already_sent' ? campaign.sentCount : 0,
      failed: outcome === 'already_sent' ? campaign.failedCount : 0,
    };
    return { campaignId: campaign.id, outcome, total: result.total, completion: Promise.resolve(result) };
  }

  private result(campaignId: number, outcome: DispatchOutcome, state: RunState): DispatchResult {
    return { campaignId, outcome, total: state.total, sent: state.sent, failed: state.failed };
  }
}

function dedupeRecipients(recipients: Subscriber[]): Subscriber[] {
  const seen = new Set<number>();
  return recipients.filter((recipient) => {
    if (seen.has(recipient.id)) {
      return false;
    }
    seen.add(recipient.id);
    return true;
  });
}
