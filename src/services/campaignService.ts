/**
 * Campaign Service
 *
 * Campaign records backed by the `campaigns` table. Status transitions out of
 * draft (sending, sent, failed) are made by the campaign dispatcher only;
 * this module just persists them.
 *
 * @module services/campaignService
 */

import { z } from 'zod';
import { getDatabase, toIsoString, fromIsoString } from './databaseService';
import { CAMPAIGN_TEMPLATE_VARIANTS } from '../templates/emails';
import type { CampaignSegment } from './subscriberService';
import { AlreadyCompletedError, ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import logger from '../utils/logger';

const campaignsLogger = logger.child({ component: 'campaigns' });

// ========================================
// TYPES
// ========================================

export const CAMPAIGN_STATUSES = ['draft', 'scheduled', 'sending', 'sent', 'failed'] as const;
export const CAMPAIGN_SEGMENTS = ['all', 'active'] as const;

export type CampaignStatus = typeof CAMPAIGN_STATUSES[number];

export interface Campaign {
  id: number;
  name: string;
  subject: string;
  content: string;
  /** Stored as entered; rendering falls back to "default" for unknown values */
  templateType: string;
  targetSegment: CampaignSegment;
  status: CampaignStatus;
  createdAt: Date;
  sentAt: Date | null;
  totalRecipients: number;
  sentCount: number;
  failedCount: number;
  /** Reserved for open tracking; always 0 */
  openedCount: number;
}

export interface CampaignTally {
  status: Extract<CampaignStatus, 'sent' | 'failed'>;
  sentCount: number;
  failedCount: number;
  sentAt: Date | null;
}

const campaignRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  subject: z.string(),
  content: z.string(),
  template_type: z.string(),
  target_segment: z.string(),
  status: z.string(),
  created_at: z.string(),
  sent_at: z.string().nullable(),
  total_recipients: z.number(),
  sent_count: z.number(),
  failed_count: z.number(),
  opened_count: z.number(),
});

type CampaignRow = z.infer<typeof campaignRowSchema>;

// ========================================
// VALIDATION SCHEMAS
// ========================================

export const createCampaignSchema = z.object({
  name: z.string().trim().min(1, 'Campaign name is required').max(200),
  subject: z.string().trim().min(1, 'Email subject is required').max(200),
  content: z.string().min(1, 'Email content is required'),
  templateType: z.enum(CAMPAIGN_TEMPLATE_VARIANTS).default('default'),
  targetSegment: z.enum(CAMPAIGN_SEGMENTS).default('all'),
});

/**
 * Raw form fields; variant and segment are checked against their enums.
 */
export interface CampaignFormInput {
  name: string;
  subject: string;
  content: string;
  templateType?: string;
  targetSegment?: string;
}

// ========================================
// HELPERS
// ========================================

function isCampaignStatus(value: string): value is CampaignStatus {
  return CAMPAIGN_STATUSES.some((status) => status === value);
}

function toCampaign(row: CampaignRow): Campaign {
  return {
    id: row.id,
    name: row.name,
    subject: row.subject,
    content: row.content,
    templateType: row.template_type,
    // Anything other than "active" has always meant the whole list
    targetSegment: row.target_segment === 'active' ? 'active' : 'all',
    status: isCampaignStatus(row.status) ? row.status : 'draft',
    createdAt: fromIsoString(row.created_at),
    sentAt: fromIsoString(row.sent_at),
    totalRecipients: row.total_recipients,
    sentCount: row.sent_count,
    failedCount: row.failed_count,
    openedCount: row.opened_count,
  };
}

function findRow(id: number): CampaignRow | undefined {
  return getDatabase().get(campaignRowSchema, 'SELECT * FROM campaigns WHERE id = ?', [id]);
}

// ========================================
// CRUD
// ========================================

/**
 * Create a campaign in draft
 */
export async function createCampaign(input: CampaignFormInput): Promise<Campaign> {
  const parsed = createCampaignSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.errors.map((e) => e.message).join(', '),
      { fields: parsed.error.flatten().fieldErrors }
    );
  }

  const { name, subject, content, templateType, targetSegment } = parsed.data;

  const id = getDatabase().insert(
    `INSERT INTO campaigns (name, subject, content, template_type, target_segment, status, created_at)
     VALUES (?, ?, ?, ?, ?, 'draft', ?)`,
    [name, subject, content, templateType, targetSegment, toIsoString(new Date())]
  );

  const campaign = await getCampaign(id);
  if (!campaign) {
    throw new NotFoundError('Campaign not found.');
  }

  campaignsLogger.info('Campaign created', { campaignId: campaign.id, templateType, targetSegment });
  return campaign;
}

export async function getCampaign(id: number): Promise<Campaign | null> {
  const row = findRow(id);
  return row ? toCampaign(row) : null;
}

/**
 * All campaigns, newest first
 */
export async function listCampaigns(): Promise<Campaign[]> {
  return getDatabase()
    .all(campaignRowSchema, 'SELECT * FROM campaigns ORDER BY created_at DESC, id DESC')
    .map(toCampaign);
}

export async function recentCampaigns(limit = 5): Promise<Campaign[]> {
  return getDatabase()
    .all(campaignRowSchema, 'SELECT * FROM campaigns ORDER BY created_at DESC, id DESC LIMIT ?', [limit])
    .map(toCampaign);
}

export async function countCampaigns(status?: CampaignStatus): Promise<number> {
  const db = getDatabase();
  return status
    ? db.count('SELECT COUNT(*) AS count FROM campaigns WHERE status = ?', [status])
    : db.count('SELECT COUNT(*) AS count FROM campaigns');
}

/**
 * Delete a campaign that has not been sent
 *
 * @throws NotFoundError
 * @throws AlreadyCompletedError for sent campaigns
 * @throws ConflictError while a send is in progress
 */
export async function deleteCampaign(id: number): Promise<void> {
  const row = findRow(id);
  if (!row) {
    throw new NotFoundError('Campaign not found.');
  }
  if (row.status === 'sent') {
    throw new AlreadyCompletedError('Cannot delete sent campaigns.');
  }
  if (row.status === 'sending') {
    throw new ConflictError('Cannot delete a campaign while it is sending.');
  }

  getDatabase().run('DELETE FROM campaigns WHERE id = ?', [id]);
  campaignsLogger.info('Campaign deleted', { campaignId: id });
}

// ========================================
// DISPATCH STATE
// ========================================

/**
 * Enter "sending" with a fresh tally. Committed before the first delivery.
 */
export async function markSending(id: number, totalRecipients: number): Promise<void> {
  getDatabase().run(
    `UPDATE campaigns
     SET status = 'sending', total_recipients = ?, sent_count = 0, failed_count = 0, sent_at = NULL
     WHERE id = ?`,
    [totalRecipients, id]
  );
}

/**
 * Close a dispatch run with its final counts.
 */
export async function finalizeCampaign(id: number, tally: CampaignTally): Promise<void> {
  getDatabase().run(
    `UPDATE campaigns
     SET status = ?, sent_count = ?, failed_count = ?, sent_at = ?
     WHERE id = ?`,
    [tally.status, tally.sentCount, tally.failedCount, tally.sentAt ? toIsoString(tally.sentAt) : null, id]
  );

  campaignsLogger.info('Campaign closed', {
    campaignId: id,
    status: tally.status,
    sent: tally.sentCount,
    failed: tally.failedCount,
  });
}
