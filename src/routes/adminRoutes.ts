/**
 * Admin Routes
 *
 * Everything behind the admin session: dashboard, subscribers, campaigns,
 * contact messages and mail transport checks.
 *
 * @module routes/adminRoutes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { getMetricsSnapshot } from '../middleware/observabilityMiddleware';
import { requireAdminSession } from '../middleware/sessionAuthMiddleware';
import {
  countActive,
  countAll,
  isSubscriberStatus,
  listSubscribers,
  markBounced,
  type SubscriberStatus,
} from '../services/subscriberService';
import {
  countCampaigns,
  createCampaign,
  deleteCampaign,
  getCampaign,
  listCampaigns,
  recentCampaigns,
} from '../services/campaignService';
import {
  countUnread,
  listContactMessages,
  markContactMessageRead,
} from '../services/contactMessageService';
import type { CampaignDispatcher, DispatchResult } from '../services/campaignDispatcher';
import type { MailTransport } from '../services/email/mailTransport';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { handleRouteError, parseIdParam, readBodyString } from '../utils/apiResponse';
import logger from '../utils/logger';

const adminLogger = logger.child({ component: 'admin-routes' });

export interface AdminRouterDeps {
  dispatcher: CampaignDispatcher;
  transport: Pick<MailTransport, 'mode' | 'verify' | 'send'>;
}

const testEmailSchema = z.string().trim().email('Please provide a valid email address.');

function requireId(req: Request, label: string): number {
  const id = parseIdParam(req.params.id);
  if (id === null) {
    throw new NotFoundError(`${label} not found.`);
  }
  return id;
}

function readQueryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function sendResultMessage(result: DispatchResult): string {
  switch (result.outcome) {
    case 'sent':
      return `Campaign sent! ${result.sent} successful, ${result.failed} failed.`;
    case 'cancelled':
      return `Campaign cancelled. ${result.sent} successful, ${result.failed} failed.`;
    case 'already_sent':
      return 'Campaign has already been sent.';
    case 'no_recipients':
      return 'No subscribers found for this campaign.';
    case 'failed':
      return `Campaign sending failed. ${result.sent} successful, ${result.failed} failed.`;
  }
}

export function createAdminRouter(deps: AdminRouterDeps): Router {
  const { dispatcher, transport } = deps;
  const router = Router();

  router.use(requireAdminSession);

  /**
   * GET /admin/me
   */
  router.get('/me', (req: Request, res: Response) => {
    res.json({ success: true, admin: req.admin });
  });

  // ========================================
  // DASHBOARD
  // ========================================

  /**
   * GET /admin/dashboard
   */
  router.get('/dashboard', async (_req: Request, res: Response) => {
    try {
      const [totalSubscribers, activeSubscribers, totalCampaigns, sentCampaigns, unreadMessages, recent] =
        await Promise.all([
          countAll(),
          countActive(),
          countCampaigns(),
          countCampaigns('sent'),
          countUnread(),
          recentCampaigns(5),
        ]);

      return res.json({
        success: true,
        stats: { totalSubscribers, activeSubscribers, totalCampaigns, sentCampaigns, unreadMessages },
        recentCampaigns: recent,
      });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Dashboard');
    }
  });

  /**
   * GET /admin/metrics
   */
  router.get('/metrics', (_req: Request, res: Response) => {
    res.json({ success: true, metrics: getMetricsSnapshot() });
  });

  // ========================================
  // SUBSCRIBERS
  // ========================================

  /**
   * GET /admin/subscribers?page=&status=
   */
  router.get('/subscribers', async (req: Request, res: Response) => {
    try {
      const rawStatus = readQueryString(req.query.status) ?? 'all';
      let status: SubscriberStatus | 'all' = 'all';
      if (rawStatus !== 'all') {
        if (!isSubscriberStatus(rawStatus)) {
          throw new ValidationError(`Unknown subscriber status "${rawStatus}".`);
        }
        status = rawStatus;
      }

      const page = parseIdParam(readQueryString(req.query.page)) ?? 1;
      const result = await listSubscribers({ status, page, perPage: 20 });

      return res.json({ success: true, ...result });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'List subscribers');
    }
  });

  /**
   * POST /admin/subscribers/:id/bounce
   */
  router.post('/subscribers/:id/bounce', async (req: Request, res: Response) => {
    try {
      const subscriber = await markBounced(requireId(req, 'Subscriber'));
      return res.json({ success: true, message: 'Subscriber marked as bounced.', subscriber });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Mark bounced');
    }
  });

  // ========================================
  // CAMPAIGNS
  // ========================================

  /**
   * GET /admin/campaigns
   */
  router.get('/campaigns', async (_req: Request, res: Response) => {
    try {
      return res.json({ success: true, campaigns: await listCampaigns() });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'List campaigns');
    }
  });

  /**
   * POST /admin/campaigns
   * Form or JSON body: name, subject, content, template_type, target_segment
   */
  router.post('/campaigns', async (req: Request, res: Response) => {
    try {
      const campaign = await createCampaign({
        name: readBodyString(req.body, 'name') ?? '',
        subject: readBodyString(req.body, 'subject') ?? '',
        content: readBodyString(req.body, 'content') ?? '',
        templateType: readBodyString(req.body, 'template_type', 'templateType') || undefined,
        targetSegment: readBodyString(req.body, 'target_segment', 'targetSegment') || undefined,
      });

      return res.status(201).json({ success: true, message: 'Campaign created successfully!', campaign });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Create campaign');
    }
  });

  /**
   * GET /admin/campaigns/:id
   * Includes live counters while a send is running
   */
  router.get('/campaigns/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req, 'Campaign');
      const campaign = await getCampaign(id);
      if (!campaign) {
        throw new NotFoundError('Campaign not found.');
      }
      return res.json({ success: true, campaign, progress: dispatcher.getProgress(id) });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Get campaign');
    }
  });

  /**
   * POST /admin/campaigns/:id/send[?wait=false]
   */
  router.post('/campaigns/:id/send', async (req: Request, res: Response) => {
    try {
      const id = requireId(req, 'Campaign');
      const handle = await dispatcher.start(id);

      if (handle.outcome === 'started' && req.query.wait === 'false') {
        return res.status(202).json({
          success: true,
          message: `Campaign is being sent to ${handle.total} subscribers.`,
          outcome: handle.outcome,
          total: handle.total,
        });
      }

      const result = await handle.completion;
      return res.status(result.outcome === 'failed' ? 500 : 200).json({
        success: result.outcome === 'sent',
        message: sendResultMessage(result),
        outcome: result.outcome,
        total: result.total,
        sent: result.sent,
        failed: result.failed,
      });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Send campaign');
    }
  });

  /**
   * POST /admin/campaigns/:id/cancel
   */
  router.post('/campaigns/:id/cancel', async (req: Request, res: Response) => {
    try {
      const id = requireId(req, 'Campaign');
      if (!dispatcher.cancel(id)) {
        throw new ConflictError('Campaign is not being sent.');
      }
      return res.json({ success: true, message: 'Campaign cancellation requested.' });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Cancel campaign');
    }
  });

  /**
   * GET /admin/campaigns/:id/preview
   * Raw HTML as a subscriber would receive it
   */
  router.get('/campaigns/:id/preview', async (req: Request, res: Response) => {
    try {
      const html = await dispatcher.preview(requireId(req, 'Campaign'));
      return res.type('html').send(html);
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Preview campaign');
    }
  });

  const handleDelete = async (req: Request, res: Response) => {
    try {
      await deleteCampaign(requireId(req, 'Campaign'));
      return res.json({ success: true, message: 'Campaign deleted successfully!' });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Delete campaign');
    }
  };

  /**
   * POST /admin/campaigns/:id/delete, DELETE /admin/campaigns/:id
   */
  router.post('/campaigns/:id/delete', handleDelete);
  router.delete('/campaigns/:id', handleDelete);

  // ========================================
  // CONTACT MESSAGES
  // ========================================

  /**
   * GET /admin/messages
   */
  router.get('/messages', async (_req: Request, res: Response) => {
    try {
      return res.json({ success: true, messages: await listContactMessages() });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'List messages');
    }
  });

  /**
   * POST /admin/messages/:id/read
   */
  router.post('/messages/:id/read', async (req: Request, res: Response) => {
    try {
      const message = await markContactMessageRead(requireId(req, 'Message'));
      return res.json({ success: true, message: 'Message marked as read.', contactMessage: message });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Mark message read');
    }
  });

  // ========================================
  // MAIL TRANSPORT
  // ========================================

  /**
   * POST /admin/email/verify-transport
   */
  router.post('/email/verify-transport', async (_req: Request, res: Response) => {
    try {
      const ok = await transport.verify();
      return res.status(ok ? 200 : 502).json({
        success: ok,
        mode: transport.mode,
        message: ok ? 'Mail transport is ready.' : 'Mail transport could not be verified.',
      });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Verify transport');
    }
  });

  /**
   * POST /admin/email/test
   * Body: { to } (defaults to the signed-in admin's address)
   */
  router.post('/email/test', async (req: Request, res: Response) => {
    try {
      const parsed = testEmailSchema.safeParse(readBodyString(req.body, 'to') ?? req.admin?.email ?? '');
      if (!parsed.success) {
        throw new ValidationError('Please provide a valid email address.');
      }

      await transport.send(
        parsed.data,
        'Test email',
        '<p>This is a test email from the campaign mailer.</p>',
        'This is a test email from the campaign mailer.'
      );

      adminLogger.info('Test email sent', { adminId: req.admin?.id, mode: transport.mode });
      return res.json({ success: true, mode: transport.mode, message: `Test email sent to ${parsed.data}.` });
    } catch (error) {
      return handleRouteError(res, error, adminLogger, 'Test email');
    }
  });

  return router;
}

export default createAdminRouter;
