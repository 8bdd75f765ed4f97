/**
 * Public Routes
 *
 * Newsletter subscribe/unsubscribe and the contact form. No auth required.
 *
 * @module routes/publicRoutes
 */

import { Router, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { subscribe, unsubscribe, countActive, type SubscribeOutcome } from '../services/subscriberService';
import { createContactMessage } from '../services/contactMessageService';
import type { UnsubscribeTokenService } from '../services/unsubscribeTokenService';
import { handleRouteError, readBodyString } from '../utils/apiResponse';
import logger, { redactEmail } from '../utils/logger';

const publicLogger = logger.child({ component: 'public-routes' });

const SUBSCRIBE_MESSAGES: Record<SubscribeOutcome, string> = {
  subscribed: 'Thank you for subscribing! You will receive our latest updates.',
  reactivated: 'Welcome back! Your subscription has been reactivated.',
  already_subscribed: 'You are already subscribed!',
};

export interface PublicRouterDeps {
  tokens: Pick<UnsubscribeTokenService, 'verify'>;
}

export function createPublicRouter(deps: PublicRouterDeps): Router {
  const router = Router();

  // Form endpoints are the ones bots hammer
  const formLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 30,
    message: { success: false, message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * POST /subscribe
   * Form or JSON body: email, name, insurance_type, phone
   */
  router.post('/subscribe', formLimiter, async (req: Request, res: Response) => {
    try {
      const { outcome, subscriber } = await subscribe({
        email: readBodyString(req.body, 'email') ?? '',
        name: readBodyString(req.body, 'name'),
        phone: readBodyString(req.body, 'phone'),
        insuranceType: readBodyString(req.body, 'insurance_type', 'insuranceType'),
      });

      return res.json({
        success: outcome !== 'already_subscribed',
        outcome,
        message: SUBSCRIBE_MESSAGES[outcome],
        subscriberId: subscriber.id,
      });
    } catch (error) {
      return handleRouteError(res, error, publicLogger, 'Subscribe');
    }
  });

  /**
   * GET /unsubscribe/:token
   * One-click unsubscribe from a campaign email link
   */
  router.get('/unsubscribe/:token', async (req: Request, res: Response) => {
    try {
      const email = deps.tokens.verify(req.params.token);
      const outcome = await unsubscribe(email);

      if (outcome === 'not_found') {
        return res.status(404).json({
          success: false,
          code: 'NOT_FOUND',
          message: 'Subscriber not found.',
        });
      }

      publicLogger.info('Unsubscribed via link', { email: redactEmail(email) });
      return res.json({
        success: true,
        message: 'You have been successfully unsubscribed.',
      });
    } catch (error) {
      return handleRouteError(res, error, publicLogger, 'Unsubscribe');
    }
  });

  /**
   * POST /contact
   * Contact form submission
   */
  router.post('/contact', formLimiter, async (req: Request, res: Response) => {
    try {
      const message = await createContactMessage({
        name: readBodyString(req.body, 'name') ?? '',
        email: readBodyString(req.body, 'email') ?? '',
        phone: readBodyString(req.body, 'phone'),
        subject: readBodyString(req.body, 'subject') ?? '',
        message: readBodyString(req.body, 'message') ?? '',
      });

      return res.status(201).json({
        success: true,
        message: 'Thank you for your message! We will get back to you soon.',
        id: message.id,
      });
    } catch (error) {
      return handleRouteError(res, error, publicLogger, 'Contact message');
    }
  });

  /**
   * GET /api/subscribers/count
   */
  router.get('/api/subscribers/count', async (_req: Request, res: Response) => {
    try {
      return res.json({ count: await countActive() });
    } catch (error) {
      return handleRouteError(res, error, publicLogger, 'Subscriber count');
    }
  });

  return router;
}

export default createPublicRouter;
