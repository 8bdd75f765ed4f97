/**
 * Admin Auth Routes
 *
 * Username/password login into a cookie session, and logout.
 *
 * @module routes/adminAuthRoutes
 */

import { Router, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { authenticate } from '../services/adminService';
import { createSession, destroySession } from '../services/sessionService';
import { getRequestSessionToken } from '../middleware/sessionAuthMiddleware';
import { AuthenticationError, ValidationError } from '../utils/errors';
import { handleRouteError, readBodyString } from '../utils/apiResponse';
import { authLogger } from '../utils/logger';

const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(80),
  password: z.string().min(1, 'Password is required').max(256),
});

export function createAdminAuthRouter(): Router {
  const router = Router();

  // Brute-force guard on the login form
  const loginLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 10,
    message: { success: false, message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * POST /admin/login
   */
  router.post('/login', loginLimiter, async (req: Request, res: Response) => {
    try {
      const parsed = loginSchema.safeParse({
        username: readBodyString(req.body, 'username') ?? '',
        password: readBodyString(req.body, 'password') ?? '',
      });
      if (!parsed.success) {
        throw new ValidationError(parsed.error.errors.map((e) => e.message).join(', '));
      }

      const result = await authenticate(parsed.data.username, parsed.data.password);
      if (!result.ok) {
        // Same answer for unknown, wrong and deactivated accounts
        throw new AuthenticationError();
      }

      await createSession(
        {
          adminId: result.admin.id,
          ipAddress: req.ip,
          userAgent: req.headers['user-agent'],
        },
        res
      );

      authLogger.info('Admin logged in', { adminId: result.admin.id });

      return res.json({
        success: true,
        message: 'Logged in successfully.',
        admin: {
          id: result.admin.id,
          username: result.admin.username,
          email: result.admin.email,
        },
      });
    } catch (error) {
      return handleRouteError(res, error, authLogger, 'Admin login');
    }
  });

  /**
   * POST /admin/logout
   */
  router.post('/logout', async (req: Request, res: Response) => {
    try {
      await destroySession(getRequestSessionToken(req), res);
      return res.json({ success: true, message: 'You have been logged out.' });
    } catch (error) {
      return handleRouteError(res, error, authLogger, 'Admin logout');
    }
  });

  return router;
}

export default createAdminAuthRouter;
