/**
 * Session Authentication Middleware
 *
 * First-party cookie session authentication for the admin area.
 *
 * @module middleware/sessionAuthMiddleware
 */

import { Request, Response, NextFunction } from 'express';
import { validateSession, getSessionToken } from '../services/sessionService';
import type { Admin } from '../services/adminService';
import { getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

const authLogger = logger.child({ middleware: 'session-auth' });

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      admin?: Admin;
      adminSessionId?: number;
    }
  }
}

/**
 * Parse cookies from request (simple parser, no external dependency)
 */
export function parseCookies(cookieHeader: string | undefined): Record<string, string> {
  if (!cookieHeader) return {};

  return cookieHeader.split(';').reduce<Record<string, string>>((cookies, cookie) => {
    const [name, ...rest] = cookie.trim().split('=');
    if (name) {
      try {
        cookies[name] = decodeURIComponent(rest.join('='));
      } catch {
        cookies[name] = rest.join('=');
      }
    }
    return cookies;
  }, {});
}

/**
 * Read the admin session token from the request, if any
 */
export function getRequestSessionToken(req: Request): string | undefined {
  return getSessionToken(parseCookies(req.headers.cookie));
}

/**
 * Middleware that requires a valid admin session
 * Returns 401 if no valid session
 */
export async function requireAdminSession(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const token = getRequestSessionToken(req);

    if (!token) {
      res.status(401).json({
        success: false,
        code: 'UNAUTHENTICATED',
        message: 'Authentication required',
      });
      return;
    }

    const session = await validateSession(token);

    if (!session) {
      res.status(401).json({
        success: false,
        code: 'SESSION_INVALID',
        message: 'Session expired or invalid. Please sign in again.',
      });
      return;
    }

    req.admin = session.admin;
    req.adminSessionId = session.id;

    next();
  } catch (error) {
    authLogger.error('Session auth error', { error: getErrorMessage(error) });
    res.status(500).json({
      success: false,
      code: 'AUTH_ERROR',
      message: 'Authentication error',
    });
  }
}

export default requireAdminSession;
