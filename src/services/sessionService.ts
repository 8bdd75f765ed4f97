/**
 * Session Service
 *
 * Admin sessions using httpOnly cookies.
 * Sessions are stored in the database with hashed tokens for security.
 *
 * @module services/sessionService
 */

import * as crypto from 'crypto';
import type { Response } from 'express';
import { z } from 'zod';
import { getDatabase, toIsoString, fromIsoString } from './databaseService';
import { getAdminById, type Admin } from './adminService';
import { config } from '../config/env';
import { getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

const sessionLogger = logger.child({ component: 'session' });

// ========================================
// CONFIGURATION
// ========================================

const SESSION_CONFIG = {
  // Session token length (32 bytes = 256 bits of entropy)
  tokenLength: 32,

  ttlMinutes: config.admin.sessionTtlMinutes,

  cookieName: 'campaign_admin_session',

  cookie: {
    httpOnly: true,
    secure: config.admin.secureCookie,
    sameSite: 'lax' as const,
    path: '/',
  },
};

// ========================================
// TOKEN UTILITIES
// ========================================

/**
 * Generate a cryptographically secure random session token
 */
function generateSessionToken(): string {
  return crypto.randomBytes(SESSION_CONFIG.tokenLength).toString('hex');
}

/**
 * Hash a session token using SHA-256
 */
function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

// ========================================
// SESSION MANAGEMENT
// ========================================

export interface CreateSessionOptions {
  adminId: number;
  ipAddress?: string;
  userAgent?: string;
}

export interface SessionData {
  id: number;
  adminId: number;
  expiresAt: Date;
  admin: Admin;
}

/** The response methods used to set and clear the session cookie */
export type SessionCookieWriter = Pick<Response, 'cookie' | 'clearCookie'>;

const sessionRowSchema = z.object({
  id: z.number(),
  admin_id: z.number(),
  expires_at: z.string(),
});

/**
 * Create a new session for an admin and set the cookie
 *
 * @returns The raw session token (for testing purposes)
 */
export async function createSession(options: CreateSessionOptions, res: SessionCookieWriter): Promise<string> {
  const { adminId, ipAddress, userAgent } = options;

  const rawToken = generateSessionToken();
  const tokenHash = hashToken(rawToken);

  const now = new Date();
  const expiresAt = new Date(now.getTime() + SESSION_CONFIG.ttlMinutes * 60 * 1000);

  getDatabase().insert(
    `INSERT INTO admin_sessions (admin_id, token_hash, expires_at, ip_address, user_agent, created_at, last_used_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [
      adminId,
      tokenHash,
      toIsoString(expiresAt),
      ipAddress ?? null,
      userAgent?.substring(0, 500) ?? null,
      toIsoString(now),
      toIsoString(now),
    ]
  );

  res.cookie(SESSION_CONFIG.cookieName, rawToken, {
    ...SESSION_CONFIG.cookie,
    expires: expiresAt,
  });

  sessionLogger.info('Session created', { adminId });

  return rawToken;
}

/**
 * Validate a session token and return the session with its admin
 *
 * @returns null if the token is unknown, expired, or the admin is inactive
 */
export async function validateSession(token: string): Promise<SessionData | null> {
  if (!token) {
    return null;
  }

  const db = getDatabase();
  const session = db.get(
    sessionRowSchema,
    'SELECT id, admin_id, expires_at FROM admin_sessions WHERE token_hash = ?',
    [hashToken(token)]
  );

  if (!session) {
    return null;
  }

  const expiresAt = fromIsoString(session.expires_at);
  if (expiresAt < new Date()) {
    sessionLogger.info('Session expired', { sessionId: session.id });
    db.run('DELETE FROM admin_sessions WHERE id = ?', [session.id]);
    return null;
  }

  const admin = await getAdminById(session.admin_id);
  if (!admin || !admin.isActive) {
    sessionLogger.warn('Session for inactive admin', { adminId: session.admin_id });
    return null;
  }

  db.run('UPDATE admin_sessions SET last_used_at = ? WHERE id = ?', [toIsoString(new Date()), session.id]);

  return { id: session.id, adminId: session.admin_id, expiresAt, admin };
}

/**
 * Destroy a session (logout) and clear the cookie
 */
export async function destroySession(token: string | undefined, res: SessionCookieWriter): Promise<void> {
  if (token) {
    try {
      getDatabase().run('DELETE FROM admin_sessions WHERE token_hash = ?', [hashToken(token)]);
    } catch (error) {
      sessionLogger.warn('Failed to delete session', { error: getErrorMessage(error) });
    }
  }

  res.clearCookie(SESSION_CONFIG.cookieName, { ...SESSION_CONFIG.cookie });

  sessionLogger.info('Session destroyed');
}

/**
 * Clean up expired sessions (run periodically)
 */
export async function cleanupExpiredSessions(): Promise<number> {
  const removed = getDatabase().run('DELETE FROM admin_sessions WHERE expires_at < ?', [toIsoString(new Date())]);

  if (removed > 0) {
    sessionLogger.info('Expired sessions cleaned up', { count: removed });
  }

  return removed;
}

/**
 * Get session token from request cookies
 */
export function getSessionToken(cookies: Record<string, string>): string | undefined {
  return cookies[SESSION_CONFIG.cookieName];
}
