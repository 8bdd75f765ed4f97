/**
 * Admin Service
 *
 * Admin accounts: credential checks and the bootstrap account created at
 * start-up.
 *
 * @module services/adminService
 */

import { z } from 'zod';
import { getDatabase, toIsoString, fromIsoString } from './databaseService';
import { hashPassword, verifyPassword, validatePassword } from './passwordService';
import { authLogger } from '../utils/logger';

export interface Admin {
  id: number;
  username: string;
  email: string;
  isActive: boolean;
  lastLoginAt: Date | null;
  createdAt: Date;
}

const adminRowSchema = z.object({
  id: z.number(),
  username: z.string(),
  email: z.string(),
  password_hash: z.string(),
  is_active: z.number(),
  last_login_at: z.string().nullable(),
  created_at: z.string(),
});

type AdminRow = z.infer<typeof adminRowSchema>;

export type AuthenticationResult =
  | { ok: true; admin: Admin }
  | { ok: false; reason: 'invalid_credentials' | 'inactive' };

export interface CreateAdminParams {
  username: string;
  email: string;
  password: string;
  isActive?: boolean;
}

function toAdmin(row: AdminRow): Admin {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    isActive: row.is_active === 1,
    lastLoginAt: fromIsoString(row.last_login_at),
    createdAt: fromIsoString(row.created_at),
  };
}

function findRowByUsername(username: string): AdminRow | undefined {
  return getDatabase().get(adminRowSchema, 'SELECT * FROM admins WHERE username = ?', [username]);
}

export async function getAdminById(id: number): Promise<Admin | null> {
  const row = getDatabase().get(adminRowSchema, 'SELECT * FROM admins WHERE id = ?', [id]);
  return row ? toAdmin(row) : null;
}

export async function createAdmin(params: CreateAdminParams): Promise<Admin> {
  const passwordHash = await hashPassword(params.password);
  const id = getDatabase().insert(
    `INSERT INTO admins (username, email, password_hash, is_active, created_at)
     VALUES (?, ?, ?, ?, ?)`,
    [params.username, params.email.trim().toLowerCase(), passwordHash, params.isActive === false ? 0 : 1, toIsoString(new Date())]
  );

  const admin = await getAdminById(id);
  if (!admin) {
    throw new Error('Admin was not persisted');
  }

  authLogger.info('Admin account created', { adminId: admin.id, username: admin.username });
  return admin;
}

/**
 * Check a username/password pair and stamp the login time on success.
 */
export async function authenticate(username: string, password: string): Promise<AuthenticationResult> {
  const row = findRowByUsername(username);

  if (!row || !(await verifyPassword(password, row.password_hash))) {
    authLogger.warn('Failed admin login', { username });
    return { ok: false, reason: 'invalid_credentials' };
  }

  if (row.is_active !== 1) {
    authLogger.warn('Login attempt for deactivated admin', { adminId: row.id });
    return { ok: false, reason: 'inactive' };
  }

  const now = new Date();
  getDatabase().run('UPDATE admins SET last_login_at = ? WHERE id = ?', [toIsoString(now), row.id]);

  return { ok: true, admin: { ...toAdmin(row), lastLoginAt: now } };
}

/**
 * Create the bootstrap admin when it does not exist yet. Without a configured
 * password nothing is created.
 *
 * @returns the created admin, or null when nothing was done
 */
export async function ensureDefaultAdmin(bootstrap: {
  username: string;
  email: string;
  password?: string;
}): Promise<Admin | null> {
  if (findRowByUsername(bootstrap.username)) {
    return null;
  }

  if (!bootstrap.password) {
    authLogger.warn('No admin account exists and ADMIN_PASSWORD is not set - admin login is unavailable', {
      username: bootstrap.username,
    });
    return null;
  }

  const policy = validatePassword(bootstrap.password);
  if (!policy.isValid) {
    authLogger.warn('Bootstrap admin password does not meet the password policy', { errors: policy.errors });
  }

  return createAdmin({
    username: bootstrap.username,
    email: bootstrap.email,
    password: bootstrap.password,
  });
}
