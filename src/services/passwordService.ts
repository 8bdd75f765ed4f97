/**
 * Password Service
 *
 * Password policy checks and hashing (Argon2id) for admin accounts.
 *
 * @module services/passwordService
 */

import * as argon2 from 'argon2';
import logger from '../utils/logger';
import { getErrorMessage } from '../utils/errors';

const passwordLogger = logger.child({ component: 'password' });

// ========================================
// PASSWORD POLICY CONSTANTS
// ========================================

/**
 * Password Policy:
 * - At least 10 characters
 * - At least 3 of: lower case, upper case, numbers, special characters
 */
export const PASSWORD_POLICY = {
  minLength: 10,
  requiredClasses: 3,
};

export interface PasswordValidationResult {
  isValid: boolean;
  errors: string[];
}

export function validatePassword(password: string): PasswordValidationResult {
  const errors: string[] = [];

  if (password.length < PASSWORD_POLICY.minLength) {
    errors.push(`Password must be at least ${PASSWORD_POLICY.minLength} characters`);
  }

  const classCount = [/[a-z]/, /[A-Z]/, /[0-9]/, /[^a-zA-Z0-9]/]
    .filter((pattern) => pattern.test(password))
    .length;

  if (classCount < PASSWORD_POLICY.requiredClasses) {
    errors.push(
      `Password must contain at least ${PASSWORD_POLICY.requiredClasses} of the following: ` +
      'lowercase letters, uppercase letters, numbers, special characters'
    );
  }

  return { isValid: errors.length === 0, errors };
}

// ========================================
// PASSWORD HASHING (Argon2id)
// ========================================

const ARGON2_OPTIONS = {
  type: argon2.argon2id,
  memoryCost: 65536,    // 64 MB
  timeCost: 3,          // 3 iterations
  parallelism: 4,       // 4 parallel threads
};

/**
 * Hash a password using Argon2id
 */
export async function hashPassword(password: string): Promise<string> {
  try {
    return await argon2.hash(password, ARGON2_OPTIONS);
  } catch (error) {
    passwordLogger.error('Failed to hash password', { error: getErrorMessage(error) });
    throw new Error('Password hashing failed');
  }
}

/**
 * Verify a password against a hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  try {
    return await argon2.verify(hash, password);
  } catch (error) {
    passwordLogger.error('Failed to verify password', { error: getErrorMessage(error) });
    return false;
  }
}
