/**
 * Unsubscribe Token Service
 *
 * Issues and verifies signed, time-limited tokens that bind an email address
 * to the "unsubscribe" purpose. Tokens are not stored anywhere; a token is
 * valid as long as its signature matches and it is younger than the max age.
 *
 * Format: <payload>.<issuedAt>.<signature>
 *   payload   - base64url(JSON string of the email)
 *   issuedAt  - unix seconds, base36
 *   signature - base64url(HMAC-SHA256(key, "<payload>.<issuedAt>"))
 *   key       - HMAC-SHA256(secret, salt)
 *
 * @module services/unsubscribeTokenService
 */

import crypto from 'crypto';
import { ExpiredTokenError, InvalidTokenError } from '../utils/errors';

export const UNSUBSCRIBE_TOKEN_MAX_AGE_SECONDS = 31_536_000; // 1 year

export interface UnsubscribeTokenOptions {
  secret: string;
  maxAgeSeconds?: number;
  /** Purpose tag mixed into the signing key */
  salt?: string;
}

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class UnsubscribeTokenService {
  private readonly signingKey: Buffer;
  readonly maxAgeSeconds: number;

  constructor(options: UnsubscribeTokenOptions) {
    if (!options.secret) {
      throw new Error('UnsubscribeTokenService requires a signing secret');
    }
    this.maxAgeSeconds = options.maxAgeSeconds ?? UNSUBSCRIBE_TOKEN_MAX_AGE_SECONDS;
    this.signingKey = crypto
      .createHmac('sha256', options.secret)
      .update(options.salt ?? 'unsubscribe')
      .digest();
  }

  issue(email: string, issuedAt: Date = new Date()): string {
    const payload = Buffer.from(JSON.stringify(email), 'utf8').toString('base64url');
    const timestamp = toUnixSeconds(issuedAt).toString(36);
    const signature = this.sign(`${payload}.${timestamp}`).toString('base64url');
    return `${payload}.${timestamp}.${signature}`;
  }

  /**
   * @returns the email the token was issued for
   * @throws InvalidTokenError when malformed or the signature does not match
   * @throws ExpiredTokenError when older than maxAgeSeconds
   */
  verify(token: string, now: Date = new Date()): string {
    const parts = token.split('.');
    if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
      throw new InvalidTokenError('Malformed token');
    }
    const [payload, timestamp, signature] = parts;

    // Compared as text: the base64url decoder ignores trailing bits and junk
    const expected = Buffer.from(this.sign(`${payload}.${timestamp}`).toString('base64url'));
    const received = Buffer.from(signature);
    if (received.length !== expected.length || !crypto.timingSafeEqual(received, expected)) {
      throw new InvalidTokenError('Signature does not match');
    }

    const issuedAtSeconds = parseInt(timestamp, 36);
    if (!Number.isSafeInteger(issuedAtSeconds)) {
      throw new InvalidTokenError('Malformed timestamp');
    }

    const ageSeconds = toUnixSeconds(now) - issuedAtSeconds;
    if (ageSeconds > this.maxAgeSeconds) {
      throw new ExpiredTokenError(ageSeconds, this.maxAgeSeconds);
    }

    return this.decodePayload(payload);
  }

  private decodePayload(payload: string): string {
    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
      throw new InvalidTokenError('Malformed payload');
    }
    if (typeof decoded !== 'string' || decoded.length === 0) {
      throw new InvalidTokenError('Malformed payload');
    }
    return decoded;
  }

  private sign(value: string): Buffer {
    return crypto.createHmac('sha256', this.signingKey).update(value).digest();
  }
}
