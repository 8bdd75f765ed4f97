/**
 * JSON response helpers shared by the routers.
 *
 * @module utils/apiResponse
 */

import type { Response } from 'express';
import type { Logger } from 'winston';
import { AppError, TokenError, getErrorMessage } from './errors';

export const INVALID_UNSUBSCRIBE_LINK_MESSAGE = 'Invalid or expired unsubscribe link.';

const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred. Please try again later.';

/**
 * Answer a failed request. AppErrors keep their status and message; anything
 * else becomes a logged 500 with a generic message.
 */
export function handleRouteError(res: Response, error: unknown, log: Logger, context: string): Response {
  if (error instanceof TokenError) {
    log.info(`${context}: rejected token`, { code: error.code, reason: error.message });
    return res.status(error.statusCode).json({
      success: false,
      code: error.code,
      message: INVALID_UNSUBSCRIBE_LINK_MESSAGE,
    });
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      log.error(`${context} failed`, { code: error.code, error: error.message });
    } else {
      log.warn(`${context} rejected`, { code: error.code, error: error.message });
    }
    return res.status(error.statusCode).json({
      success: false,
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    });
  }

  log.error(`${context} failed`, {
    error: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  return res.status(500).json({
    success: false,
    code: 'INTERNAL_ERROR',
    message: GENERIC_ERROR_MESSAGE,
  });
}

/**
 * Parse a positive integer route parameter; null when it is not one.
 */
export function parseIdParam(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) {
    return null;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/**
 * First string value among `keys` in a parsed JSON or form body.
 */
export function readBodyString(body: unknown, ...keys: string[]): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const fields = new Map<string, unknown>(Object.entries(body));
  for (const key of keys) {
    const value = fields.get(key);
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}
