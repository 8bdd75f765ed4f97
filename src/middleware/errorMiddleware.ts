/**
 * Fallback handlers mounted after every router.
 *
 * @module middleware/errorMiddleware
 */

import { Request, Response, NextFunction } from 'express';
import { handleRouteError } from '../utils/apiResponse';
import { httpLogger } from '../utils/logger';
import { getRequestId } from './observabilityMiddleware';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  });
}

/**
 * Last-resort error handler: malformed bodies and anything a router let escape.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  // body-parser marks its own failures with a status (400 invalid JSON, 413 too large)
  if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status < 500) {
    httpLogger.warn('Rejected request body', { requestId: getRequestId(req), error: error.message });
    res.status(error.status).json({
      success: false,
      code: 'BAD_REQUEST',
      message: error.status === 413 ? 'Request body is too large.' : 'Request body could not be parsed.',
    });
    return;
  }

  handleRouteError(res, error, httpLogger, `${req.method} ${req.path} [${getRequestId(req)}]`);
}
