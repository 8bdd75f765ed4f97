/**
 * Observability Middleware
 *
 * Request-level tracking:
 * - Request id (echoed as X-Request-Id)
 * - Request duration and slow request detection (>3s threshold)
 * - Aggregated counters per normalized endpoint
 *
 * @module middleware/observabilityMiddleware
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { httpLogger } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

// ============================================
// TYPES
// ============================================

interface EndpointStats {
  count: number;
  totalDuration: number;
  maxDuration: number;
  slowCount: number;
  errorCount: number;
}

export interface MetricsSnapshot {
  totalRequests: number;
  slowRequests: number;
  avgDurationMs: number;
  endpoints: EndpointSnapshot[];
}

export interface EndpointSnapshot {
  path: string;
  count: number;
  avgDurationMs: number;
  maxDurationMs: number;
  slowCount: number;
  errorCount: number;
}

// ============================================
// CONFIGURATION
// ============================================

const SLOW_REQUEST_THRESHOLD_MS = 3000;

// ============================================
// IN-MEMORY METRICS STORE
// ============================================

const metrics = {
  totalRequests: 0,
  slowRequests: 0,
  totalDuration: 0,
  endpointStats: new Map<string, EndpointStats>(),
};

function normalizePath(path: string): string {
  // Numeric ids and unsubscribe tokens collapse into placeholders for aggregation
  return path
    .replace(/\/unsubscribe\/[^/]+/, '/unsubscribe/:token')
    .replace(/\/\d+/g, '/:id');
}

function updateEndpointStats(path: string, duration: number, statusCode: number, isSlow: boolean): void {
  const key = normalizePath(path);
  const stats = metrics.endpointStats.get(key) ?? {
    count: 0,
    totalDuration: 0,
    maxDuration: 0,
    slowCount: 0,
    errorCount: 0,
  };

  stats.count++;
  stats.totalDuration += duration;
  stats.maxDuration = Math.max(stats.maxDuration, duration);
  if (isSlow) stats.slowCount++;
  if (statusCode >= 500) stats.errorCount++;

  metrics.endpointStats.set(key, stats);
}

/**
 * Request id assigned by the observability middleware, or "unknown"
 */
export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

// ============================================
// MIDDLEWARE
// ============================================

/**
 * Request observability middleware
 * Assigns a request id, logs request/response pairs and flags slow requests
 */
export function observabilityMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = uuidv4().slice(0, 8);
  const startTime = Date.now();
  // Routers strip their mount path from req.path while they run
  const path = req.path;

  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  httpLogger.debug(`→ ${req.method} ${path}`, {
    requestId,
    contentLength: req.headers['content-length'],
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const statusCode = res.statusCode;
    const isSlow = duration > SLOW_REQUEST_THRESHOLD_MS;

    metrics.totalRequests++;
    metrics.totalDuration += duration;
    if (isSlow) metrics.slowRequests++;
    updateEndpointStats(path, duration, statusCode, isSlow);

    const responseLog = { requestId, status: statusCode, duration: `${duration}ms` };

    if (isSlow) {
      httpLogger.warn(`⚠ SLOW: ${req.method} ${path} took ${duration}ms`, responseLog);
    } else if (statusCode >= 500) {
      httpLogger.error(`← ${req.method} ${path} ${statusCode}`, responseLog);
    } else if (statusCode >= 400) {
      httpLogger.warn(`← ${req.method} ${path} ${statusCode}`, responseLog);
    } else {
      httpLogger.info(`← ${req.method} ${path} ${statusCode}`, responseLog);
    }
  });

  next();
}

// ============================================
// METRICS REPORTING
// ============================================

/**
 * Get current metrics snapshot, busiest endpoints first
 */
export function getMetricsSnapshot(): MetricsSnapshot {
  const endpoints = Array.from(metrics.endpointStats.entries())
    .map(([path, stats]) => ({
      path,
      count: stats.count,
      avgDurationMs: Math.round(stats.totalDuration / stats.count),
      maxDurationMs: stats.maxDuration,
      slowCount: stats.slowCount,
      errorCount: stats.errorCount,
    }))
    .sort((a, b) => b.count - a.count)
    .slice(0, 10);

  return {
    totalRequests: metrics.totalRequests,
    slowRequests: metrics.slowRequests,
    avgDurationMs: metrics.totalRequests > 0 ? Math.round(metrics.totalDuration / metrics.totalRequests) : 0,
    endpoints,
  };
}

export default observabilityMiddleware;
