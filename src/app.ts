/**
 * Express application factory.
 *
 * Kept apart from server start-up so tests can mount the whole HTTP surface
 * with supertest, with their own transport or dispatcher.
 *
 * @module app
 */

import express, { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { config } from './config/env';
import { UnsubscribeTokenService } from './services/unsubscribeTokenService';
import { MailTransport } from './services/email/mailTransport';
import { CampaignDispatcher } from './services/campaignDispatcher';
import { createPublicRouter } from './routes/publicRoutes';
import { createAdminAuthRouter } from './routes/adminAuthRoutes';
import { createAdminRouter } from './routes/adminRoutes';
import { observabilityMiddleware, getMetricsSnapshot } from './middleware/observabilityMiddleware';
import { errorHandler, notFoundHandler } from './middleware/errorMiddleware';
import logger from './utils/logger';

export interface AppDependencies {
  tokens: UnsubscribeTokenService;
  transport: MailTransport;
  dispatcher: CampaignDispatcher;
}

/**
 * Services wired from the environment configuration
 */
export function createDependencies(overrides: Partial<AppDependencies> = {}): AppDependencies {
  const tokens = overrides.tokens ?? new UnsubscribeTokenService({
    secret: config.tokens.secretKey,
    maxAgeSeconds: config.tokens.unsubscribeMaxAgeSeconds,
  });

  const transport = overrides.transport ?? new MailTransport({
    host: config.smtp.host,
    port: config.smtp.port,
    username: config.smtp.username,
    password: config.smtp.password,
    from: config.smtp.from,
    mode: config.smtp.mode,
  });

  const dispatcher = overrides.dispatcher ?? new CampaignDispatcher({
    tokens,
    transport,
    publicBaseUrl: config.campaigns.publicBaseUrl,
    brandName: config.campaigns.brandName,
    concurrency: config.campaigns.sendConcurrency,
  });

  return { tokens, transport, dispatcher };
}

export function createApp(deps: AppDependencies = createDependencies()): express.Express {
  const app = express();

  // ===== TRUST PROXY =====
  // Required for express-rate-limit to see client IPs behind a reverse proxy
  app.set('trust proxy', 1);

  // ===== SECURITY MIDDLEWARE =====

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        // Campaign previews carry their own inline styles
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  }));

  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 300,
    message: { success: false, message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(generalLimiter);

  // ===== CORS CONFIGURATION =====

  const allowedOrigins: readonly string[] = config.cors.allowedOrigins;
  app.use(cors({
    origin(origin, callback) {
      // Same-origin requests, curl and health checks carry no Origin header
      if (!origin || allowedOrigins.includes(origin) || config.isDevelopment) {
        callback(null, true);
        return;
      }
      logger.warn('CORS blocked request from origin', { origin });
      callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  // Body parsers with size limits
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // ===== OBSERVABILITY MIDDLEWARE =====
  app.use(observabilityMiddleware);

  // ===== ROUTES =====

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      emailMode: deps.transport.mode,
      requests: getMetricsSnapshot().totalRequests,
    });
  });

  app.use('/', createPublicRouter({ tokens: deps.tokens }));
  app.use('/admin', createAdminAuthRouter());
  app.use('/admin', createAdminRouter({ dispatcher: deps.dispatcher, transport: deps.transport }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
