// Load environment variables FIRST - before any other imports
import dotenv from 'dotenv';
dotenv.config();

import { config, logEnvDiagnostics } from './config/env';
import { createApp, createDependencies } from './app';
import { ensureDefaultAdmin } from './services/adminService';
import { cleanupExpiredSessions } from './services/sessionService';
import { closeDatabase, initDatabase } from './services/databaseService';
import { getErrorMessage } from './utils/errors';
import logger from './utils/logger';

const SESSION_CLEANUP_INTERVAL_MS = 15 * 60 * 1000;
const SHUTDOWN_TIMEOUT_MS = 30_000;

async function main(): Promise<void> {
  logEnvDiagnostics();

  if (config.tokens.secretKeyIsEphemeral) {
    logger.warn('SECRET_KEY is not set - using a random key for this process. Unsubscribe links issued now stop working after a restart.');
  }
  if (config.smtp.mode === 'live' && !(config.smtp.username && config.smtp.password)) {
    logger.warn('SMTP credentials not configured - campaign deliveries will fail');
  }

  await initDatabase();
  await ensureDefaultAdmin(config.admin.bootstrap);

  const deps = createDependencies();
  const app = createApp(deps);

  const server = app.listen(config.server.port, () => {
    logger.info('Server started', {
      port: config.server.port,
      env: config.nodeEnv,
      emailMode: config.smtp.mode,
      sendConcurrency: config.campaigns.sendConcurrency,
    });
  });

  const cleanupTimer = setInterval(() => {
    cleanupExpiredSessions().catch((error: unknown) => {
      logger.error('Session cleanup failed', { error: getErrorMessage(error) });
    });
  }, SESSION_CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    clearInterval(cleanupTimer);
    const forceExit = setTimeout(() => {
      logger.error('Shutdown timed out - exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close(() => {
      // Campaign runs in progress finish before the database goes away
      deps.dispatcher
        .drain()
        .then((results) => {
          if (results.length > 0) {
            logger.info('Campaign runs finished before shutdown', { runs: results.length });
          }
        })
        .catch((error: unknown) => {
          logger.error('Error while draining campaign runs', { error: getErrorMessage(error) });
        })
        .finally(() => {
          closeDatabase();
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
