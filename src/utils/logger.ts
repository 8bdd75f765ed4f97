import winston from 'winston';
import path from 'path';

/**
 * Winston Logger Configuration
 * Levels: ERROR, WARN, INFO, DEBUG
 * Components: http, auth, database, subscribers, campaigns, dispatcher, mail-transport
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, component, ...metadata }) => {
    const comp = component ? `[${component}]` : '';
    let log = `${timestamp} [${level.toUpperCase().padEnd(7)}]${comp} ${message}`;

    // Add metadata if present (excluding internal fields)
    const metaKeys = Object.keys(metadata).filter(k => !['service', 'level', 'timestamp'].includes(k));
    if (metaKeys.length > 0) {
      const metaObj: Record<string, unknown> = {};
      metaKeys.forEach(k => metaObj[k] = metadata[k]);
      log += ` ${JSON.stringify(metaObj)}`;
    }

    // Add stack trace for errors
    if (stack) {
      log += `\n${stack}`;
    }

    return log;
  })
);

const coloredFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
    const comp = component ? `[${component}]` : '';
    let log = `${timestamp} [${level}]${comp} ${message}`;

    const metaKeys = Object.keys(metadata).filter(k => !['service', 'level', 'timestamp', 'stack'].includes(k));
    if (metaKeys.length > 0) {
      const metaObj: Record<string, unknown> = {};
      metaKeys.forEach(k => metaObj[k] = metadata[k]);
      log += ` ${JSON.stringify(metaObj)}`;
    }

    return log;
  })
);

const logsDir = path.join(process.cwd(), 'logs');

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: coloredFormat,
    silent: process.env.NODE_ENV === 'test',
  }),
];

// No log files from test runs
if (process.env.NODE_ENV !== 'test') {
  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    // Campaign sends get their own file for delivery audits
    new winston.transports.File({
      filename: path.join(logsDir, 'campaigns.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 3,
      format: winston.format.combine(
        winston.format((info) => (info.component === 'dispatcher' || info.component === 'mail-transport' ? info : false))(),
        logFormat
      )
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'campaign-mailer' },
  transports
});

// Namespace loggers for different components
export const httpLogger = logger.child({ component: 'http' });
export const authLogger = logger.child({ component: 'auth' });
export const dbLogger = logger.child({ component: 'database' });

/**
 * Redact the local part of an address for debug logs: "jane@example.com" -> "jane@***"
 */
export function redactEmail(email: string): string {
  return `${email.split('@')[0]}@***`;
}

export default logger;
