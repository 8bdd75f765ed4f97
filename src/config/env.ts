/**
 * Environment Configuration Module
 *
 * Single source of truth for all environment variables.
 * Validates and normalizes configuration with sensible defaults.
 * Uses Zod for type-safe validation.
 *
 * Usage:
 *   import { config } from './config/env';
 *   console.log(config.smtp.host);
 *   console.log(config.campaigns.sendConcurrency);
 *
 * @module config/env
 */

import crypto from 'crypto';
import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables immediately when this module is imported
dotenv.config();

// ========================================
// ENVIRONMENT SCHEMA
// ========================================

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).transform(Number).default('5000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),

  // Database (SQLite file, or :memory:)
  DATABASE_PATH: z.string().min(1).default('data/campaigns.db'),

  // Signing secret for unsubscribe links
  SECRET_KEY: z.string().min(1).optional(),

  // SMTP relay
  SMTP_SERVER: z.string().min(1).default('smtp.gmail.com'),
  SMTP_PORT: z.string().regex(/^\d+$/).transform(Number).default('587'),
  SMTP_USERNAME: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  FROM_EMAIL: z.string().email().default('noreply@insurancepro.com'),
  EMAIL_PROVIDER_MODE: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(['live', 'mock', 'disabled']))
    .default('live'),

  // Campaigns
  BASE_PUBLIC_URL: z.string().url().default('http://localhost:5000'),
  BRAND_NAME: z.string().min(1).default('InsurancePro'),
  CAMPAIGN_SEND_CONCURRENCY: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().int().min(1).max(50))
    .default('5'),

  // Admin sessions
  SESSION_TTL_MINUTES: z.string().regex(/^\d+$/).transform(Number).default('30'),
  SESSION_COOKIE_SECURE: booleanString.optional(),
  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_EMAIL: z.string().email().default('admin@insurancepro.com'),
  ADMIN_PASSWORD: z.string().optional(),

  // CORS
  CORS_ALLOWED_ORIGINS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

// ========================================
// PARSE AND VALIDATE
// ========================================

/**
 * Validate a set of environment variables. In development an invalid
 * variable falls back to its default; the valid ones are kept.
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('❌ Invalid environment configuration:');
    result.error.issues.forEach((issue) => {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    });

    if (source.NODE_ENV === 'development') {
      const invalidKeys = new Set(result.error.issues.map((issue) => String(issue.path[0])));
      console.warn(`⚠️ Using defaults for ${Array.from(invalidKeys).join(', ')} in development mode`);
      const validOnly = Object.fromEntries(Object.entries(source).filter(([key]) => !invalidKeys.has(key)));
      return envSchema.parse(validOnly);
    }

    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = parseEnv();

// An unset SECRET_KEY gives every process its own key: links issued before a
// restart stop verifying afterwards.
const secretKeyIsEphemeral = !env.SECRET_KEY;
const secretKey = env.SECRET_KEY ?? crypto.randomBytes(32).toString('hex');

// ========================================
// DERIVED CONFIGURATION
// ========================================

/**
 * Typed configuration object derived from environment variables
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',

  // Server
  server: {
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
  },

  // Database
  database: {
    path: env.DATABASE_PATH,
  },

  // Unsubscribe token signing
  tokens: {
    secretKey,
    secretKeyIsEphemeral,
    unsubscribeMaxAgeSeconds: 31_536_000,
  },

  // SMTP
  smtp: {
    host: env.SMTP_SERVER,
    port: env.SMTP_PORT,
    username: env.SMTP_USERNAME || undefined,
    password: env.SMTP_PASSWORD || undefined,
    from: env.FROM_EMAIL,
    mode: env.EMAIL_PROVIDER_MODE,
  },

  // Campaigns
  campaigns: {
    publicBaseUrl: env.BASE_PUBLIC_URL,
    brandName: env.BRAND_NAME,
    sendConcurrency: env.CAMPAIGN_SEND_CONCURRENCY,
  },

  // Admin
  admin: {
    sessionTtlMinutes: env.SESSION_TTL_MINUTES,
    secureCookie: env.SESSION_COOKIE_SECURE ?? env.NODE_ENV === 'production',
    bootstrap: {
      username: env.ADMIN_USERNAME,
      email: env.ADMIN_EMAIL,
      password: env.ADMIN_PASSWORD || undefined,
    },
  },

  // CORS
  cors: {
    allowedOrigins: env.CORS_ALLOWED_ORIGINS?.split(',').map((s) => s.trim()) || [
      'http://localhost:3000',
      'http://localhost:5000',
    ],
  },
} as const;

export type AppConfig = typeof config;

// ========================================
// DIAGNOSTICS (DEV ONLY)
// ========================================

/**
 * Log environment diagnostics (safe for dev, redacts secrets)
 */
export function logEnvDiagnostics(): void {
  if (config.isDevelopment) {
    console.log('');
    console.log('═══════════════════════════════════════════════════════════');
    console.log('  🔧 ENVIRONMENT DIAGNOSTICS');
    console.log('═══════════════════════════════════════════════════════════');
    console.log(`  NODE_ENV:           ${config.nodeEnv}`);
    console.log(`  PORT:               ${config.server.port}`);
    console.log(`  DATABASE:           ${config.database.path}`);
    console.log(`  SMTP:               ${config.smtp.host}:${config.smtp.port} (${config.smtp.mode})`);
    console.log(`  SMTP_USERNAME:      ${config.smtp.username ? config.smtp.username.replace(/^(.).*(@.*)?$/, '$1****$2') : '(unset)'}`);
    console.log(`  SECRET_KEY:         ${config.tokens.secretKeyIsEphemeral ? 'generated (ephemeral)' : 'configured'}`);
    console.log(`  PUBLIC_URL:         ${config.campaigns.publicBaseUrl}`);
    console.log(`  SEND_CONCURRENCY:   ${config.campaigns.sendConcurrency}`);
    console.log(`  CORS_ORIGINS:       ${config.cors.allowedOrigins.join(', ')}`);
    console.log('═══════════════════════════════════════════════════════════');
    console.log('');
  }
}

export default config;
