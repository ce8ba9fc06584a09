import dotenv from 'dotenv';
import { z } from 'zod';

import { parseAssetBindingsEnv, parseBoolEnv, parseIntEnv, parseListEnv } from './parseEnv.js';

// Load .env before anything reads process.env
dotenv.config();

const isTest = (process.env.NODE_ENV || '').toLowerCase() === 'test';

// Inject test defaults BEFORE schema parsing so Zod doesn't throw for test runs.
if (isTest) {
  if (!process.env.API_KEY) process.env.API_KEY = 'test-api-key';
  if (!process.env.JWT_SECRET) process.env.JWT_SECRET = 'test-jwt-secret';
}

export const rawEnvSchema = z.object({
  PORT: z.string().optional(),
  NODE_ENV: z.string().optional(),

  API_KEY: z.string().min(3, 'API_KEY required'),
  JWT_SECRET: z.string().min(8, 'JWT_SECRET too short'),

  // Lending pool access
  RPC_URL: z.string().optional(),

  // Privileged callers (addresses carried in JWT `address` claim)
  ADMIN_ADDRESSES: z.string().optional(),

  // Bootstrap registrations: asset:rateSource pairs
  ORACLE_ASSETS: z.string().optional(),
  SNAPSHOT_CAPACITY: z.string().regex(/^\d+$/, 'SNAPSHOT_CAPACITY must be an integer').optional(),

  // Keeper
  REFRESH_ENABLED: z.string().optional(),
  REFRESH_INTERVAL_MS: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  LOG_FILE_ENABLED: z.string().optional(),
  LOG_FILE_RETENTION_HOURS: z.string().optional(),

  // HTTP rate limiting
  RATE_LIMIT_WINDOW_MS: z.string().optional(),
  RATE_LIMIT_MAX_REQUESTS: z.string().optional()
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

export function buildEnv(source: NodeJS.ProcessEnv) {
  const parsed = rawEnvSchema.parse(source);
  const nodeEnv = parsed.NODE_ENV || 'development';

  return {
    port: parseIntEnv(parsed.PORT, 3000, 1, 65535),
    nodeEnv,
    apiKey: parsed.API_KEY,
    jwtSecret: parsed.JWT_SECRET,

    rpcUrl: parsed.RPC_URL || 'http://localhost:8545',

    adminAddresses: parseListEnv(parsed.ADMIN_ADDRESSES).map(a => a.toLowerCase()),
    oracleAssets: parseAssetBindingsEnv(parsed.ORACLE_ASSETS),
    // Range is enforced by the ring buffer itself so misconfiguration surfaces as CapacityTooLarge
    snapshotCapacity: parsed.SNAPSHOT_CAPACITY !== undefined ? Number(parsed.SNAPSHOT_CAPACITY) : undefined,

    refreshEnabled: parseBoolEnv(parsed.REFRESH_ENABLED, true),
    refreshIntervalMs: parseIntEnv(parsed.REFRESH_INTERVAL_MS, 3_600_000, 1000),

    logLevel: parsed.LOG_LEVEL || (nodeEnv === 'test' ? 'warn' : 'info'),
    logFileEnabled: parseBoolEnv(parsed.LOG_FILE_ENABLED, false),
    logFileRetentionHours: parseIntEnv(parsed.LOG_FILE_RETENTION_HOURS, 24, 1),

    rateLimitWindowMs: parseIntEnv(parsed.RATE_LIMIT_WINDOW_MS, 60_000, 1000),
    rateLimitMaxRequests: parseIntEnv(parsed.RATE_LIMIT_MAX_REQUESTS, 120, 1)
  };
}

export type Env = ReturnType<typeof buildEnv>;

export const env: Env = buildEnv(process.env);
