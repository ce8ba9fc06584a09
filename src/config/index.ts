import { env } from './envSchema.js';

export const config = {
  get port() { return env.port; },
  get nodeEnv() { return env.nodeEnv; },
  get apiKey() { return env.apiKey; },
  get jwtSecret() { return env.jwtSecret; },

  get rpcUrl() { return env.rpcUrl; },

  get adminAddresses() { return env.adminAddresses; },
  get oracleAssets() { return env.oracleAssets; },
  get snapshotCapacity() { return env.snapshotCapacity; },

  // Keeper
  get refreshEnabled() { return env.refreshEnabled; },
  get refreshIntervalMs() { return env.refreshIntervalMs; },

  // Logging
  get logLevel() { return env.logLevel; },
  get logFileEnabled() { return env.logFileEnabled; },
  get logFileRetentionHours() { return env.logFileRetentionHours; },

  // Rate limiting
  get rateLimitWindowMs() { return env.rateLimitWindowMs; },
  get rateLimitMaxRequests() { return env.rateLimitMaxRequests; }
};

export type AppConfig = typeof config;
