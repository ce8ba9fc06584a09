/**
 * Process build/runtime metadata reported by /health and the startup banner
 */

export const buildInfo = {
  service: 'pool-yield-oracle',
  version: process.env.npm_package_version || '0.0.0',
  startedAt: new Date().toISOString(),
  commit: process.env.GIT_COMMIT_SHA || 'unknown',
  node: process.version
};
