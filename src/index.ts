import { createServer } from 'http';

import { createApp } from './app.js';
import { AdminGate, OPERATOR_IDENTITY } from './auth/AdminGate.js';
import { buildInfo } from './buildInfo.js';
import { config } from './config/index.js';
import { formatError } from './errors/YieldOracleError.js';
import { logger } from './logging/logger.js';
import { rateLimiter } from './middleware/rateLimit.js';
import { startRefreshPoller, type RefreshPollerHandle } from './polling/refreshPoller.js';
import { YieldOracleService } from './services/YieldOracleService.js';
import { cometRateSourceFactory } from './sources/CometRateSource.js';
import { RateSourceResolver } from './sources/RateSource.js';

const gate = new AdminGate(config.adminAddresses);
const oracle = new YieldOracleService({
  gate,
  resolver: new RateSourceResolver(cometRateSourceFactory(config.rpcUrl)),
  logger
});

// Bootstrap registrations run as the operator
const operator = gate.authorize(OPERATOR_IDENTITY);
for (const binding of config.oracleAssets) {
  oracle.register(operator, binding.asset, binding.rateSource);
  if (config.snapshotCapacity !== undefined) {
    oracle.resize(operator, binding.asset, config.snapshotCapacity);
  }
}
logger.info(`[oracle] bootstrapped ${config.oracleAssets.length} asset(s) rpc=${config.rpcUrl}`);

const app = createApp({ oracle, gate, logger, middleware: [rateLimiter] });
const httpServer = createServer(app);

let refreshPoller: RefreshPollerHandle | undefined;
if (config.refreshEnabled) {
  refreshPoller = startRefreshPoller({
    oracle,
    intervalMs: config.refreshIntervalMs,
    logger: {
      info: (...args: unknown[]) => logger.info(args.map(String).join(' ')),
      error: (...args: unknown[]) => logger.error(args.map(String).join(' '))
    }
  });
} else {
  logger.info('[keeper] Disabled (REFRESH_ENABLED=false)');
}

// Graceful shutdown handling
const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down...`);
  refreshPoller?.stop();
  httpServer.close((err) => {
    if (err) {
      logger.error(`HTTP server close error: ${formatError(err)}`);
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
};
['SIGINT', 'SIGTERM'].forEach((sig) => process.on(sig, () => shutdown(sig)));

httpServer.listen(config.port, () => {
  logger.info(`Pool yield oracle listening on port ${config.port}`);
  logger.info(`Build info: version=${buildInfo.version} commit=${buildInfo.commit} node=${buildInfo.node} started=${buildInfo.startedAt}`);
});
