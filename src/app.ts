import express from 'express';
import cors from 'cors';

import buildRoutes from './api/routes.js';
import { buildErrorHandler } from './api/errorHandler.js';
import type { AdminGate } from './auth/AdminGate.js';
import type { LogSink } from './logging/logger.js';
import { registry } from './metrics/index.js';
import type { YieldOracleService } from './services/YieldOracleService.js';

export interface AppDeps {
  oracle: YieldOracleService;
  gate: AdminGate;
  logger: LogSink;
  middleware?: express.RequestHandler[];
}

export function createApp(deps: AppDeps): express.Application {
  const app = express();
  app.use(cors());
  app.use(express.json());
  for (const mw of deps.middleware ?? []) {
    app.use(mw);
  }

  // Prometheus metrics endpoint (no auth)
  app.get('/metrics', async (_req, res) => {
    res.set('Content-Type', registry.contentType);
    res.send(await registry.metrics());
  });

  app.use('/api/v1', buildRoutes(deps.oracle, deps.gate));
  app.use(buildErrorHandler(deps.logger));

  return app;
}
