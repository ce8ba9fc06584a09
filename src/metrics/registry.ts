/**
 * prom-client registry shared by every oracle metric.
 *
 * Kept free of imports from metrics/index.ts so both can load in either order.
 * Process metrics carry the same prefix as the oracle's own series.
 */

import { Registry, collectDefaultMetrics } from 'prom-client';

export const METRIC_PREFIX = 'pool_yield_oracle_';

export const metricsRegistry = new Registry();
metricsRegistry.setDefaultLabels({ service: 'pool-yield-oracle' });
collectDefaultMetrics({ register: metricsRegistry, prefix: METRIC_PREFIX });
