import { Counter, Gauge, Histogram } from 'prom-client';

import { METRIC_PREFIX, metricsRegistry } from './registry.js';

// Re-export the central registry
export { metricsRegistry as registry };

export const snapshotsLatchedTotal = new Counter({
  name: `${METRIC_PREFIX}snapshots_latched_total`,
  help: 'Snapshots written into ring buffers',
  labelNames: ['asset'],
  registers: [metricsRegistry]
});

export const refreshFailuresTotal = new Counter({
  name: `${METRIC_PREFIX}refresh_failures_total`,
  help: 'Per-asset latch failures during refresh',
  labelNames: ['code'],
  registers: [metricsRegistry]
});

export const refreshDuration = new Histogram({
  name: `${METRIC_PREFIX}refresh_duration_seconds`,
  help: 'Duration of a full refresh across all registered assets (seconds)',
  labelNames: ['trigger'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [metricsRegistry]
});

export const bufferCapacity = new Gauge({
  name: `${METRIC_PREFIX}buffer_capacity`,
  help: 'Snapshot ring buffer capacity per asset',
  labelNames: ['asset'],
  registers: [metricsRegistry]
});

export const registeredAssets = new Gauge({
  name: `${METRIC_PREFIX}registered_assets`,
  help: 'Number of registered assets',
  registers: [metricsRegistry]
});

export const reportedYield = new Gauge({
  name: `${METRIC_PREFIX}reported_yield`,
  help: 'Last time-weighted per-second supply rate reported per asset (decimal, lossy)',
  labelNames: ['asset'],
  registers: [metricsRegistry]
});
