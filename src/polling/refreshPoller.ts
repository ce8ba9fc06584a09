import { formatError } from '../errors/YieldOracleError.js';
import type { RefreshReport } from '../services/YieldOracleService.js';

export interface RefreshTarget {
  triggerRefresh(): Promise<RefreshReport>;
}

export interface RefreshPollerOptions {
  oracle: RefreshTarget;
  intervalMs: number;
  logger?: { info: (...args: unknown[]) => void; error: (...args: unknown[]) => void };
  onReport?: (report: RefreshReport) => void;
}

export interface RefreshPollerHandle {
  stop(): void;
  isRunning(): boolean;
  getLastReport(): RefreshReport | null;
}

/**
 * Keeper loop: immediate refresh, then one every intervalMs.
 * A tick that is still running when the next one is due is not overlapped; the due tick is skipped.
 */
export function startRefreshPoller(opts: RefreshPollerOptions): RefreshPollerHandle {
  const { oracle, intervalMs, logger = console, onReport } = opts;

  let active = true;
  let inFlight = false;
  let lastReport: RefreshReport | null = null;

  logger.info(`[keeper] starting refresh poller (interval=${intervalMs}ms)`);

  const tick = async () => {
    if (!active) return;
    if (inFlight) {
      logger.info('[keeper] previous refresh still running, skipping tick');
      return;
    }

    inFlight = true;
    try {
      const report = await oracle.triggerRefresh();
      lastReport = report;
      if (report.failures.length > 0) {
        const failed = report.failures.map(f => `${f.asset.slice(0, 10)}:${f.code}`).join(', ');
        logger.error(`[keeper] refresh completed with failures: ${failed}`);
      }
      onReport?.(report);
    } catch (err: unknown) {
      logger.error(`[keeper] refresh error: ${formatError(err)}`);
    } finally {
      inFlight = false;
    }
  };

  // Immediate first run
  void tick();
  const id = setInterval(() => { void tick(); }, intervalMs);

  return {
    stop() {
      if (active) {
        active = false;
        clearInterval(id);
        logger.info('[keeper] refresh poller stopped');
      }
    },
    isRunning() {
      return active;
    },
    getLastReport() {
      return lastReport;
    }
  };
}
