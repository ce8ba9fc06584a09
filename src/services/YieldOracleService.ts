// YieldOracleService: registry, per-asset snapshot buffers and yield reads behind one facade
// Privileged operations take an AdminCapability minted by the AdminGate

import EventEmitter from 'events';

import type { AdminCapability, AdminGate } from '../auth/AdminGate.js';
import { YieldOracleError, formatError, type YieldOracleErrorCode } from '../errors/YieldOracleError.js';
import type { LogSink } from '../logging/logger.js';
import {
  bufferCapacity,
  refreshDuration,
  refreshFailuresTotal,
  registeredAssets,
  reportedYield,
  snapshotsLatchedTotal
} from '../metrics/index.js';
import { AssetRegistry, type RegistrationResult, type RegistryEntry } from '../registry/AssetRegistry.js';
import { computeYieldWindow, type YieldWindow } from '../snapshots/YieldAggregator.js';
import type { SnapshotView } from '../snapshots/types.js';
import { readSupplyRate, type RateSourceResolver } from '../sources/RateSource.js';
import { shortAddress } from '../utils/Address.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { annualize, rateToNumber } from '../utils/fixedPoint.js';

export const ORACLE_EVENTS = {
  rateSourceSet: 'rateSourceSet',
  capacityChanged: 'capacityChanged',
  snapshotLatched: 'snapshotLatched'
} as const;

export interface RateSourceSetEvent {
  asset: string;
  rateSource: string;
}

export interface CapacityChangedEvent {
  asset: string;
  previous: number;
  capacity: number;
}

export interface LatchedSnapshot {
  asset: string;
  rateSource: string;
  timestamp: number;
  rate: bigint;
  /** Cursor after the write, i.e. the new oldest slot */
  writeIndex: number;
}

export type RefreshTrigger = 'keeper' | 'manual';

export interface RefreshFailure {
  asset: string;
  code: YieldOracleErrorCode | 'Unknown';
  message: string;
}

export interface RefreshReport {
  trigger: RefreshTrigger;
  startedAt: number;
  latched: LatchedSnapshot[];
  failures: RefreshFailure[];
}

export interface YieldOracleServiceOptions {
  gate: AdminGate;
  resolver: RateSourceResolver;
  registry?: AssetRegistry;
  clock?: Clock;
  logger?: LogSink;
}

export class YieldOracleService extends EventEmitter {
  private readonly gate: AdminGate;
  private readonly resolver: RateSourceResolver;
  private readonly registry: AssetRegistry;
  private readonly clock: Clock;
  private readonly logger: LogSink;
  private lastRefresh?: RefreshReport;

  constructor(options: YieldOracleServiceOptions) {
    super();
    this.gate = options.gate;
    this.resolver = options.resolver;
    this.registry = options.registry ?? new AssetRegistry();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
  }

  /**
   * Register an asset (or rebind its rate source). Idempotent for an unchanged pair.
   */
  public register(capability: AdminCapability, asset: string, rateSource: string): RegistrationResult {
    this.gate.verify(capability);

    const result = this.registry.register(asset, rateSource);

    if (result.created) {
      registeredAssets.set(this.registry.size());
      bufferCapacity.set({ asset: result.asset }, this.registry.getBuffer(result.asset).getCapacity());
    }

    if (result.rebound) {
      const event: RateSourceSetEvent = { asset: result.asset, rateSource: result.rateSource };
      this.emit(ORACLE_EVENTS.rateSourceSet, event);
      this.logger.info(
        `[oracle] rate source set asset=${shortAddress(result.asset)} source=${shortAddress(result.rateSource)} ` +
        `created=${result.created} by=${capability.caller}`
      );
    }

    return result;
  }

  /**
   * Grow an asset's buffer; shrink requests return the current capacity unchanged.
   */
  public resize(capability: AdminCapability, asset: string, newCapacity: number): number {
    this.gate.verify(capability);

    const buffer = this.registry.getBuffer(asset);
    const previous = buffer.getCapacity();
    const capacity = buffer.resize(newCapacity);

    if (capacity !== previous) {
      const key = this.registry.getEntry(asset).asset;
      const event: CapacityChangedEvent = { asset: key, previous, capacity };
      this.emit(ORACLE_EVENTS.capacityChanged, event);
      bufferCapacity.set({ asset: key }, capacity);
      this.logger.info(`[oracle] capacity changed asset=${shortAddress(key)} ${previous} -> ${capacity}`);
    }

    return capacity;
  }

  public async refreshOne(capability: AdminCapability, asset: string): Promise<LatchedSnapshot> {
    this.gate.verify(capability);
    return this.latch(asset);
  }

  /**
   * Manual batch refresh
   */
  public async refreshAll(capability: AdminCapability): Promise<RefreshReport> {
    this.gate.verify(capability);
    return this.runRefresh('manual');
  }

  /**
   * Keeper entry point: latch every registered asset
   */
  public async triggerRefresh(): Promise<RefreshReport> {
    return this.runRefresh('keeper');
  }

  /**
   * Time-weighted average per-second supply rate, 18 decimals
   */
  public getYield(asset: string): bigint {
    return this.getYieldWindow(asset).rate;
  }

  public getYieldWindow(asset: string): YieldWindow {
    const { asset: key } = this.registry.getEntry(asset);
    const window = computeYieldWindow(this.registry.getBuffer(key));
    reportedYield.set({ asset: key }, rateToNumber(window.rate));
    return window;
  }

  public getAnnualizedYield(asset: string): bigint {
    return annualize(this.getYield(asset));
  }

  public getSnapshots(asset: string): SnapshotView {
    return this.registry.getBuffer(asset).toView();
  }

  public listAssets(): RegistryEntry[] {
    return this.registry.list();
  }

  public getLastRefresh(): RefreshReport | undefined {
    return this.lastRefresh;
  }

  private async runRefresh(trigger: RefreshTrigger): Promise<RefreshReport> {
    const endTimer = refreshDuration.startTimer({ trigger });
    const report: RefreshReport = {
      trigger,
      startedAt: this.clock(),
      latched: [],
      failures: []
    };

    // Strict registration order; one asset failing never stops the rest
    for (const { asset } of this.registry.list()) {
      try {
        report.latched.push(await this.latch(asset));
      } catch (err: unknown) {
        const code = err instanceof YieldOracleError ? err.code : 'Unknown';
        const message = formatError(err);
        report.failures.push({ asset, code, message });
        refreshFailuresTotal.inc({ code });
        this.logger.warn(`[oracle] latch failed asset=${shortAddress(asset)} code=${code}: ${message}`);
      }
    }

    endTimer();
    this.lastRefresh = report;
    this.logger.info(
      `[oracle] refresh trigger=${trigger} latched=${report.latched.length} failed=${report.failures.length}`
    );
    return report;
  }

  private async latch(asset: string): Promise<LatchedSnapshot> {
    const { asset: key, rateSource } = this.registry.getEntry(asset);
    const buffer = this.registry.getBuffer(key);

    let rate: bigint;
    try {
      rate = await readSupplyRate(this.resolver.resolve(rateSource));
    } catch (err: unknown) {
      throw new YieldOracleError(
        'RateSourceUnavailable',
        `Rate source read failed: ${formatError(err)}`,
        { asset: key, rateSource },
        { cause: err }
      );
    }

    const snapshot = buffer.latch(rate, this.clock());
    const latched: LatchedSnapshot = {
      asset: key,
      rateSource,
      timestamp: snapshot.timestamp,
      rate: snapshot.rate,
      writeIndex: buffer.getWriteIndex()
    };

    this.emit(ORACLE_EVENTS.snapshotLatched, latched);
    snapshotsLatchedTotal.inc({ asset: key });
    return latched;
  }
}
