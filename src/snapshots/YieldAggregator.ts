/**
 * YieldAggregator: time-weighted average rate over a chronological run of snapshots.
 *
 * Each interval between consecutive samples is weighted by its length and valued at the
 * trapezoidal midpoint (prev + next) / 2. All arithmetic is bigint; divisions truncate.
 */

import { YieldOracleError } from '../errors/YieldOracleError.js';

import { isInitialized, type Snapshot } from './types.js';

export interface YieldWindow {
  /** weightedRateSum / totalElapsed */
  rate: bigint;
  totalElapsed: bigint;
  weightedRateSum: bigint;
  samples: number;
  fromTimestamp: number;
  toTimestamp: number;
}

export interface SnapshotSource {
  chronological(): Iterable<Snapshot>;
}

interface Accumulator {
  readonly prevRate: bigint;
  readonly prevTimestamp: number;
  readonly totalElapsed: bigint;
  readonly weightedRateSum: bigint;
  readonly samples: number;
  readonly fromTimestamp: number;
}

function seed(snapshot: Snapshot): Accumulator {
  return {
    prevRate: snapshot.rate,
    prevTimestamp: snapshot.timestamp,
    totalElapsed: 0n,
    weightedRateSum: 0n,
    samples: 1,
    fromTimestamp: snapshot.timestamp
  };
}

function fold(acc: Accumulator, snapshot: Snapshot): Accumulator {
  if (snapshot.timestamp < acc.prevTimestamp) {
    throw new YieldOracleError('InvalidTimestamp', 'Snapshots are not in chronological order', {
      prevTimestamp: acc.prevTimestamp,
      timestamp: snapshot.timestamp
    });
  }

  const elapsed = BigInt(snapshot.timestamp - acc.prevTimestamp);
  const periodAverageRate = (snapshot.rate + acc.prevRate) / 2n;

  return {
    prevRate: snapshot.rate,
    prevTimestamp: snapshot.timestamp,
    totalElapsed: acc.totalElapsed + elapsed,
    weightedRateSum: acc.weightedRateSum + periodAverageRate * elapsed,
    samples: acc.samples + 1,
    fromTimestamp: acc.fromTimestamp
  };
}

/**
 * Fold snapshots (oldest first) into a window. Empty slots are skipped, never folded.
 * @throws YieldOracleError InsufficientSamples when no time elapses across the samples
 */
export function aggregateSnapshots(snapshots: Iterable<Snapshot>): YieldWindow {
  let acc: Accumulator | undefined;

  for (const snapshot of snapshots) {
    if (!isInitialized(snapshot)) continue;
    acc = acc === undefined ? seed(snapshot) : fold(acc, snapshot);
  }

  if (acc === undefined || acc.totalElapsed === 0n) {
    throw new YieldOracleError(
      'InsufficientSamples',
      'At least two snapshots with distinct timestamps are required',
      { samples: acc?.samples ?? 0 }
    );
  }

  return {
    rate: acc.weightedRateSum / acc.totalElapsed,
    totalElapsed: acc.totalElapsed,
    weightedRateSum: acc.weightedRateSum,
    samples: acc.samples,
    fromTimestamp: acc.fromTimestamp,
    toTimestamp: acc.prevTimestamp
  };
}

export function computeYieldWindow(source: SnapshotSource): YieldWindow {
  return aggregateSnapshots(source.chronological());
}

export function computeTimeWeightedAverage(source: SnapshotSource): bigint {
  return computeYieldWindow(source).rate;
}
