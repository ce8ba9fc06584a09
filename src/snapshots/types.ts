export interface Snapshot {
  /** Unix seconds; 0 marks a slot that has never been written */
  readonly timestamp: number;
  /** Per-second supply rate, 18 decimals */
  readonly rate: bigint;
}

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({ timestamp: 0, rate: 0n });

export function isInitialized(snapshot: Snapshot): boolean {
  return snapshot.timestamp !== 0;
}

export interface SnapshotView {
  writeIndex: number;
  capacity: number;
  snapshots: Snapshot[];
}
