/**
 * SnapshotRingBuffer: fixed-capacity circular store of (timestamp, rate) samples for one asset.
 *
 * writeIndex always points at the oldest slot, i.e. the next one to be overwritten.
 * Capacity only grows; new slots are appended at the end, so existing indices never move.
 */

import { YieldOracleError } from '../errors/YieldOracleError.js';

import { EMPTY_SNAPSHOT, isInitialized, type Snapshot, type SnapshotView } from './types.js';

export const DEFAULT_CAPACITY = 5;
export const MAX_CAPACITY = 15;

function assertCapacityCeiling(capacity: number): void {
  if (!Number.isInteger(capacity)) {
    throw new YieldOracleError('InvalidArgument', 'Capacity must be an integer', { capacity });
  }
  if (capacity > MAX_CAPACITY) {
    throw new YieldOracleError('CapacityTooLarge', `Capacity exceeds maximum of ${MAX_CAPACITY}`, {
      capacity,
      max: MAX_CAPACITY
    });
  }
}

export class SnapshotRingBuffer {
  private readonly slots: Snapshot[];
  private writeIndex = 0;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    assertCapacityCeiling(capacity);
    if (capacity < 1) {
      throw new YieldOracleError('InvalidArgument', 'Capacity must be a positive integer', { capacity });
    }
    this.slots = Array.from({ length: capacity }, () => EMPTY_SNAPSHOT);
  }

  /**
   * Overwrite the oldest slot with a new sample and advance the cursor.
   * `now` must be positive (0 is the empty-slot marker) and not older than the newest sample.
   */
  public latch(rate: bigint, now: number): Snapshot {
    if (!Number.isSafeInteger(now) || now <= 0) {
      throw new YieldOracleError('InvalidTimestamp', 'Snapshot timestamp must be a positive integer', { now });
    }
    if (rate < 0n) {
      throw new YieldOracleError('InvalidArgument', 'Rate must be non-negative', { rate: rate.toString() });
    }

    const newest = this.getNewest();
    if (newest && now < newest.timestamp) {
      throw new YieldOracleError('InvalidTimestamp', 'Snapshot timestamp precedes newest snapshot', {
        now,
        newest: newest.timestamp
      });
    }

    const snapshot: Snapshot = Object.freeze({ timestamp: now, rate });
    this.slots[this.writeIndex] = snapshot;
    this.writeIndex = (this.writeIndex + 1) % this.slots.length;
    return snapshot;
  }

  /**
   * Grow to newCapacity. Requests at or below the current capacity, zero and negatives
   * included, are ignored.
   * @returns The capacity in effect after the call
   */
  public resize(newCapacity: number): number {
    assertCapacityCeiling(newCapacity);

    const current = this.slots.length;
    if (newCapacity <= current) {
      return current;
    }

    for (let i = current; i < newCapacity; i++) {
      this.slots.push(EMPTY_SNAPSHOT);
    }
    return this.slots.length;
  }

  /**
   * Populated snapshots, oldest first.
   *
   * Forward segment [writeIndex, capacity) then wrap segment [0, writeIndex); each
   * segment stops at its first empty slot. After growing a fully wrapped buffer the
   * cursor can sit on an appended empty slot, in which case only the wrap segment yields.
   */
  public *chronological(): IterableIterator<Snapshot> {
    for (let i = this.writeIndex; i < this.slots.length; i++) {
      const snapshot = this.slots[i];
      if (!isInitialized(snapshot)) break;
      yield snapshot;
    }
    for (let i = 0; i < this.writeIndex; i++) {
      const snapshot = this.slots[i];
      if (!isInitialized(snapshot)) break;
      yield snapshot;
    }
  }

  public getNewest(): Snapshot | undefined {
    let newest: Snapshot | undefined;
    for (const snapshot of this.chronological()) {
      newest = snapshot;
    }
    return newest;
  }

  public populatedCount(): number {
    return this.slots.filter(isInitialized).length;
  }

  public getCapacity(): number {
    return this.slots.length;
  }

  public getWriteIndex(): number {
    return this.writeIndex;
  }

  /**
   * Raw slots in storage order (not chronological)
   */
  public getSlots(): Snapshot[] {
    return [...this.slots];
  }

  public toView(): SnapshotView {
    return {
      writeIndex: this.writeIndex,
      capacity: this.slots.length,
      snapshots: this.getSlots()
    };
  }
}
