/**
 * AssetRegistry: append-only, duplicate-free list of base assets, each bound to a rate source
 * and owning one SnapshotRingBuffer.
 */

import { YieldOracleError } from '../errors/YieldOracleError.js';
import { SnapshotRingBuffer, DEFAULT_CAPACITY } from '../snapshots/SnapshotRingBuffer.js';
import { lookupKey, normalizeIdentifier } from '../utils/Address.js';

export interface RegistryEntry {
  asset: string;
  rateSource: string;
  /** 0-based registration order */
  position: number;
}

export interface RegistrationResult {
  asset: string;
  rateSource: string;
  /** First registration of this asset */
  created: boolean;
  /** Rate source changed (always true when created) */
  rebound: boolean;
}

export class AssetRegistry {
  private readonly assets: string[] = [];
  private readonly positions = new Map<string, number>();
  private readonly rateSources = new Map<string, string>();
  private readonly buffers = new Map<string, SnapshotRingBuffer>();

  /**
   * Register an asset or rebind its rate source. Re-registering an existing asset
   * keeps its position and its buffer.
   */
  public register(asset: string, rateSource: string): RegistrationResult {
    const assetKey = normalizeIdentifier(asset, 'asset');
    const sourceKey = normalizeIdentifier(rateSource, 'rateSource');

    const previous = this.rateSources.get(assetKey);
    const created = this.positionOf(assetKey) === undefined;

    if (created) {
      this.positions.set(assetKey, this.assets.length);
      this.assets.push(assetKey);
      this.buffers.set(assetKey, new SnapshotRingBuffer(DEFAULT_CAPACITY));
    }
    this.rateSources.set(assetKey, sourceKey);

    return {
      asset: assetKey,
      rateSource: sourceKey,
      created,
      rebound: previous !== sourceKey
    };
  }

  public positionOf(asset: string): number | undefined {
    return this.positions.get(lookupKey(asset));
  }

  public has(asset: string): boolean {
    return this.positionOf(asset) !== undefined;
  }

  /**
   * Registered assets in registration order
   */
  public list(): RegistryEntry[] {
    return this.assets.map((asset, position) => ({
      asset,
      rateSource: this.requireRateSource(asset),
      position
    }));
  }

  /**
   * @throws YieldOracleError UnknownAsset
   */
  public getEntry(asset: string): RegistryEntry {
    const key = lookupKey(asset);
    const position = this.positions.get(key);
    if (position === undefined) {
      throw new YieldOracleError('UnknownAsset', 'Asset is not registered', { asset });
    }
    return { asset: key, rateSource: this.requireRateSource(key), position };
  }

  public getRateSource(asset: string): string {
    return this.requireRateSource(lookupKey(asset));
  }

  public getBuffer(asset: string): SnapshotRingBuffer {
    const key = lookupKey(asset);
    const buffer = this.buffers.get(key);
    if (!buffer) {
      throw new YieldOracleError('UnknownAsset', 'Asset is not registered', { asset });
    }
    return buffer;
  }

  public size(): number {
    return this.assets.length;
  }

  private requireRateSource(assetKey: string): string {
    const rateSource = this.rateSources.get(assetKey);
    if (rateSource === undefined) {
      throw new YieldOracleError('UnknownAsset', 'Asset is not registered', { asset: assetKey });
    }
    return rateSource;
  }
}
