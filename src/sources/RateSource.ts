/**
 * Rate source contract consumed by the oracle: a lending pool that reports its current
 * utilization and the per-second supply rate at a given utilization (both 18 decimals).
 */

export interface RateSource {
  readonly id: string;
  getUtilization(): Promise<bigint>;
  getSupplyRate(utilization: bigint): Promise<bigint>;
}

export type RateSourceFactory = (id: string) => RateSource;

/**
 * Resolves rate-source identifiers to RateSource instances, one instance per identifier.
 */
export class RateSourceResolver {
  private readonly cache = new Map<string, RateSource>();

  constructor(private readonly factory: RateSourceFactory) {}

  public resolve(id: string): RateSource {
    const cached = this.cache.get(id);
    if (cached) return cached;

    const source = this.factory(id);
    this.cache.set(id, source);
    return source;
  }

  public size(): number {
    return this.cache.size;
  }
}

/**
 * Current supply rate: utilization first, then the rate at that utilization
 */
export async function readSupplyRate(source: RateSource): Promise<bigint> {
  const utilization = await source.getUtilization();
  return source.getSupplyRate(utilization);
}
