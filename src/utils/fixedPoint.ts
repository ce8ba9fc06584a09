/**
 * Fixed-point helpers for per-second supply rates (18 decimals)
 */

import { formatUnits } from 'ethers';

export const RATE_DECIMALS = 18;
export const RATE_SCALE = 10n ** BigInt(RATE_DECIMALS);
export const SECONDS_PER_YEAR = 31_536_000n;

/**
 * Per-second rate -> simple annual rate, same scale
 */
export function annualize(perSecondRate: bigint): bigint {
  return perSecondRate * SECONDS_PER_YEAR;
}

/**
 * Decimal string of a scaled rate, e.g. 5e16 -> "0.05"
 */
export function formatRate(rate: bigint): string {
  return formatUnits(rate, RATE_DECIMALS);
}

/**
 * Lossy conversion for gauges and logs only
 */
export function rateToNumber(rate: bigint): number {
  return Number(formatRate(rate));
}
