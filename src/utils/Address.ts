/**
 * Identifier normalization for assets and rate sources.
 *
 * Both are EVM addresses; every map key and comparison uses the lowercase form.
 */

import { ZeroAddress, isAddress } from 'ethers';

import { YieldOracleError } from '../errors/YieldOracleError.js';

/**
 * Normalize an address to lowercase, rejecting malformed input and the zero address
 * @param value - Raw identifier
 * @param field - Name used in the error message
 */
export function normalizeIdentifier(value: string, field = 'identifier'): string {
  const trimmed = value.trim();
  if (!trimmed || !isAddress(trimmed)) {
    throw new YieldOracleError('InvalidAddressOrIdentifier', `Invalid ${field}`, { value });
  }

  const normalized = trimmed.toLowerCase();
  if (normalized === ZeroAddress) {
    throw new YieldOracleError('InvalidAddressOrIdentifier', `${field} must not be the zero address`, { value });
  }

  return normalized;
}

/**
 * Lowercase lookup key for reads; unlike normalizeIdentifier it never throws,
 * so an unknown or malformed asset surfaces as UnknownAsset at the registry.
 */
export function lookupKey(value: string): string {
  return value.trim().toLowerCase();
}

export function shortAddress(address: string): string {
  return address.length > 10 ? `${address.slice(0, 10)}...` : address;
}
