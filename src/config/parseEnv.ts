/**
 * Environment variable parsers for booleans, integers, lists and asset bindings.
 * "false", "0" and "no" parse as false; unrecognized values fall back to the default.
 */

export interface AssetBinding {
  asset: string;
  rateSource: string;
}

/**
 * Parse boolean environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty/invalid
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  return defaultValue;
}

/**
 * Parse integer environment variable, clamped to [min, max] when given
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    return defaultValue;
  }

  let result = parsed;

  if (min !== undefined && result < min) {
    result = min;
  }

  if (max !== undefined && result > max) {
    result = max;
  }

  return result;
}

/**
 * Parse a comma separated list, dropping blanks
 */
export function parseListEnv(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/**
 * Parse bootstrap registrations: "asset:rateSource,asset:rateSource"
 * Entries without exactly one ':' are rejected so a typo never registers half a pair.
 */
export function parseAssetBindingsEnv(value: string | undefined): AssetBinding[] {
  return parseListEnv(value).map(entry => {
    const parts = entry.split(':').map(p => p.trim());
    const [asset, rateSource] = parts;
    if (parts.length !== 2 || !asset || !rateSource) {
      throw new Error(`Invalid ORACLE_ASSETS entry "${entry}" (expected asset:rateSource)`);
    }
    return { asset, rateSource };
  });
}
