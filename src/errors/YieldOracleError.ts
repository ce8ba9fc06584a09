/**
 * YieldOracleError: single error type for every local, synchronous failure of the oracle.
 * Callers branch on `code`; HTTP status mapping lives in api/errorHandler.ts.
 */

export type YieldOracleErrorCode =
  | 'UnknownAsset'
  | 'InvalidAddressOrIdentifier'
  | 'CapacityTooLarge'
  | 'InsufficientSamples'
  | 'Unauthorized'
  | 'InvalidTimestamp'
  | 'InvalidArgument'
  | 'RateSourceUnavailable';

export class YieldOracleError extends Error {
  constructor(
    public readonly code: YieldOracleErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'YieldOracleError';
  }
}

export function isYieldOracleError(err: unknown, code?: YieldOracleErrorCode): err is YieldOracleError {
  return err instanceof YieldOracleError && (code === undefined || err.code === code);
}

export function formatError(err: unknown): string {
  if (!err) return 'Unknown error';
  if (typeof err === 'string') return err;
  if (err instanceof Error) return err.message || err.toString();
  try { return JSON.stringify(err); } catch { return String(err); }
}
