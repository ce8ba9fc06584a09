// Maps oracle errors to HTTP responses
import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import { YieldOracleError, type YieldOracleErrorCode } from '../errors/YieldOracleError.js';
import type { LogSink } from '../logging/logger.js';

const STATUS_BY_CODE: Record<YieldOracleErrorCode, number> = {
  UnknownAsset: 404,
  InvalidAddressOrIdentifier: 400,
  CapacityTooLarge: 400,
  InvalidArgument: 400,
  InvalidTimestamp: 409,
  InsufficientSamples: 409,
  Unauthorized: 403,
  RateSourceUnavailable: 502
};

/**
 * 4xx status attached by express middleware, e.g. body-parser's 400 for malformed JSON
 * and 413 for oversized bodies
 */
function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status: unknown = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function statusForError(err: unknown): number {
  if (err instanceof YieldOracleError) return STATUS_BY_CODE[err.code];
  if (err instanceof ZodError) return 400;
  return clientStatusOf(err) ?? 500;
}

export function buildErrorHandler(logger: LogSink) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);

    if (err instanceof YieldOracleError) {
      res.status(status).json({ error: err.code, message: err.message });
      return;
    }

    if (err instanceof ZodError) {
      res.status(status).json({ error: 'InvalidArgument', message: 'Invalid request body', issues: err.issues });
      return;
    }

    if (status < 500) {
      res.status(status).json({ error: 'InvalidArgument', message: err instanceof Error ? err.message : 'Invalid request' });
      return;
    }

    logger.error(`[api] unhandled error ${req.method} ${req.path}`, { error: err instanceof Error ? err.message : String(err) });
    res.status(status).json({ error: 'Internal', message: 'Internal server error' });
  };
}
