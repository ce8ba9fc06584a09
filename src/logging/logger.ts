import { mkdirSync } from 'fs';
import { join } from 'path';

import { createLogger, format, transports, type Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

import { config } from '../config/index.js';

/**
 * Minimal logging surface the services depend on; a winston Logger satisfies it,
 * and tests pass vi.fn() stubs.
 */
export interface LogSink {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface AppLoggerOptions {
  level?: string;
  fileEnabled?: boolean;
  retentionHours?: number;
  logsDir?: string;
}

/**
 * winston-daily-rotate-file supports 'Nh' and 'Nd'; use hours below a day
 */
export function retentionSpec(retentionHours: number): string {
  return retentionHours >= 24
    ? `${Math.floor(retentionHours / 24)}d`
    : `${retentionHours}h`;
}

function createFileTransport(logsDir: string, retentionHours: number): DailyRotateFile {
  mkdirSync(logsDir, { recursive: true });

  return new DailyRotateFile({
    filename: join(logsDir, 'oracle-%DATE%.log'),
    datePattern: 'YYYY-MM-DD-HH', // Hourly rotation
    maxSize: '50m',
    maxFiles: retentionSpec(retentionHours),
    format: format.combine(
      format.timestamp(),
      format.json()
    ),
    auditFile: join(logsDir, '.audit.json')
  });
}

export function createAppLogger(options: AppLoggerOptions = {}): Logger {
  const fileTransports = options.fileEnabled
    ? [createFileTransport(options.logsDir ?? join(process.cwd(), 'logs'), options.retentionHours ?? 24)]
    : [];

  return createLogger({
    level: options.level ?? 'info',
    format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
    transports: [new transports.Console(), ...fileTransports]
  });
}

export const logger = createAppLogger({
  level: config.logLevel,
  fileEnabled: config.logFileEnabled,
  retentionHours: config.logFileRetentionHours
});
