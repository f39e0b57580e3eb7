/**
 * Winston-based logging for the file boundary.
 */

import winston from 'winston';
import { DEFAULT_SETTINGS, type LoggingSettings } from './config';

const { combine, timestamp, printf, errors } = winston.format;

export interface LogMetadata {
  operation?: string;
  filePath?: string;
  kind?: string;
  duration?: number;
  [key: string]: unknown;
}

const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const stackTrace = stack ? `\n${String(stack)}` : '';
  return `${String(timestamp)} [${level}] ${String(message)}${meta}${stackTrace}`;
});

const baseLogger = winston.createLogger({
  level: DEFAULT_SETTINGS.logging.level,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    logFormat,
  ),
  defaultMeta: { service: 'kicad-sexpr' },
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
});

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

export function createLogger(defaultMetadata: LogMetadata = {}): Logger {
  return {
    debug(message, metadata) {
      baseLogger.debug(message, { ...defaultMetadata, ...metadata });
    },
    info(message, metadata) {
      baseLogger.info(message, { ...defaultMetadata, ...metadata });
    },
    warn(message, metadata) {
      baseLogger.warn(message, { ...defaultMetadata, ...metadata });
    },
    error(message, error, metadata) {
      baseLogger.error(message, {
        ...defaultMetadata,
        ...metadata,
        error: error ? { name: error.name, message: error.message } : undefined,
        stack: error?.stack,
      });
    },
    child(childMetadata) {
      return createLogger({ ...defaultMetadata, ...childMetadata });
    },
  };
}

export function configureLogging(settings: Partial<LoggingSettings>): void {
  if (settings.level) baseLogger.level = settings.level;
}

export const logger = createLogger();
