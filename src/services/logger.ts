import winston from 'winston';

import { config } from '../config/index.js';

type LogMetadata = Record<string, unknown>;

const logger = winston.createLogger({
  level: config.logging.level,
  silent: !config.logging.enabled,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'sandbox-fetch' },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

export function logInfo(message: string, meta?: LogMetadata): void {
  if (config.logging.enabled) logger.info(message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  if (config.logging.enabled) logger.warn(message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  if (config.logging.enabled) logger.debug(message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  if (!config.logging.enabled) return;

  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
