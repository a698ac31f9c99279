import path from 'node:path';

import winston from 'winston';

import { config } from '../config/index.js';
import { RESPONSE_LIMITS, SERVICE_NAME } from '../config/constants.js';

import { redactUrl, truncateText } from '../utils/sanitizer.js';

import { getClientKey, getRequestId } from './context.js';

const URL_FIELDS = ['url', 'target', 'targetUrl'] as const;

/**
 * Strips anything that could carry a full untrusted URL or an oversized
 * free-text value out of log metadata.
 */
export function redactLogMeta(
  meta: Record<string, unknown>
): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...meta };

  for (const field of URL_FIELDS) {
    const value = redacted[field];
    if (value === undefined) continue;
    redacted[field] = typeof value === 'string' ? redactUrl(value) : '[REDACTED]';
  }

  const { userAgent } = redacted;
  if (typeof userAgent === 'string') {
    redacted.userAgent = truncateText(
      userAgent,
      RESPONSE_LIMITS.maxLoggedUserAgent
    );
  }

  return redacted;
}

const redactFormat = winston.format((info) => {
  const redacted = redactLogMeta(info);
  for (const [key, value] of Object.entries(redacted)) {
    info[key] = value;
  }
  info.requestId ??= getRequestId();
  info.clientKey ??= getClientKey();
  return info;
});

type LogTransport =
  | InstanceType<typeof winston.transports.Console>
  | InstanceType<typeof winston.transports.File>;

function buildTransports(): LogTransport[] {
  const transports: LogTransport[] = [
    new winston.transports.Console({
      format:
        process.env.NODE_ENV === 'production'
          ? winston.format.json()
          : winston.format.combine(
              winston.format.colorize(),
              winston.format.simple()
            ),
    }),
  ];

  const logsDir = config.logging.directory;
  if (logsDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log'),
        maxsize: 5242880,
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        maxsize: 5242880,
        maxFiles: 5,
      })
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: config.logging.level,
  silent: !config.logging.enabled,
  format: winston.format.combine(
    redactFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: SERVICE_NAME },
  transports: buildTransports(),
});

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  const errorMeta =
    error instanceof Error
      ? { error: error.message, errorName: error.name, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
