/**
 * Logger Utility
 * Winston-based structured logging with context support
 */

import path from 'node:path';
import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const SENSITIVE_KEYS = new Set(['password', 'token', 'authorization', 'apikey', 'api_key']);

/**
 * Replace the values of credential-bearing keys, one level deep.
 * The account password and session token must never reach a transport.
 */
export function redactSensitive(meta: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...meta };
  for (const key of Object.keys(copy)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      copy[key] = '[redacted]';
    }
  }
  return copy;
}

const redact = winston.format((info) => Object.assign(info, redactSensitive(info)));

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, service, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${service || 'ticket-sentinel'}] ${level}: ${message}${metaStr}`;
});

const logger = winston.createLogger({
  level: 'info',
  defaultMeta: { service: 'ticket-sentinel' },
  format: combine(
    redact(),
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        consoleFormat
      ),
    }),
  ],
});

/**
 * Also write JSON lines to error.log and combined.log under `dir`
 */
export function addFileTransports(dir: string): void {
  const json = combine(timestamp(), winston.format.json());

  logger.add(
    new winston.transports.File({
      filename: path.join(dir, 'error.log'),
      level: 'error',
      format: json,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(dir, 'combined.log'),
      format: json,
    })
  );
}

/**
 * Change the active level at runtime (the CLI's --log-level flag)
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Log marketplace operations with timing
 */
export function logAdapterOperation(
  adapter: string,
  operation: string,
  startTime: number,
  success: boolean,
  meta?: Record<string, unknown>
): void {
  const duration = Date.now() - startTime;
  const level = success ? 'debug' : 'warn';

  logger.log(level, `[${adapter}] ${operation}`, {
    adapter,
    operation,
    duration,
    success,
    ...meta,
  });
}

/**
 * Log alert delivery
 */
export function logAlertDelivery(
  channel: string,
  target: string,
  success: boolean,
  messageId?: string,
  error?: string
): void {
  const level = success ? 'info' : 'error';

  logger.log(level, `Alert delivery via ${channel}`, {
    channel,
    target,
    success,
    messageId,
    error,
  });
}

export { logger };
