/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Centralized logging service using Winston.
 *
 * SECURITY:
 * - Never logs the provider API key (or any other secret-looking field)
 * - Sanitizes metadata before it reaches a transport
 * =============================================================================
 */

import path from 'path';
import winston from 'winston';
import type { AppConfig } from '../../config/environment';
import { DEFAULTS } from '../../core/constants';
import { AppError } from '../../core/errors/AppError';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    // Add metadata if present (excluding sensitive fields)
    const sanitizedMeta = sanitizeLogData(meta);
    if (Object.keys(sanitizedMeta).length > 0) {
      log += ` ${JSON.stringify(sanitizedMeta)}`;
    }

    // Add stack trace for errors
    if (stack) {
      log += `\n${stack}`;
    }

    return log;
  })
);

// Sensitive fields to never log
const SENSITIVE_FIELDS = [
  'apiKey',
  'key',
  'token',
  'secret',
  'authorization',
  'password'
];

/**
 * Remove sensitive fields from log data
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    // Check if key contains sensitive field name
    const isSensitive = SENSITIVE_FIELDS.some(field =>
      key.toLowerCase().includes(field.toLowerCase())
    );

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map(item => (isPlainRecord(item) ? sanitizeLogData(item) : item));
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Console only until configureLogger() has the validated configuration
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || DEFAULTS.LOG_LEVEL,
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    })
  ]
});

export type LoggerSettings = Pick<AppConfig, 'logLevel' | 'isProduction' | 'logDir'>;

/**
 * Apply the validated level and, in production, add the file transports.
 * Safe to call more than once.
 */
export function configureLogger(settings: LoggerSettings): void {
  logger.level = settings.logLevel;

  const hasFileTransports = logger.transports.some(t => t instanceof winston.transports.File);
  if (!settings.isProduction || hasFileTransports) {
    return;
  }

  logger.add(new winston.transports.File({
    filename: path.join(settings.logDir, 'error.log'),
    level: 'error',
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
  logger.add(new winston.transports.File({
    filename: path.join(settings.logDir, 'combined.log'),
    maxsize: 5242880,
    maxFiles: 5
  }));
}

/**
 * Log an error with its structured payload (AppError) or message and stack
 */
export const logError = (message: string, error?: unknown) => {
  if (error instanceof Error) {
    const payload = error instanceof AppError
      ? { error: error.toJSON() }
      : { error: error.message };
    logger.error(message, { ...payload, stack: error.stack });
  } else {
    logger.error(message, { error });
  }
};
