import winston from 'winston';
import path from 'path';
import { AppConfig, config } from '../config';

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in log metadata.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [/password/i, /secret/i, /token/i, /api[_-]?key/i, /credential/i];

const isSensitiveKey = (key: string): boolean =>
  SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  return maskFields(obj, maxDepth);
};

function maskFields(obj: object, maxDepth: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && value !== null && value !== undefined) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return result;
}

// ============================================================================
// Winston Logger Configuration
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  // Mask any sensitive data in the log entry
  const { level, message, timestamp, ...rest } = info;
  return {
    level,
    message,
    timestamp,
    ...maskFields(rest, 5),
  };
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create a Winston logger from a config. The module-level `logger` below is
 * built from the process config; tests and embedding hosts may build their
 * own.
 */
export function createLogger(appConfig: AppConfig): winston.Logger {
  const instance = winston.createLogger({
    level: appConfig.logging.level,
    defaultMeta: {
      service: 'rankfile',
      environment: appConfig.nodeEnv,
    },
    transports: [
      new winston.transports.Console({
        format: appConfig.logging.format === 'json' ? jsonFormat : consoleFormat,
        silent: appConfig.isTest,
      }),
    ],
  });

  if (appConfig.logging.file) {
    // File transport always uses JSON format
    instance.add(
      new winston.transports.File({
        filename: path.resolve(appConfig.logging.file),
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return instance;
}

const logger = createLogger(config);

export { logger };
