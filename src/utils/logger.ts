/**
 * unlock-watch: Logging Utilities
 *
 * Structured logging using Pino with redaction of credential-looking fields.
 *
 * @module utils/logger
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/** Loggers that take their level from configuration rather than an explicit option. */
const configuredLoggers = new Set<pino.Logger>();

export function createLogger(name: string, options?: { level?: string }): pino.Logger {
  const level = options?.level ?? process.env.LOG_LEVEL ?? getConfig().logging.level;

  const opts: pino.LoggerOptions = {
    name: `unlock-watch:${name}`,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  const logger = pino(opts);
  if (options?.level === undefined) configuredLoggers.add(logger);
  return logger;
}

/**
 * Module loggers are created at import time, before a `--config` file is read.
 * Call this once the final configuration is known.
 */
export function setLogLevel(level: string): void {
  for (const logger of configuredLoggers) {
    logger.level = level;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'auth', 'credential', 'bearer'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redact<T extends Record<string, unknown>>(
  obj: T,
  additionalFields: string[] = [],
): Record<string, unknown> {
  const fieldsToRedact = [...SENSITIVE_FIELDS, ...additionalFields];
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (fieldsToRedact.some((field) => lowerKey.includes(field))) {
      result[key] = value === '' ? '' : '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redact(value, additionalFields);
    } else {
      result[key] = value;
    }
  }

  return result;
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== undefined) {
      result.code = code;
    }
    return result;
  }

  return { message: String(error) };
}
