/**
 * Structured Logger
 *
 * Production-safe structured logging with correlation IDs and sensitive data redaction.
 *
 * Key behaviors:
 * - All logs include: level, msg, timestamp, requestId (if available), userId (if available)
 * - Automatic redaction of credentials, tokens, secrets, passwords
 * - JSON output for production log aggregation
 * - Human-readable output for development
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info('Quote created', { quoteId: 'q-1', userId: 'u-1' });
 *   logger.error('Notification failed', { error, quoteId: 'q-1' });
 */

import type { Request } from 'express';
import type { Identity } from '../shared/types';
import './middleware/requestContext';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  userId?: string;
  [key: string]: unknown;
}

export interface ScopedLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const LOG_LEVEL = process.env.LOG_LEVEL || (IS_PRODUCTION ? 'info' : 'debug');

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sensitive field patterns that should be redacted from logs
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /bearer/i,
  /api[_-]?key/i,
  /credential/i,
  /private[_-]?key/i,
];

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Redact sensitive fields from objects before logging
 */
export function redactSensitiveData(value: unknown, depth: number = 0): unknown {
  if (depth > 5) return '[max depth]';

  if (value === null || value === undefined) return value;

  if (typeof value !== 'object') return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: IS_PRODUCTION ? undefined : value.stack,
    };
  }

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map(item => redactSensitiveData(item, depth + 1));
  }

  const redacted: Record<string, unknown> = {};

  for (const [key, entry] of Object.entries(value)) {
    const isSensitive = SENSITIVE_PATTERNS.some(pattern => pattern.test(key));

    if (isSensitive) {
      redacted[key] = '[REDACTED]';
    } else if (entry && typeof entry === 'object') {
      redacted[key] = redactSensitiveData(entry, depth + 1);
    } else {
      redacted[key] = entry;
    }
  }

  return redacted;
}

/**
 * Extract correlation context from Express request
 */
function extractRequestContext(req?: Request): LogContext {
  if (!req) return {};

  return {
    requestId: req.requestId,
    userId: req.identity?.id,
  };
}

/**
 * Format log entry for output
 */
function formatLog(level: LogLevel, message: string, context: LogContext): string {
  const timestamp = new Date().toISOString();
  const safeContext = redactSensitiveData(context);

  if (IS_PRODUCTION) {
    // JSON output for log aggregation
    const fields = safeContext && typeof safeContext === 'object' ? safeContext : {};
    return JSON.stringify({ level, msg: message, timestamp, ...fields });
  }

  // Human-readable output for development
  const contextStr = Object.keys(context).length > 0
    ? ' ' + JSON.stringify(safeContext)
    : '';
  return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
}

/**
 * Check if log level should be emitted
 */
function shouldLog(level: LogLevel): boolean {
  const configuredPriority = isLogLevel(LOG_LEVEL) ? LEVEL_PRIORITY[LOG_LEVEL] : LEVEL_PRIORITY.info;
  return LEVEL_PRIORITY[level] >= configuredPriority;
}

/**
 * Core logging function
 */
function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (!shouldLog(level)) return;

  const output = formatLog(level, message, context);

  if (level === 'error') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

function scoped(baseContext: LogContext): ScopedLogger {
  return {
    debug: (message, context = {}) => log('debug', message, { ...baseContext, ...context }),
    info: (message, context = {}) => log('info', message, { ...baseContext, ...context }),
    warn: (message, context = {}) => log('warn', message, { ...baseContext, ...context }),
    error: (message, context = {}) => log('error', message, { ...baseContext, ...context }),
  };
}

/**
 * Structured logger instance
 */
export const logger = {
  /**
   * Debug-level logging (verbose, development-only by default)
   */
  debug(message: string, context: LogContext = {}): void {
    log('debug', message, context);
  },

  /**
   * Info-level logging (normal operations)
   */
  info(message: string, context: LogContext = {}): void {
    log('info', message, context);
  },

  /**
   * Warning-level logging (unexpected but handled)
   */
  warn(message: string, context: LogContext = {}): void {
    log('warn', message, context);
  },

  /**
   * Error-level logging (failures requiring attention)
   */
  error(message: string, context: LogContext = {}): void {
    log('error', message, context);
  },

  /**
   * Child logger with request context pre-attached.
   * Use this at route entry points to avoid repeating context.
   */
  withRequest(req: Request): ScopedLogger {
    return scoped(extractRequestContext(req));
  },

  /**
   * Child logger carrying the acting identity, for service-layer calls
   */
  withIdentity(identity: Pick<Identity, 'id' | 'role' | 'email'>): ScopedLogger {
    return scoped({ userId: identity.id, role: identity.role, email: identity.email });
  },
};

/**
 * Helper to log errors with full context
 */
export function logError(error: unknown, context: LogContext = {}): void {
  if (error instanceof Error) {
    logger.error(error.message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: IS_PRODUCTION ? undefined : error.stack,
      },
    });
  } else {
    logger.error('Unknown error', {
      ...context,
      error: String(error),
    });
  }
}
