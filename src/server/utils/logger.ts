import winston from 'winston';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Match context stored in AsyncLocalStorage so every log line written while
 * handling a match operation carries its identifiers.
 */
export interface MatchLogContext {
  matchId: string;
  participantId?: string;
  operation?: string;
}

// ============================================================================
// Match Context (AsyncLocalStorage)
// ============================================================================

export const matchContextStorage = new AsyncLocalStorage<MatchLogContext>();

/**
 * Get the current match context, or undefined outside of one.
 */
export const getMatchContext = (): MatchLogContext | undefined => {
  return matchContextStorage.getStore();
};

/**
 * Run a function within a match context. All logs written inside the
 * callback, including after awaits, include the context fields.
 */
export const runWithMatchContext = <T>(context: MatchLogContext, fn: () => T): T => {
  return matchContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /auth/i,
  /credential/i,
  /session/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Redact a sensitive string value.
 * Shows first 4 characters for debugging while hiding the rest.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

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

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!isSensitiveKey(key)) {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else if (value === null || value === undefined) {
      result[key] = value;
    } else if (typeof value === 'string') {
      result[key] = redactSensitiveString(value);
    } else if (typeof value === 'object') {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else {
      result[key] = '[REDACTED]';
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'match-engine';

const addMatchContext = winston.format((info) => {
  const context = getMatchContext();
  if (context) {
    info.matchId = info.matchId ?? context.matchId;
    if (context.participantId) {
      info.participantId = info.participantId ?? context.participantId;
    }
    if (context.operation) {
      info.operation = context.operation;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  const { level, message, timestamp, ...rest } = info;
  const masked = maskSensitiveData(rest);
  return {
    level,
    message,
    timestamp,
    ...(typeof masked === 'object' && masked !== null ? masked : {}),
  };
});

/**
 * Format for structured JSON logging (production and tests).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addMatchContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (development).
 */
const prettyFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addMatchContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, matchId, ...meta }) => {
    const matchStr = typeof matchId === 'string' ? ` [${matchId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(maskSensitiveData(meta))}` : '';
    return `${String(timestamp)} ${level}${matchStr}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : prettyFormat,
    }),
  ],
});

export { logger };
