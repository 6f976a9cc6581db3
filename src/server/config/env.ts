/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables read by
 * the match server. Defaults live here; cross-field rules (e.g. Redis URL
 * required in production) live in `unified.ts`.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/** Unset means enabled; "false" and "0" disable. */
const enabledByDefault = z
  .string()
  .optional()
  .transform((val) => (val === undefined ? true : val !== 'false' && val !== '0'));

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP port for health and metrics endpoints */
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  /** Server bind address */
  HOST: z.string().default('0.0.0.0'),

  /** Origin allowed to open Socket.IO connections */
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // ===================================================================
  // REDIS
  // ===================================================================

  /** Redis connection URL (required in production) */
  REDIS_URL: z.string().optional(),

  /** Redis authentication password */
  REDIS_PASSWORD: z.string().optional(),

  // ===================================================================
  // MATCHES
  // ===================================================================

  /** Upper bound on the lifetime of match documents (seconds) */
  MATCH_TTL_SECONDS: z.coerce.number().int().positive().default(7200),

  /** Slack added to the timeout key TTL so it fires after the clock runs out */
  TIMEOUT_KEY_BUFFER_SECONDS: z.coerce.number().int().nonnegative().default(1),

  /** Run the key-expiry timeout detector in this process */
  ENABLE_TIMEOUT_SENTINEL: enabledByDefault,

  // ===================================================================
  // LOGGING & METRICS
  // ===================================================================

  /** Minimum log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Expose Prometheus metrics on /metrics */
  ENABLE_METRICS: enabledByDefault,

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];
    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isProductionLike(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production' || nodeEnv === 'staging';
}
