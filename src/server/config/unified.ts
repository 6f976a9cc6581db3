/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { getEffectiveNodeEnv, LogFormatSchema, LogLevelSchema, NodeEnvSchema, parseEnv, type RawEnv } from './env';

// Load .env into process.env before we read anything from it. Skipped under
// test so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    corsOrigin: z.string().min(1),
  }),
  redis: z.object({
    url: z.string().min(1),
    password: z.string().optional(),
  }),
  matches: z.object({
    /** Expiry applied to config, state and routing keys (seconds). */
    ttlSeconds: z.number().int().positive(),
    /** Added to the remaining clock when setting the timeout key TTL. */
    timeoutKeyBufferSeconds: z.number().int().nonnegative(),
    timeoutSentinelEnabled: z.boolean(),
  }),
  metrics: z.object({
    enabled: z.boolean(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble and validate the application config from a parsed environment.
 * Exported so tests can build configs from controlled inputs.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const isProduction = nodeEnv === 'production';

  // Redis URL: required in production, defaults to local Redis elsewhere.
  let redisUrl = env.REDIS_URL?.trim() || undefined;
  if (!redisUrl && isProduction) {
    throw new Error('REDIS_URL is required when NODE_ENV=production');
  }
  redisUrl = redisUrl ?? 'redis://localhost:6379';

  return Object.freeze(
    ConfigSchema.parse({
      nodeEnv,
      isProduction,
      isTest: nodeEnv === 'test',
      app: {
        version: env.npm_package_version?.trim() || '1.0.0',
      },
      server: {
        port: env.PORT,
        host: env.HOST,
        corsOrigin: env.CORS_ORIGIN,
      },
      redis: {
        url: redisUrl,
        password: env.REDIS_PASSWORD?.trim() || undefined,
      },
      matches: {
        ttlSeconds: env.MATCH_TTL_SECONDS,
        timeoutKeyBufferSeconds: env.TIMEOUT_KEY_BUFFER_SECONDS,
        timeoutSentinelEnabled: env.ENABLE_TIMEOUT_SENTINEL,
      },
      metrics: {
        enabled: env.ENABLE_METRICS,
      },
      logging: {
        level: env.LOG_LEVEL,
        format: env.LOG_FORMAT,
      },
    })
  );
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}

export const config: AppConfig = buildConfig(envResult.data);
