import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from './logger.js';

export type CacheBackend = 'memory' | 'redis';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  upstream: {
    baseUrl: string;
    defaultGroupId: number;
    language: number;
    timeout: number;
    maxAttempts: number;
    backoff: number;
  };
  cache: {
    backend: CacheBackend;
    maxEntries: number;
    pruneInterval: number;
    keyPrefix: string;
    ttl: {
      schedule: number;
      filters: number;
      lessons: number;
      search: number;
    };
    redis?: {
      url: string;
      token: string;
    };
  };
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(public readonly errors: ConfigValidationError[]) {
    super(`Configuration validation failed: ${errors.map((e) => `${e.field}: ${e.message}`).join(', ')}`);
    this.name = 'ConfigError';
  }
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    RUZ_BASE_URL: z.string().url().default('https://ruz.fa.ru/api'),
    RUZ_DEFAULT_GROUP_ID: z.coerce.number().int().nonnegative().default(154479),
    RUZ_LANGUAGE: positiveInt.default(3),
    RUZ_TIMEOUT_MS: positiveInt.default(10_000),
    RUZ_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    RUZ_BACKOFF_MS: z.coerce.number().int().nonnegative().default(100),
    CACHE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
    CACHE_MAX_ENTRIES: positiveInt.default(1000),
    CACHE_PRUNE_INTERVAL_MS: positiveInt.default(5 * 60_000),
    CACHE_KEY_PREFIX: z.string().default('ruz:'),
    SCHEDULE_TTL_MS: positiveInt.default(30 * 60_000),
    FILTER_TTL_MS: positiveInt.default(30 * 60_000),
    LESSONS_TTL_MS: positiveInt.default(30 * 60_000),
    SEARCH_TTL_MS: positiveInt.default(10 * 60_000),
    UPSTASH_REDIS_REST_URL: z.string().url().optional(),
    UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.CACHE_BACKEND !== 'redis') return;
    if (!env.UPSTASH_REDIS_REST_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPSTASH_REDIS_REST_URL'],
        message: 'required when CACHE_BACKEND is redis',
      });
    }
    if (!env.UPSTASH_REDIS_REST_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPSTASH_REDIS_REST_TOKEN'],
        message: 'required when CACHE_BACKEND is redis',
      });
    }
  });

/**
 * Read `KEY=value` pairs from a dotenv file. A missing file yields nothing.
 */
export function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  return parse(readFileSync(path));
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  /** Dotenv file consulted for variables missing from `env` */
  envFile?: string;
}

/**
 * Build the application config from the environment, with values from the
 * dotenv file filling gaps. Empty variables count as unset.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const { env = process.env, envFile } = options;

  const merged: Record<string, string> = envFile ? readEnvFile(envFile) : {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) merged[name] = value;
  }
  for (const [name, value] of Object.entries(merged)) {
    if (value.trim() === '') delete merged[name];
  }

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ field: issue.path.join('.') || 'env', message: issue.message }))
    );
  }
  const vars = parsed.data;

  const config: AppConfig = {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    upstream: {
      baseUrl: vars.RUZ_BASE_URL,
      defaultGroupId: vars.RUZ_DEFAULT_GROUP_ID,
      language: vars.RUZ_LANGUAGE,
      timeout: vars.RUZ_TIMEOUT_MS,
      maxAttempts: vars.RUZ_MAX_ATTEMPTS,
      backoff: vars.RUZ_BACKOFF_MS,
    },
    cache: {
      backend: vars.CACHE_BACKEND,
      maxEntries: vars.CACHE_MAX_ENTRIES,
      pruneInterval: vars.CACHE_PRUNE_INTERVAL_MS,
      keyPrefix: vars.CACHE_KEY_PREFIX,
      ttl: {
        schedule: vars.SCHEDULE_TTL_MS,
        filters: vars.FILTER_TTL_MS,
        lessons: vars.LESSONS_TTL_MS,
        search: vars.SEARCH_TTL_MS,
      },
    },
  };

  if (vars.UPSTASH_REDIS_REST_URL && vars.UPSTASH_REDIS_REST_TOKEN) {
    config.cache.redis = { url: vars.UPSTASH_REDIS_REST_URL, token: vars.UPSTASH_REDIS_REST_TOKEN };
  }

  return config;
}
