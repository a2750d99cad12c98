import { z } from 'zod';
import type { CacheStore, CacheEntry } from '../types.js';
import { BackingStoreUnavailableError } from '../errors.js';
import { escapeGlob } from './glob.js';

/**
 * The slice of a Redis client the store needs. `Redis` from `@upstash/redis`
 * satisfies it; tests pass an in-process stand-in.
 */
export interface RedisClient {
  get(key: string): Promise<unknown>;
  setex(key: string, ttlSeconds: number, value: unknown): Promise<unknown>;
  keys(pattern: string): Promise<string[]>;
  del(...keys: string[]): Promise<number>;
}

export interface RedisStoreOptions<T> {
  redis: RedisClient;
  /** Validates values read back, since they cross a process boundary */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Prepended to every key. Defaults to `cache:` */
  prefix?: string;
}

const envelopeSchema = z.object({
  value: z.unknown(),
  createdAt: z.number(),
  expiresAt: z.number(),
});

const DELETE_BATCH = 500;

/**
 * Creates a Redis-backed store. Expiration is delegated to Redis (`SETEX`);
 * values are stored as the same JSON envelope the memory store keeps.
 */
export function createRedisStore<T>(options: RedisStoreOptions<T>): CacheStore<T> {
  const { redis, schema, prefix = 'cache:' } = options;

  async function call<R>(operation: string, run: () => Promise<R>): Promise<R> {
    try {
      return await run();
    } catch (error) {
      throw new BackingStoreUnavailableError(
        `Redis ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        operation,
        { cause: error }
      );
    }
  }

  function decode(raw: unknown): CacheEntry<T> | undefined {
    // @upstash/redis deserializes JSON itself; other clients hand back the string
    let data = raw;
    if (typeof raw === 'string') {
      try {
        data = JSON.parse(raw);
      } catch {
        return undefined;
      }
    }
    const envelope = envelopeSchema.safeParse(data);
    if (!envelope.success) return undefined;
    const value = schema.safeParse(envelope.data.value);
    if (!value.success) return undefined;
    return { value: value.data, createdAt: envelope.data.createdAt, expiresAt: envelope.data.expiresAt };
  }

  async function listKeys(pattern: string): Promise<string[]> {
    const keys = await call('KEYS', () => redis.keys(`${escapeGlob(prefix)}${pattern}`));
    return keys.map((key) => key.slice(prefix.length));
  }

  return {
    async get(key: string): Promise<CacheEntry<T> | undefined> {
      const raw = await call('GET', () => redis.get(`${prefix}${key}`));
      if (raw === null || raw === undefined) return undefined;
      const entry = decode(raw);
      if (!entry) {
        // Payload no longer matches the schema
        await call('DEL', () => redis.del(`${prefix}${key}`));
      }
      return entry;
    },

    async set(key: string, entry: CacheEntry<T>): Promise<void> {
      const ttlSeconds = Math.ceil((entry.expiresAt - Date.now()) / 1000);
      if (ttlSeconds > 0) {
        await call('SETEX', () => redis.setex(`${prefix}${key}`, ttlSeconds, entry));
      }
    },

    async delete(key: string, ifExpiresAt?: number): Promise<boolean> {
      // Expired entries are evicted by Redis itself
      if (ifExpiresAt !== undefined) return false;
      const removed = await call('DEL', () => redis.del(`${prefix}${key}`));
      return removed > 0;
    },

    async clear(pattern?: string): Promise<number> {
      const keys = await listKeys(pattern ?? '*');
      let removed = 0;
      for (let i = 0; i < keys.length; i += DELETE_BATCH) {
        const batch = keys.slice(i, i + DELETE_BATCH).map((key) => `${prefix}${key}`);
        removed += await call('DEL', () => redis.del(...batch));
      }
      return removed;
    },

    async has(key: string): Promise<boolean> {
      const raw = await call('GET', () => redis.get(`${prefix}${key}`));
      return raw !== null && raw !== undefined;
    },

    async prune(): Promise<number> {
      return 0;
    },

    size(): undefined {
      return undefined;
    },
  };
}
