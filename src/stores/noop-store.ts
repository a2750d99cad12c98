import type { CacheStore } from '../types.js';

/**
 * A store that keeps nothing. Used when caching is disabled.
 */
export function createNoopStore<T>(): CacheStore<T> {
  return {
    async get() {
      return undefined;
    },
    async set() {},
    async delete() {
      return false;
    },
    async clear() {
      return 0;
    },
    async has() {
      return false;
    },
    async prune() {
      return 0;
    },
    size() {
      return 0;
    },
  };
}
