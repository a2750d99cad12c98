import type { Cache } from './cache.js';
import { groupPattern, selectorPattern } from './cache-keys.js';
import { type Logger, silentLogger } from './logger.js';

export interface InvalidationControllerOptions {
  caches: readonly Cache<unknown>[];
  /** Entries cached under the `default` selector belong to this group */
  defaultGroupId: number;
  logger?: Logger;
}

export interface InvalidationController {
  /** Clear every managed cache and reset its counters */
  clearAll(): Promise<void>;
  /** Remove every entry built for one group, returning how many went */
  clearByGroup(groupId: number): Promise<number>;
  /** Remove every entry built for one lecturer, returning how many went */
  clearByLecturer(personId: number): Promise<number>;
}

export function createInvalidationController(options: InvalidationControllerOptions): InvalidationController {
  const { caches, defaultGroupId, logger = silentLogger } = options;

  async function clearPatterns(patterns: string[]): Promise<number> {
    const counts = await Promise.all(
      caches.flatMap((cache) => patterns.map((pattern) => cache.invalidate(pattern)))
    );
    return counts.reduce((sum, count) => sum + count, 0);
  }

  return {
    async clearAll(): Promise<void> {
      await Promise.all(caches.map((cache) => cache.clear()));
      logger.info(`Cleared ${caches.length} caches`);
    },

    async clearByGroup(groupId: number): Promise<number> {
      const patterns = [groupPattern(groupId)];
      if (groupId === defaultGroupId) {
        patterns.push(selectorPattern({ kind: 'default' }));
      }
      const removed = await clearPatterns(patterns);
      logger.info(`Invalidated ${removed} entries for group ${groupId}`);
      return removed;
    },

    async clearByLecturer(personId: number): Promise<number> {
      const removed = await clearPatterns([selectorPattern({ kind: 'person', personId })]);
      logger.info(`Invalidated ${removed} entries for lecturer ${personId}`);
      return removed;
    },
  };
}
