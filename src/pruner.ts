import type { Cache } from './cache.js';
import { type Logger, silentLogger, describeError } from './logger.js';

export interface PrunerOptions {
  caches: readonly Cache<unknown>[];
  /** Milliseconds between sweeps. Defaults to 5 minutes */
  interval?: number;
  logger?: Logger;
}

export interface Pruner {
  /** Sweep every cache now. Resolves to the number of entries removed */
  runOnce(): Promise<number>;
  /** Stop the timer. Safe to call more than once */
  stop(): void;
  readonly running: boolean;
}

/**
 * Starts a periodic sweep of expired entries. The timer is unref'd so it never
 * keeps the process alive, and a sweep is skipped while the previous one is
 * still in progress.
 */
export function startPruner(options: PrunerOptions): Pruner {
  const { caches, interval = 5 * 60_000, logger = silentLogger } = options;

  if (!Number.isFinite(interval) || interval <= 0) {
    throw new Error('interval must be a positive finite number');
  }

  let sweeping = false;
  let timer: NodeJS.Timeout | undefined;

  async function runOnce(): Promise<number> {
    const counts = await Promise.all(caches.map((cache) => cache.prune()));
    return counts.reduce((sum, count) => sum + count, 0);
  }

  async function tick(): Promise<void> {
    if (sweeping) return;
    sweeping = true;
    try {
      const removed = await runOnce();
      logger.debug(`Cache pruning complete, ${removed} expired entries removed`);
    } catch (error) {
      logger.error(`Error during cache pruning: ${describeError(error)}`);
    } finally {
      sweeping = false;
    }
  }

  timer = setInterval(() => {
    void tick();
  }, interval);
  timer.unref();

  return {
    runOnce,

    stop(): void {
      if (timer) {
        clearInterval(timer);
        timer = undefined;
      }
    },

    get running(): boolean {
      return timer !== undefined;
    },
  };
}
