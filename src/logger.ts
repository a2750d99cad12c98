export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger with a tag and a minimum level.
 */
export function createConsoleLogger(level: LogLevel = 'info', tag = 'ruz-cache'): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (threshold <= LEVEL_ORDER.debug) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (threshold <= LEVEL_ORDER.info) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (threshold <= LEVEL_ORDER.warn) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (threshold <= LEVEL_ORDER.error) console.error(prefix, message, ...details);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
