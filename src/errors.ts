/**
 * Error taxonomy of the gateway. Only InvalidQueryError reaches callers;
 * the others are recovered where they are raised.
 */

/** Network or HTTP failure talking to the schedule API */
export class UpstreamUnavailableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpstreamUnavailableError';
  }

  /** Statuses worth another attempt */
  get retryable(): boolean {
    return this.statusCode === undefined || RETRYABLE_STATUSES.has(this.statusCode);
  }
}

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** JSON parse failure or unexpected body shape from the schedule API */
export class MalformedUpstreamResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedUpstreamResponseError';
  }
}

/** Cache backend read/write failure */
export class BackingStoreUnavailableError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BackingStoreUnavailableError';
  }
}

/** Caller-supplied parameters failed validation */
export class InvalidQueryError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}
