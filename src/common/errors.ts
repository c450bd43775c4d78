export type TimelineErrorCode =
  | 'PARSE'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'RATE_LIMIT'
  | 'NETWORK'
  | 'DUPLICATE'
  | 'INVALID_RANGE';

/**
 * Base for every failure the timeline core reports. Each one is local to
 * the operation that raised it; the session state is left as it was.
 */
export abstract class TimelineError extends Error {
  abstract readonly code: TimelineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed repository URL, raised before any network call */
export class ParseError extends TimelineError {
  readonly code = 'PARSE' as const;
}

export class AuthError extends TimelineError {
  readonly code = 'UNAUTHORIZED' as const;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class NotFoundError extends TimelineError {
  readonly code = 'NOT_FOUND' as const;
}

export class RateLimitError extends TimelineError {
  readonly code = 'RATE_LIMIT' as const;

  constructor(
    message: string,
    readonly retryAfterSeconds: number | null,
  ) {
    super(message);
  }
}

export class TransientNetworkError extends TimelineError {
  readonly code = 'NETWORK' as const;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class DuplicateError extends TimelineError {
  readonly code = 'DUPLICATE' as const;
}

export class InvalidDateRangeError extends TimelineError {
  readonly code = 'INVALID_RANGE' as const;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
