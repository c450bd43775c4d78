import { RequestError } from '@octokit/request-error';
import {
  AuthError,
  NotFoundError,
  RateLimitError,
  TimelineError,
  TransientNetworkError,
  errorMessage,
} from '../common/errors.js';

function header(error: RequestError, name: string): string | undefined {
  const value = error.response?.headers?.[name];
  return value === undefined ? undefined : String(value);
}

function isRateLimited(error: RequestError): boolean {
  if (error.status === 429) return true;
  if (error.status !== 403) return false;
  return header(error, 'x-ratelimit-remaining') === '0' || /rate limit/i.test(error.message);
}

/** Seconds until the caller may retry, from retry-after or x-ratelimit-reset */
export function retryAfterSeconds(error: RequestError, nowMs = Date.now()): number | null {
  const retryAfter = Number(header(error, 'retry-after'));
  if (Number.isFinite(retryAfter) && retryAfter > 0) return Math.ceil(retryAfter);

  const reset = Number(header(error, 'x-ratelimit-reset'));
  if (Number.isFinite(reset) && reset > 0) {
    return Math.max(0, reset - Math.floor(nowMs / 1000));
  }
  return null;
}

/**
 * Translate whatever Octokit threw into the timeline error taxonomy.
 * `subject` names the repository (or "token") in the resulting message.
 */
export function toTimelineError(error: unknown, subject: string, nowMs = Date.now()): TimelineError {
  if (error instanceof TimelineError) return error;

  if (!(error instanceof RequestError)) {
    return new TransientNetworkError(`Network error for ${subject}: ${errorMessage(error)}`);
  }

  if (isRateLimited(error)) {
    const wait = retryAfterSeconds(error, nowMs);
    const hint = wait === null ? '' : ` (retry in ${wait}s)`;
    return new RateLimitError(`GitHub rate limit reached for ${subject}${hint}`, wait);
  }

  switch (error.status) {
    case 401:
      return new AuthError(`Authentication failed for ${subject} - check your token`, 401);
    case 403:
      return new AuthError(`Access forbidden for ${subject} - check your token permissions`, 403);
    case 404:
      return new NotFoundError(`Repository ${subject} not found or private (no access)`);
    default:
      return new TransientNetworkError(
        `GitHub request for ${subject} failed: HTTP ${error.status} ${error.message}`,
        error.status,
      );
  }
}
