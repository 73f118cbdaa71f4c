import pRetry, { AbortError, type RetryContext } from 'p-retry';
import { HttpError, errorMessage } from '../errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';

/**
 * Retry configuration for REST calls
 */
export interface RetryOptions {
  /** Maximum number of retries (default: 3) */
  retries?: number;
  /** Minimum delay in milliseconds (default: 1000) */
  minTimeout?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxTimeout?: number;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  retries: 3,
  minTimeout: 1000,
  maxTimeout: 30000,
  timeout: 30000,
};

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

const RETRYABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Determines if an error should trigger a retry
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return RETRYABLE_STATUS.has(error.status);
  }

  // Network errors surface from undici as TypeError with a coded cause
  const code = errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);
  if (code && RETRYABLE_CODES.has(code)) {
    return true;
  }

  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }

  // Request timeout fired by our AbortController
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return true;
  }

  return false;
}

function retryAfterMs(response: Response, maxTimeout: number): number | undefined {
  const retryAfter = response.headers.get('Retry-After');
  if (!retryAfter) return undefined;
  const seconds = parseInt(retryAfter, 10);
  if (isNaN(seconds) || seconds <= 0) return undefined;
  return Math.min(seconds * 1000, maxTimeout);
}

/**
 * Wraps a fetch call with retry logic, timeout, and exponential backoff.
 *
 * Retryable failures (429, 5xx, network errors, request timeouts) are retried.
 * Any other non-2xx response rejects immediately with an {@link HttpError}.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: RetryOptions = {},
  log: Logger = defaultLogger
): Promise<Response> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pRetry(
    async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), opts.timeout);

      let response: Response;
      try {
        response = await fetch(url, { ...init, signal: controller.signal });
      } catch (error) {
        if (!isRetryableError(error)) {
          throw new AbortError(error instanceof Error ? error : new Error(String(error)));
        }
        throw error;
      } finally {
        clearTimeout(timeoutId);
      }

      if (response.ok) {
        return response;
      }

      const body = await response.text().catch((err: unknown) => {
        log.debug({ err, url }, 'Could not read error response body');
        return undefined;
      });
      const httpError = new HttpError(response.status, response.statusText, body);

      if (!RETRYABLE_STATUS.has(response.status)) {
        throw new AbortError(httpError);
      }

      // Honour Retry-After on rate limiting before handing back to p-retry
      const delay = response.status === 429 ? retryAfterMs(response, opts.maxTimeout) : undefined;
      if (delay) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }

      throw httpError;
    },
    {
      retries: opts.retries,
      minTimeout: opts.minTimeout,
      maxTimeout: opts.maxTimeout,
      onFailedAttempt: (context: RetryContext) => {
        log.warn(
          {
            attempt: context.attemptNumber,
            total: context.attemptNumber + context.retriesLeft,
            isRateLimit: context.error instanceof HttpError && context.error.status === 429,
          },
          `API request failed: ${errorMessage(context.error)}`
        );
      },
    }
  );
}

export type Clock = () => number;

export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = () => Date.now();

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  sleep?: Sleep;
  /**
   * Called when a check throws. Return true to keep polling, false to rethrow.
   * Defaults to rethrowing.
   */
  onCheckError?: (error: unknown, attempt: number) => boolean;
  /** Builds the error thrown once `timeoutMs` has elapsed */
  onTimeout: (elapsedMs: number) => Error;
}

/**
 * Calls `check` every `intervalMs` until it yields a value.
 *
 * Elapsed time is measured with the injected clock before every check, so a
 * fake clock and a no-op sleep make the loop fully deterministic.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | undefined>,
  options: PollOptions
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const sleep = options.sleep ?? realSleep;
  const start = clock();

  for (let attempt = 1; ; attempt++) {
    const elapsed = clock() - start;
    if (elapsed > options.timeoutMs) {
      throw options.onTimeout(elapsed);
    }

    try {
      const value = await check(attempt);
      if (value !== undefined) {
        return value;
      }
    } catch (error) {
      if (!options.onCheckError?.(error, attempt)) {
        throw error;
      }
    }

    await sleep(options.intervalMs);
  }
}
