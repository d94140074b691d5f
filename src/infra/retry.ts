/**
 * Retry Infrastructure - Exponential backoff with jitter
 *
 * Used by archive clients only. The report pipeline itself never retries:
 * a fetch that still fails after the client's attempts is a fetch failure.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts, first one included (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0.1 = +/-10%) */
  jitter?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Decides whether a failed attempt is worth repeating */
  retryPredicate?: (error: Error, attempt: number) => boolean;
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: Error;
  willRetry: boolean;
}

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * A transient/network error (timeouts, 429, 5xx). Retryable.
 */
export class TransientError extends Error {
  readonly retryable = true;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'TransientError';
    this.statusCode = statusCode;
  }
}

/**
 * An error that should NOT be retried (auth failures, 404, bad payloads).
 */
export class NonRetryableError extends Error {
  readonly retryable = false;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'NonRetryableError';
    this.statusCode = statusCode;
  }
}

// =============================================================================
// TRANSIENT ERROR DETECTION
// =============================================================================

const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'socket hang up',
  'network error',
  'fetch failed',
  'timed out',
];

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 504);
}

export function isTransientError(err: Error): boolean {
  if (err instanceof TransientError) return true;
  if (err instanceof NonRetryableError) return false;

  if (err.name === 'AbortError' || err.name === 'TimeoutError') {
    return true;
  }

  const message = err.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => message.includes(p));
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>,
): number {
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);

  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;

  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// withRetry
// =============================================================================

/**
 * Execute a function, repeating it on transient errors.
 *
 * @example
 * ```ts
 * const page = await withRetry(() => fetchPage(1), { maxAttempts: 3 });
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0.1,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    onRetry,
  } = options;

  let lastError: Error = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < maxAttempts && retryPredicate(lastError, attempt);
      const delay = calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      onRetry?.({ attempt, maxAttempts, delay, error: lastError, willRetry });

      logger.debug(
        { attempt, maxAttempts, delay, willRetry, error: lastError.message },
        'Retry attempt',
      );

      if (!willRetry) break;
      await sleep(delay);
    }
  }

  throw lastError;
}
