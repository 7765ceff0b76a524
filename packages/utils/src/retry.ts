/**
 * Retry logic with exponential backoff
 */
import { sleep } from './timer';

/**
 * Configuration options for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Initial delay in milliseconds before first retry (default: 100) */
  initialDelayMs: number;
  /** Maximum delay in milliseconds between retries (default: 10000) */
  maxDelayMs: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier: number;
  /** Random jitter factor to prevent thundering herd (0-1, default: 0.1) */
  jitterFactor: number;
  /** Optional function to determine if error should trigger retry */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Optional callback invoked before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: unknown; attempts: number; totalTimeMs: number };

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Preset retry profiles for exchange traffic
 */
export const RETRY_PROFILES = {
  /** Idempotent reads (book, trades, market metadata) */
  EXCHANGE_READ: {
    maxRetries: 2,
    initialDelayMs: 250,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
    jitterFactor: 0.2,
  },
  /** Redis publishing - very fast retries for in-memory operations */
  REDIS: {
    maxRetries: 2,
    initialDelayMs: 25,
    maxDelayMs: 1000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
  },
} as const satisfies Record<string, Partial<RetryConfig>>;

/**
 * Calculate delay for a specific attempt with exponential backoff and jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterFactor'>
): number {
  const { initialDelayMs, maxDelayMs, backoffMultiplier, jitterFactor } = config;

  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  // delay ± (delay * jitterFactor)
  const jitterRange = cappedDelay * jitterFactor;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Check if an error is retryable by default
 * Returns true for network errors, timeouts, and server errors
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('enotfound') ||
      message.includes('network') ||
      message.includes('socket hang up')
    ) {
      return true;
    }

    if (message.includes('timeout') || message.includes('timed out')) {
      return true;
    }

    const status = readStatus(error);
    if (status !== undefined) {
      return isRetryableStatusCode(status);
    }
  }

  return false;
}

/**
 * Check if an HTTP status code is retryable
 */
export function isRetryableStatusCode(status: number): boolean {
  if (status === 429) return true;
  if (status >= 500 && status < 600) return true;
  return false;
}

/**
 * Execute an async function with exponential backoff retry logic
 *
 * @example
 * ```typescript
 * const result = await retryWithBackoff(
 *   () => client.getOpenOrders({ market, asset_id }),
 *   RETRY_PROFILES.EXCHANGE_READ
 * );
 *
 * if (result.success) {
 *   console.log('Orders:', result.data);
 * } else {
 *   console.error('Failed after', result.attempts, 'attempts:', result.error);
 * }
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<RetryResult<T>> {
  const mergedConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const { maxRetries, shouldRetry, onRetry } = mergedConfig;

  const startTime = Date.now();
  let lastError: unknown;
  let attemptsMade = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    attemptsMade = attempt + 1;
    try {
      const data = await fn();
      return {
        success: true,
        data,
        attempts: attemptsMade,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries) {
        break;
      }

      const errorIsRetryable = shouldRetry
        ? shouldRetry(error, attempt)
        : isRetryableError(error);

      if (!errorIsRetryable) {
        break;
      }

      const delayMs = calculateBackoffDelay(attempt, mergedConfig);
      onRetry?.(error, attempt + 1, delayMs);

      await sleep(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: attemptsMade,
    totalTimeMs: Date.now() - startTime,
  };
}

/**
 * Execute an async function with retry, throwing the last error on final failure
 */
export async function retry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const result = await retryWithBackoff(fn, config);

  if (result.success) {
    return result.data;
  }

  throw result.error;
}
