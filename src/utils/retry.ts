import axios from 'axios';
import { AppError, CancellationError, ErrorHandler, isCancellation } from './error-handler';

/**
 * Retry utility with exponential backoff and abortable waits
 */

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000, // 1 second
  maxDelayMs: 60000, // 60 seconds max
};

export type RetryPredicate = (error: unknown, attempt: number) => boolean;
export type RetryCallback = (attempt: number, delayMs: number, error: unknown) => void;

export interface RetryOptions {
  signal?: AbortSignal;
  /** Defaults to isRetryableError. Pass `() => true` to retry every failure. */
  shouldRetry?: RetryPredicate;
  onRetry?: RetryCallback;
}

/**
 * Calculate delay with exponential backoff
 * Formula: min(baseDelay * 2^attempt, maxDelay)
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  return Math.min(exponentialDelay, config.maxDelayMs);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError('Operation cancelled', signal.reason);
  }
}

/**
 * Sleep for specified milliseconds. Rejects with CancellationError when the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancellationError('Operation cancelled', signal.reason));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError('Operation cancelled', signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN'];

/**
 * Check if an error is transient (rate limit, 5xx, timeout or network failure)
 */
export function isRetryableError(error: unknown): boolean {
  if (isCancellation(error)) {
    return false;
  }

  if (error instanceof AppError) {
    return error.isRetryable();
  }

  if (axios.isAxiosError(error)) {
    return ErrorHandler.parseAxiosError(error, { operation: 'retry' }).isRetryable();
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return RETRYABLE_NETWORK_CODES.includes(error.code);
  }

  return false;
}

/**
 * Runs an operation with bounded retries. The last error is rethrown unchanged.
 */
export class RetryManager {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    if (this.config.maxRetries < 0 || this.config.baseDelayMs < 0 || this.config.maxDelayMs < 0) {
      throw new RangeError('Retry settings must be non-negative');
    }
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }

  async executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const { signal, onRetry } = options;
    const shouldRetry = options.shouldRetry ?? isRetryableError;
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      throwIfAborted(signal);

      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;

        // Cancellation is never retried, whatever the predicate says
        if (isCancellation(error) || attempt === this.config.maxRetries || !shouldRetry(error, attempt)) {
          throw error;
        }

        const delay = calculateBackoffDelay(attempt, this.config);

        if (onRetry) {
          onRetry(attempt + 1, delay, error);
        }

        await sleep(delay, signal);
      }
    }

    throw lastError;
  }
}

/**
 * Settle with the promise, or reject with CancellationError as soon as the signal fires
 */
export function raceWithAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancellationError('Operation cancelled', signal.reason));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
