import { getLogger } from '@kernel/logger';

/**
* Retry Utilities
*
* Retry with exponential backoff and jitter. Used at startup while the
* search cluster comes up; request-time retries belong to the client.
*/

const logger = getLogger('retry');

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
* Options for retry operations
*/
export interface RetryOptions {
  /** Maximum number of retry attempts (attempts = maxRetries + 1) */
  maxRetries: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Decides whether an error is retried; every error is by default */
  shouldRetry?: (error: Error) => boolean;
  /** Callback invoked on each retry attempt */
  onRetry?: (error: Error, attempt: number) => void;
  /** Optional AbortSignal to cancel the retry loop */
  signal?: AbortSignal;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
* Error thrown when an operation is aborted via AbortSignal
*/
export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

// ============================================================================
// Helper Functions
// ============================================================================

function isRetryableError(error: Error, options: RetryOptions): boolean {
  return options.shouldRetry ? options.shouldRetry(error) : true;
}

/**
* Calculate delay with exponential backoff and ±25% jitter
* @param attempt - Current attempt number (1-based)
*/
export function calculateDelay(attempt: number, options: Pick<RetryOptions, 'initialDelayMs' | 'backoffMultiplier' | 'maxDelayMs'>): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.floor(cappedDelay + jitter);
}

/**
* Sleep for specified milliseconds, abortable via signal
*/
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError());
  if (!signal) return new Promise(resolve => setTimeout(resolve, ms));

  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timeoutId);
      reject(new AbortError());
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Retry Functions
// ============================================================================

/**
* Execute function with retry logic
* @throws The last error once retries are exhausted or the error is not retryable
*/
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) {
      throw new AbortError('Retry aborted');
    }

    try {
      return await fn();
    } catch (error: unknown) {
      if (error instanceof AbortError) {
        throw error;
      }

      const err = error instanceof Error ? error : new Error(String(error));
      const isLastAttempt = attempt > opts.maxRetries;

      if (isLastAttempt || !isRetryableError(err, opts)) {
        throw err;
      }

      const delay = calculateDelay(attempt, opts);
      logger.warn(`Retry attempt ${attempt}/${opts.maxRetries} after ${delay}ms: ${err.message}`, {
        error: err.message,
      });

      opts.onRetry?.(err, attempt);

      await wait(delay, opts.signal);
    }
  }
}
