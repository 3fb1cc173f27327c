/**
* Retry Utilities
*
* Exponential backoff with jitter, abortable sleep and per-call timeouts used
* by the delivery pipeline.
*/

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface BackoffOptions {
  /** Delay before the first retry in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: 500,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

// ============================================================================
// Errors
// ============================================================================

/**
* Error thrown when an operation is aborted via AbortSignal
*/
export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timeout exceeded after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

// ============================================================================
// Backoff
// ============================================================================

/**
* Delay before retry number `attempt` (1-based).
* Exponential growth capped at maxDelayMs, with ±25% jitter.
*/
export function calculateDelay(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, Math.max(0, attempt - 1));
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitter = cappedDelay * 0.25 * (random() * 2 - 1);
  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
* Sleep for specified milliseconds, abortable via signal
* @throws AbortError when the signal fires first
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
// Timeout
// ============================================================================

/**
* Run an abortable operation with a deadline.
*
* The operation receives a signal that fires on timeout or when the parent
* signal fires, so transports can cancel the underlying request.
* @throws TimeoutError when the deadline passes first
*/
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(ms));
    }, ms);
  });

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

// ============================================================================
// HTTP helpers
// ============================================================================

/**
* Check if HTTP status code is retryable
*/
export function isRetryableStatus(
  status: number,
  retryableStatuses: readonly number[] = [408, 429, 500, 502, 503, 504]
): boolean {
  return retryableStatuses.includes(status) || (status >= 500 && status <= 599);
}

/**
* Parse Retry-After header value
* @param headerValue - Header value string (seconds or HTTP date)
* @returns Delay in milliseconds, 0 when absent or unparseable
*/
export function parseRetryAfter(headerValue: string | null, now: number = Date.now()): number {
  if (!headerValue) return 0;

  if (/^\d+$/.test(headerValue.trim())) {
    return parseInt(headerValue, 10) * 1000;
  }

  const date = new Date(headerValue);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return 0;
}
