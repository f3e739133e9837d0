import { AppError } from "./app-error.js";
import { CancelledError } from "./domain-errors.js";

export interface BackoffPolicy {
  /** Total attempts including the first call. */
  maxAttempts: number;
  /** Delay before the first retry. */
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of each delay that is randomized away, 0..1. */
  jitter: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  jitter: 0.5,
};

export interface RetryContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  policy?: Partial<BackoffPolicy>;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Overrides the default classification entirely. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
  onRetry?: (context: RetryContext) => void;
  random?: () => number;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Client errors (4xx, rate limits included) are not retried; server errors
 * (5xx) and network errors are.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (error instanceof CancelledError) {
    return false;
  }

  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }
    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * delay = min(maxDelay, baseDelay * 2^attempt), then up to `jitter` of it removed at random.
 * `attempt` is 0 for the first retry.
 */
export function calculateDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(policy.maxDelayMs, exponentialDelay);
  const jitter = Math.min(1, Math.max(0, policy.jitter));
  return Math.floor(cappedDelay * (1 - jitter * random()));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * The function receives the 1-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const policy: BackoffPolicy = { ...DEFAULT_BACKOFF_POLICY, ...options?.policy };
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const shouldRetry =
    options?.shouldRetry ?? ((error: unknown) => isRetryable(error, options?.retryableErrors));

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options?.signal?.aborted) {
      throw new CancelledError();
    }
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        break;
      }

      const delayMs = calculateDelay(attempt - 1, policy, options?.random);
      options?.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options?.signal);
    }
  }

  throw lastError;
}
