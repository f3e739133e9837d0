export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  RateLimitedError,
  ValidationError,
  ExternalServiceError,
} from "./errors.js";
export type { AppErrorInit } from "./errors.js";

export {
  TierUnavailableError,
  ExtractionEmptyError,
  AllTiersExhaustedError,
  SearchBackendUnavailableError,
  TimeoutError,
  CancelledError,
} from "./domain-errors.js";

export {
  createCircuitBreaker,
  isCircuitOpenError,
} from "./circuit-breaker.js";
export type { CircuitBreakerOptions, BreakerLogger } from "./circuit-breaker.js";

export { withRetry, isRetryable, calculateDelay, sleep, DEFAULT_BACKOFF_POLICY } from "./retry.js";
export type { BackoffPolicy, RetryOptions, RetryContext } from "./retry.js";

export { withTimeout } from "./timeout.js";
export type { TimeoutOptions } from "./timeout.js";
