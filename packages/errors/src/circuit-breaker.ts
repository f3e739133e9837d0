import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. `false` disables it. Default: 10000 */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Errors for which this returns true do not count as failures. */
  errorFilter?: (error: unknown) => boolean;
}

export interface BreakerLogger {
  warn(bindings: Record<string, unknown>, message: string): void;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions & { logger?: BreakerLogger },
): CircuitBreaker<TArgs, TResult> {
  const { logger, ...breakerOptions } = options ?? {};
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...breakerOptions, name });

  breaker.on("open", () => {
    logger?.warn({ breaker: name, state: "open" }, "circuit opened, requests short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name, state: "halfOpen" }, "circuit half-open, next request is a probe");
  });

  breaker.on("close", () => {
    logger?.warn({ breaker: name, state: "close" }, "circuit closed");
  });

  return breaker;
}

/** True for opossum's short-circuit rejection while the breaker is open. */
export function isCircuitOpenError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EOPENBREAKER";
}
