import { CancelledError, TimeoutError } from "./domain-errors.js";

export interface TimeoutOptions {
  timeoutMs: number;
  /** Name used in the TimeoutError, e.g. "qdrant" or "tier:premium". */
  service: string;
  /** Caller's signal; aborting it cancels the operation. */
  signal?: AbortSignal;
}

/**
 * Run `operation` with a derived AbortSignal that fires on timeout or when the
 * caller's signal aborts. The returned promise settles as soon as either
 * happens, even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, service, signal }: TimeoutOptions,
): Promise<T> {
  if (signal?.aborted) {
    throw new CancelledError();
  }

  const controller = new AbortController();
  let rejectAbort: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAbort = reject;
  });

  const onParentAbort = (): void => {
    const error = new CancelledError();
    controller.abort(error);
    rejectAbort(error);
  };
  signal?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(() => {
    const error = new TimeoutError(service, timeoutMs);
    controller.abort(error);
    rejectAbort(error);
  }, timeoutMs);

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onParentAbort);
  }
}
