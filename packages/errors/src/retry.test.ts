import { describe, it, expect, vi } from "vitest";
import { calculateDelay, isRetryable, sleep, withRetry } from "./retry.js";
import { AppError } from "./app-error.js";
import { RateLimitedError } from "./errors.js";
import { CancelledError } from "./domain-errors.js";

const FAST = { baseDelayMs: 1, maxDelayMs: 1, jitter: 0 };

describe("withRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { policy: FAST });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it("throws after maxAttempts", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { policy: { ...FAST, maxAttempts: 3 } })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Bad request", statusCode: 400, code: "BAD_REQUEST" }),
      );

    await expect(withRetry(fn, { policy: FAST })).rejects.toThrow("Bad request");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("does NOT retry rate limits by default", async () => {
    const fn = vi.fn().mockRejectedValue(new RateLimitedError("slow down", 2));

    await expect(withRetry(fn, { policy: FAST })).rejects.toBeInstanceOf(RateLimitedError);

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries rate limits when shouldRetry says so", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitedError("slow down", 2))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, {
      policy: FAST,
      shouldRetry: (error) => error instanceof RateLimitedError,
    });

    expect(result).toBe("ok");
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(
        new AppError({ message: "Server error", statusCode: 500, code: "INTERNAL" }),
      )
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { policy: FAST });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Server error", statusCode: 502, code: "BAD_GATEWAY" }),
      );

    await expect(
      withRetry(fn, { policy: FAST, retryableErrors: ["TIMEOUT"] }),
    ).rejects.toThrow("Server error");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("reports each retry with its delay", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    await withRetry(fn, { policy: FAST, onRetry });

    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, delayMs: 1 });
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue("ok");

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("calculateDelay", () => {
  const policy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1_000, jitter: 0.5 };

  it("doubles per attempt without jitter", () => {
    const noJitter = () => 0;
    expect(calculateDelay(0, policy, noJitter)).toBe(100);
    expect(calculateDelay(1, policy, noJitter)).toBe(200);
    expect(calculateDelay(2, policy, noJitter)).toBe(400);
  });

  it("caps at maxDelayMs", () => {
    expect(calculateDelay(10, policy, () => 0)).toBe(1_000);
  });

  it("removes at most the jitter fraction", () => {
    expect(calculateDelay(0, policy, () => 1)).toBe(50);
  });
});

describe("isRetryable", () => {
  it("never retries cancellation", () => {
    expect(isRetryable(new CancelledError())).toBe(false);
  });

  it("matches plain error codes against the filter", () => {
    const err = Object.assign(new Error("reset"), { code: "ECONNRESET" });
    expect(isRetryable(err, ["ECONNRESET"])).toBe(true);
    expect(isRetryable(err, ["ETIMEDOUT"])).toBe(false);
  });
});

describe("sleep", () => {
  it("rejects with CancelledError when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
