import type { ExtractionTier, TierFailure } from "@stratarag/types";
import { AppError } from "./app-error.js";
import type { AppErrorInit } from "./errors.js";

/** The tier's backend is unreachable, crashed, or refused the document. */
export class TierUnavailableError extends AppError {
  public readonly tier: ExtractionTier;

  constructor(tier: ExtractionTier, message: string, options?: AppErrorInit) {
    super({ message, statusCode: 503, code: "TIER_UNAVAILABLE", ...options });
    this.tier = tier;
  }
}

/** The tier ran but produced no text. */
export class ExtractionEmptyError extends AppError {
  public readonly tier: ExtractionTier;

  constructor(tier: ExtractionTier, message = "Extraction produced no text", options?: AppErrorInit) {
    super({ message, statusCode: 422, code: "EXTRACTION_EMPTY", ...options });
    this.tier = tier;
  }
}

export class AllTiersExhaustedError extends AppError {
  public readonly failures: readonly TierFailure[];

  constructor(failures: readonly TierFailure[], options?: AppErrorInit) {
    super({
      message: "all tiers failed",
      statusCode: 422,
      code: "ALL_TIERS_EXHAUSTED",
      ...options,
      details: { ...options?.details, failures: failures.map((f) => ({ ...f })) },
    });
    this.failures = failures;
  }
}

export class SearchBackendUnavailableError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string, options?: AppErrorInit) {
    super({ message, statusCode: 503, code: "SEARCH_BACKEND_UNAVAILABLE", ...options });
    this.service = service;
  }
}

export class TimeoutError extends AppError {
  public readonly service: string;
  public readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number, options?: AppErrorInit) {
    super({
      message: `${service} timed out after ${String(timeoutMs)}ms`,
      statusCode: 504,
      code: "TIMEOUT",
      ...options,
    });
    this.service = service;
    this.timeoutMs = timeoutMs;
  }
}

/** The caller gave up. Not a fault of any backend. */
export class CancelledError extends AppError {
  constructor(message = "Operation cancelled", options?: AppErrorInit) {
    super({ message, statusCode: 499, code: "CANCELLED", ...options });
  }
}
