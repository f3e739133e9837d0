import { AppError } from "./app-error.js";

export interface AppErrorInit {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: AppErrorInit) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: AppErrorInit) {
    super({ message, statusCode: 409, code: "CONFLICT", ...options });
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the upstream asked us to wait, when it said. */
  public readonly retryAfter?: number;

  constructor(message = "Rate limited", retryAfter?: number, options?: AppErrorInit) {
    super({ message, statusCode: 429, code: "RATE_LIMITED", ...options });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Validation error",
    fields: Record<string, string> = {},
    options?: AppErrorInit,
  ) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: AppErrorInit) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}
