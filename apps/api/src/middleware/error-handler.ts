import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError, NotFoundError, RateLimitedError, ValidationError } from "@stratarag/errors";
import type { Logger } from "@stratarag/logger";
import type { ApiFailure } from "@stratarag/types";
import { getRequestId, requestLogger } from "./request-context.js";

interface HttpParseError {
  status: number;
  type: string;
  message: string;
}

/** Errors raised by express.json(): malformed JSON, oversized bodies. */
function isHttpParseError(err: unknown): err is HttpParseError {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    "type" in err &&
    typeof err.type === "string"
  );
}

export function fieldsFromZod(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[key] ??= issue.message;
  }
  return fields;
}

export function toAppError(err: unknown): AppError {
  if (AppError.isAppError(err)) {
    return err;
  }
  if (err instanceof ZodError) {
    return new ValidationError("Invalid request body", fieldsFromZod(err));
  }
  if (isHttpParseError(err) && err.status >= 400 && err.status < 500) {
    return new AppError({
      message: err.type === "entity.parse.failed" ? "Malformed JSON body" : err.message,
      statusCode: err.status,
      code: err.status === 413 ? "PAYLOAD_TOO_LARGE" : "BAD_REQUEST",
    });
  }
  return new AppError({
    message: "Internal server error",
    statusCode: 500,
    code: "INTERNAL_ERROR",
    isOperational: false,
    cause: err,
  });
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

/**
 * Maps every error to the JSON envelope and its status code. Non-operational
 * errors are logged with their stack and reported without detail.
 */
export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const error = toAppError(err);
    const log = requestLogger(req, logger);
    if (error.statusCode >= 500) {
      log.error({ err, code: error.code }, error.message);
    } else {
      log.warn({ code: error.code, status: error.statusCode }, error.message);
    }

    if (error instanceof RateLimitedError && error.retryAfter !== undefined) {
      res.setHeader("Retry-After", String(Math.ceil(error.retryAfter)));
    }

    const { code, message, details } = error.toJSON();
    const body: ApiFailure = {
      success: false,
      error: {
        code,
        message,
        requestId: getRequestId(req),
        ...(error instanceof ValidationError
          ? { details: { ...details, fields: error.fields } }
          : details
            ? { details }
            : {}),
      },
    };
    res.status(error.statusCode).json(body);
  };
}
