import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { createChildLogger } from "@stratarag/logger";
import type { Logger } from "@stratarag/logger";

// Extend Express Request with the request id and its child logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      logger?: Logger;
    }
  }
}

export const REQUEST_ID_HEADER = "x-request-id";
const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

export function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}

export function requestLogger(req: Request, fallback: Logger): Logger {
  return req.logger ?? fallback;
}

/**
 * Assigns a request id (reusing a well-formed `x-request-id` from the caller),
 * attaches a child logger, and logs each completed request.
 */
export function createRequestContextMiddleware(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && ACCEPTED_REQUEST_ID.test(incoming) ? incoming : randomUUID();
    const child = createChildLogger(logger, { requestId });

    req.requestId = requestId;
    req.logger = child;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const started = performance.now();
    res.on("finish", () => {
      child.info(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Math.round(performance.now() - started),
        },
        "request completed",
      );
    });
    next();
  };
}
