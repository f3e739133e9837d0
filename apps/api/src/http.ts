import type { Request, Response, NextFunction } from "express";
import type { z } from "zod";
import { ValidationError } from "@stratarag/errors";
import type { ApiSuccess } from "@stratarag/types";
import { fieldsFromZod } from "./middleware/error-handler.js";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 ignores rejected promises; route them to the error handler. */
export function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError("Invalid request body", fieldsFromZod(result.error));
  }
  return result.data;
}

export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new ValidationError("Invalid query parameters", fieldsFromZod(result.error));
  }
  return result.data;
}

export function send<T>(res: Response, status: number, data: T): void {
  const body: ApiSuccess<T> = { success: true, data };
  res.status(status).json(body);
}

export function param(req: Request, name: string): string {
  const value = req.params[name];
  if (value === undefined || value.length === 0) {
    throw new ValidationError(`Missing path parameter '${name}'`, { [name]: "required" });
  }
  return value;
}

export function flag(req: Request, name: string): boolean {
  return req.query[name] === "true";
}
