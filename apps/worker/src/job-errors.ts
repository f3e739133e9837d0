import { UnrecoverableError } from "bullmq";
import { AppError } from "@stratarag/errors";

/**
 * Caller errors (unknown knowledge base, unreadable document, every tier
 * exhausted) fail the same way on every attempt, so BullMQ must not retry
 * them. Rate limits and outages keep their retries.
 */
export function isPermanentFailure(error: unknown): boolean {
  return AppError.isAppError(error) && error.isPermanent;
}

export function toJobError(error: unknown): unknown {
  if (AppError.isAppError(error) && error.isPermanent) {
    return new UnrecoverableError(`${error.name}: ${error.message}`);
  }
  return error;
}

export function exhaustedRetries(error: Error, attemptsMade: number, attempts: number | undefined): boolean {
  return error instanceof UnrecoverableError || attemptsMade >= (attempts ?? 1);
}
