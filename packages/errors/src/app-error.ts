export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  /** False for bugs; the API hides the message of a non-operational error. */
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Codes in the 4xx range that a later attempt may still get past. */
const TRANSIENT_CLIENT_CODES: ReadonlySet<string> = new Set(["RATE_LIMITED", "CANCELLED"]);

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({ message, statusCode, code, isOperational = true, details, cause }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * The same input fails the same way on every attempt: an unknown knowledge
   * base, an unreadable document. Rate limits and cancellations are not.
   */
  get isPermanent(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500 && !TRANSIENT_CLIENT_CODES.has(this.code);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  /** Error body of the API envelope, without the request id. */
  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}
