import pino, { type Logger as PinoLogger } from "pino";
import { CENSOR, REDACT_PATHS, scrubLogFields } from "./redaction.js";

/** Consumers type against this alias and never import pino themselves. */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" in development and "info" elsewhere. */
  level?: string;
  /** Pretty output; defaults to on in development. */
  pretty?: boolean;
  /** Attached to every line as `name`, e.g. "stratarag-api". */
  service?: string;
  /** Extra bindings for every line, e.g. `{ worker: 1 }`. */
  base?: Record<string, unknown>;
  /** Write here instead of stdout. Ignored when pretty output is on. */
  destination?: pino.DestinationStream;
}

const isDevelopment = (): boolean => process.env["NODE_ENV"] === "development";

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
};

/**
 * Root logger. JSON lines outside development; secret fields censored and
 * credentials in string fields masked.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.pretty ?? isDevelopment();

  const settings: pino.LoggerOptions = {
    level: options.level ?? (isDevelopment() ? "debug" : "info"),
    name: options.service ?? "stratarag",
    base: { pid: process.pid, ...options.base },
    redact: { paths: REDACT_PATHS, censor: CENSOR },
    formatters: { log: scrubLogFields },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino({ ...settings, transport: PRETTY_TRANSPORT });
  }
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Child logger scoped to one operation: `{ requestId }`, `{ jobId, kb }`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
