/**
 * @stratarag/logger
 *
 * Structured logging with secret redaction, plus trace sinks for per-operation events.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, isSecretKey, maskString, scrubLogFields } from "./redaction.js";
export { createLoggerTraceSink, createRecordingTraceSink, noopTraceSink } from "./trace-sink.js";
export type { RecordedTraceEvent, RecordingTraceSink } from "./trace-sink.js";
