import type { TraceSink } from "@stratarag/types";
import type { Logger } from "./logger.js";

export const noopTraceSink: TraceSink = {
  event: () => undefined,
};

/** Writes every trace event as a debug line on the given logger. */
export function createLoggerTraceSink(logger: Logger): TraceSink {
  return {
    event(name, attributes) {
      logger.debug({ event: name, ...attributes }, name);
    },
  };
}

export interface RecordedTraceEvent {
  name: string;
  attributes: Record<string, unknown>;
}

export interface RecordingTraceSink extends TraceSink {
  readonly events: RecordedTraceEvent[];
  names(): string[];
}

/** Keeps events in memory; used by tests and the API's debug responses. */
export function createRecordingTraceSink(): RecordingTraceSink {
  const events: RecordedTraceEvent[] = [];
  return {
    events,
    event(name, attributes) {
      events.push({ name, attributes: { ...attributes } });
    },
    names() {
      return events.map((e) => e.name);
    },
  };
}
