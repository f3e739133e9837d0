/**
 * Receives structured events from long-running operations. Passed per call,
 * so two concurrent operations can report to different sinks.
 */
export interface TraceSink {
  event(name: string, attributes?: Record<string, unknown>): void;
}
