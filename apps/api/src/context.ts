import type { DeleteDocumentJobData, IngestJobData } from "@stratarag/types";
import type { JobSink } from "@stratarag/queue";
import type { PipelineServices } from "@stratarag/runtime";

export interface ApiQueues {
  ingest: JobSink<IngestJobData>;
  deleteDocument: JobSink<DeleteDocumentJobData>;
}

export interface ApiContext {
  services: PipelineServices;
  /** Needed only for `?async=true` requests. */
  queues?: ApiQueues;
}
