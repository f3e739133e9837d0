import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import type { AnyJobData, DeleteDocumentJobData, IngestJobData } from "@stratarag/types";
import { QUEUE_NAMES, moveToDeadLetter } from "@stratarag/queue";
import type { DeadLetterJobData, JobSink } from "@stratarag/queue";
import type { PipelineServices } from "@stratarag/runtime";
import { exhaustedRetries } from "./job-errors.js";
import { processIngest } from "./processors/ingest.js";
import { processDeleteDocument } from "./processors/delete.js";

export type FailedJob<T> = Pick<Job<T>, "id" | "data" | "attemptsMade" | "opts">;

export interface WorkerOptions {
  connection: ConnectionOptions;
  services: PipelineServices;
  deadLetter: JobSink<DeadLetterJobData>;
  ingestConcurrency?: number;
  deleteConcurrency?: number;
}

/**
 * Parks jobs that will not run again on the dead-letter queue. Failures to
 * park are logged; the job itself has already failed.
 */
export function createFailureHandler<T extends AnyJobData>(queueName: string, options: WorkerOptions) {
  const { logger } = options.services;
  return (job: FailedJob<T> | undefined, error: Error): void => {
    if (!job) {
      logger.error({ queue: queueName, err: error }, "job failed without a job record");
      return;
    }
    const log = logger.child({ queue: queueName, jobId: job.id, attempt: job.attemptsMade });
    if (!exhaustedRetries(error, job.attemptsMade, job.opts.attempts)) {
      log.warn({ err: error }, "job failed, will retry");
      return;
    }
    log.error({ err: error }, "job failed permanently, moving to dead-letter queue");
    moveToDeadLetter(options.deadLetter, queueName, job.data, error, job.attemptsMade).catch((err: unknown) => {
      log.error({ err }, "could not write dead-letter entry");
    });
  };
}

export function createWorkers(options: WorkerOptions): Worker[] {
  const { connection, services } = options;

  const ingestWorker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    async (job) => {
      const result = await processIngest(job.data, services.ingestion, { logger: services.logger });
      return { chunkCount: result.chunkCount, tier: result.extraction.selected.tier };
    },
    { connection, concurrency: options.ingestConcurrency ?? 5 },
  );
  ingestWorker.on("failed", createFailureHandler<IngestJobData>(QUEUE_NAMES.INGEST, options));

  const deleteWorker = new Worker<DeleteDocumentJobData>(
    QUEUE_NAMES.DELETE_DOCUMENT,
    async (job) => {
      const removed = await processDeleteDocument(job.data, services.documents, { logger: services.logger });
      return { removed };
    },
    { connection, concurrency: options.deleteConcurrency ?? 3 },
  );
  deleteWorker.on("failed", createFailureHandler<DeleteDocumentJobData>(QUEUE_NAMES.DELETE_DOCUMENT, options));

  return [ingestWorker, deleteWorker];
}
