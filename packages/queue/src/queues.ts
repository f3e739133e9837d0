import { Queue } from "bullmq";
import type { ConnectionOptions, JobsOptions } from "bullmq";
import type { DeleteDocumentJobData, IngestJobData } from "@stratarag/types";

export const QUEUE_NAMES = {
  INGEST: "stratarag:ingest",
  DELETE_DOCUMENT: "stratarag:delete-document",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export interface QueueConfig {
  connection: ConnectionOptions;
}

export const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: "exponential" as const,
    delay: 1000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
} satisfies JobsOptions;

/** Anything jobs can be added to; a BullMQ `Queue` or a test double. */
export interface JobSink<T> {
  add(name: string, data: T, opts?: JobsOptions): Promise<{ id?: string | undefined }>;
}

export function createQueues(config: QueueConfig) {
  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    connection: config.connection,
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });

  const deleteDocumentQueue = new Queue<DeleteDocumentJobData>(QUEUE_NAMES.DELETE_DOCUMENT, {
    connection: config.connection,
    defaultJobOptions: {
      ...DEFAULT_JOB_OPTIONS,
      priority: 1, // deletes jump ahead of ingests
    },
  });

  return { ingestQueue, deleteDocumentQueue };
}

export type Queues = ReturnType<typeof createQueues>;

/**
 * One job per document: re-enqueueing a document that is still waiting is a
 * no-op in BullMQ. Custom ids may not contain ':'.
 */
export function documentJobId(type: string, knowledgeBase: string, documentId: string): string {
  return [type, knowledgeBase, documentId].map((part) => part.replaceAll(":", "_")).join("--");
}

export async function enqueueIngest(
  queue: JobSink<IngestJobData>,
  data: IngestJobData,
): Promise<string> {
  const jobId = documentJobId(data.type, data.knowledgeBase, data.documentId);
  const job = await queue.add(data.type, data, { jobId });
  return job.id ?? jobId;
}

export async function enqueueDeleteDocument(
  queue: JobSink<DeleteDocumentJobData>,
  data: DeleteDocumentJobData,
): Promise<string> {
  const jobId = documentJobId(data.type, data.knowledgeBase, data.documentId);
  const job = await queue.add(data.type, data, { jobId });
  return job.id ?? jobId;
}

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
    // BullMQ workers block on Redis; they must not give up on retries
    maxRetriesPerRequest: null,
  };
}
