import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@stratarag/types";
import type { JobSink } from "./queues.js";

export const DLQ_NAME = "stratarag:dead-letter";

export type DeadLetterJobData = AnyJobData & {
  originalQueue: string;
  failureReason: string;
  attemptsMade: number;
  failedAt: string;
};

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

export function toDeadLetter(
  originalQueue: string,
  data: AnyJobData,
  error: unknown,
  attemptsMade: number,
  failedAt: Date = new Date(),
): DeadLetterJobData {
  return {
    ...data,
    originalQueue,
    failureReason: error instanceof Error ? error.message : String(error),
    attemptsMade,
    failedAt: failedAt.toISOString(),
  };
}

/** Park a job that used up its attempts so it can be inspected or replayed. */
export async function moveToDeadLetter(
  dlq: JobSink<DeadLetterJobData>,
  originalQueue: string,
  data: AnyJobData,
  error: unknown,
  attemptsMade: number,
): Promise<void> {
  await dlq.add(data.type, toDeadLetter(originalQueue, data, error, attemptsMade));
}
