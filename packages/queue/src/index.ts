export {
  QUEUE_NAMES,
  DEFAULT_JOB_OPTIONS,
  createQueues,
  documentJobId,
  enqueueIngest,
  enqueueDeleteDocument,
  parseRedisConnection,
  type JobSink,
  type QueueConfig,
  type QueueName,
  type Queues,
} from "./queues.js";
export {
  DLQ_NAME,
  createDeadLetterQueue,
  moveToDeadLetter,
  toDeadLetter,
  type DeadLetterJobData,
  type DeadLetterQueue,
} from "./dlq.js";
