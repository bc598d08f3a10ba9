export { QUEUE_NAMES, createQueues, parseRedisConnection } from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue } from "./dlq.js";
export type { DeadLetterJobData, DeadLetterQueue } from "./dlq.js";
export {
  BullDocumentQueue,
  BullNotificationSink,
  BullDeadLetterSink,
  NOTIFICATION_JOB_PRIORITY,
} from "./adapters.js";
export type { DocumentJobQueue, JobQueue, KeptJob } from "./adapters.js";
