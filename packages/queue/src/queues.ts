import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { NotificationJobData, ProcessDocumentJobData } from "@docpipe/types";

export const QUEUE_NAMES = {
  DOCUMENTS: "docpipe-documents",
  NOTIFICATIONS: "docpipe-notifications",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : undefined,
    // required by BullMQ workers
    maxRetriesPerRequest: null,
  };
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  // A run resumes from the last persisted stage, so job-level retries only
  // cover crashes and persistence failures.
  const documentQueue = new Queue<ProcessDocumentJobData>(QUEUE_NAMES.DOCUMENTS, defaultOpts);

  const notificationQueue = new Queue<NotificationJobData>(QUEUE_NAMES.NOTIFICATIONS, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 5,
    },
  });

  return { documentQueue, notificationQueue };
}

export type Queues = ReturnType<typeof createQueues>;
