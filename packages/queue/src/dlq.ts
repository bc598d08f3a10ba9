import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { DeadLetterEntry } from "@docpipe/types";

export const DLQ_NAME = "docpipe-dead-letter";

/** Dead-letter payload as stored in Redis: dates travel as ISO strings. */
export interface DeadLetterJobData extends Omit<DeadLetterEntry, "failedAt"> {
  failedAt: string;
}

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
