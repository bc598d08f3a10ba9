import type { JobsOptions } from "bullmq";
import type {
  DeadLetterEntry,
  IDeadLetterSink,
  IDocumentQueue,
  INotificationSink,
  NotificationEvent,
  NotificationJobData,
  NotificationPriority,
  ProcessDocumentJobData,
} from "@docpipe/types";
import type { DeadLetterJobData } from "./dlq.js";

/** The slice of a BullMQ Queue the adapters use. */
export interface JobQueue<T> {
  add(name: string, data: T, opts?: JobsOptions): Promise<unknown>;
}

/** The slice of a BullMQ Job the document queue inspects. */
export interface KeptJob {
  getState(): Promise<string>;
  remove(): Promise<void>;
}

export interface DocumentJobQueue<T> extends JobQueue<T> {
  getJob(jobId: string): Promise<KeptJob | undefined>;
}

/** BullMQ priorities: lower runs first. */
export const NOTIFICATION_JOB_PRIORITY: Readonly<Record<NotificationPriority, number>> = {
  critical: 1,
  high: 2,
  medium: 3,
  low: 4,
};

/**
 * One job per document; resubmitting while it is queued or running is a
 * no-op. A kept completed or failed job is removed first, otherwise BullMQ
 * would ignore the new job under the same id.
 */
export class BullDocumentQueue implements IDocumentQueue {
  constructor(private readonly queue: DocumentJobQueue<ProcessDocumentJobData>) {}

  async enqueue(documentId: string): Promise<void> {
    const previous = await this.queue.getJob(documentId);
    if (previous) {
      const state = await previous.getState();
      if (state === "completed" || state === "failed") await previous.remove();
    }
    await this.queue.add("process-document", { type: "process-document", documentId }, { jobId: documentId });
  }
}

/** Job id is the event id, so re-scanning a chunk never notifies twice. */
export class BullNotificationSink implements INotificationSink {
  constructor(private readonly queue: JobQueue<NotificationJobData>) {}

  async enqueue(event: NotificationEvent): Promise<void> {
    await this.queue.add(
      event.category,
      { type: "notify", event },
      { jobId: event.id, priority: NOTIFICATION_JOB_PRIORITY[event.priority] },
    );
  }
}

export class BullDeadLetterSink implements IDeadLetterSink {
  constructor(private readonly queue: JobQueue<DeadLetterJobData>) {}

  async deadLetter(entry: DeadLetterEntry): Promise<void> {
    await this.queue.add("dead-letter", { ...entry, failedAt: entry.failedAt.toISOString() });
  }
}
