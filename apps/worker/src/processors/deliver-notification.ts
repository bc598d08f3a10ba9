import type { Job } from "bullmq";
import type { Logger } from "@docpipe/logger";
import type { NotificationJobData } from "@docpipe/types";

/**
 * Delivery channels (e-mail, SMS, chat) live outside this service; the
 * worker hands each event over as a structured log record for them.
 */
export function createNotificationDeliverer(logger: Logger) {
  return async (job: Pick<Job<NotificationJobData>, "data">): Promise<void> => {
    const { event } = job.data;
    logger.info(
      {
        eventId: event.id,
        documentId: event.documentId,
        chunkId: event.chunkId,
        category: event.category,
        priority: event.priority,
        similarity: event.similarity,
        recipients: event.recipients,
      },
      event.title,
    );
  };
}
