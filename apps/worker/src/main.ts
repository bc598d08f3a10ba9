import { Worker } from "bullmq";
import { parseEnv } from "@docpipe/config";
import { summarizeError } from "@docpipe/errors";
import { createLogger } from "@docpipe/logger";
import { QUEUE_NAMES, parseRedisConnection } from "@docpipe/queue";
import type { NotificationJobData, ProcessDocumentJobData } from "@docpipe/types";
import { createPipeline } from "./container.js";
import { createDocumentProcessor } from "./processors/process-document.js";
import { createNotificationDeliverer } from "./processors/deliver-notification.js";

const NOTIFICATION_CONCURRENCY = 5;

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "docpipe-worker" });
  const connection = parseRedisConnection(config.redis.url);
  const pipeline = createPipeline(config, connection, logger);

  await pipeline.vectorIndex.ensureCollection(pipeline.embeddings.dimensions);
  await pipeline.categories.refresh();

  const documentWorker = new Worker<ProcessDocumentJobData>(
    QUEUE_NAMES.DOCUMENTS,
    createDocumentProcessor(pipeline.orchestrator, logger),
    { connection, concurrency: config.worker.concurrency },
  );
  const notificationWorker = new Worker<NotificationJobData>(
    QUEUE_NAMES.NOTIFICATIONS,
    createNotificationDeliverer(logger.child({ component: "notifications" })),
    { connection, concurrency: NOTIFICATION_CONCURRENCY },
  );
  const workers = [documentWorker, notificationWorker];

  for (const worker of workers) {
    worker.on("failed", (job, error) => {
      logger.error({ queue: worker.name, jobId: job?.id, error: summarizeError(error) }, "Job failed");
    });
  }

  logger.info(
    { queues: workers.map((w) => w.name), concurrency: config.worker.concurrency },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await pipeline.close();
    logger.info("All workers closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  createLogger({ service: "docpipe-worker" }).fatal({ error: summarizeError(err) }, "Worker failed to start");
  process.exit(1);
});
