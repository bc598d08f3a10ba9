import type { ConnectionOptions } from "bullmq";
import { DocumentChunker, DocumentTypeClassifier } from "@docpipe/chunker";
import { PipelineOrchestrator, PipelineService } from "@docpipe/core";
import { PostgresMetadataStore, createDbClient } from "@docpipe/db";
import {
  CircuitBreakingEmbeddingProvider,
  EmbeddingGenerator,
  createEmbeddingProvider,
} from "@docpipe/embeddings";
import { RetryPolicy, summarizeError } from "@docpipe/errors";
import type { Logger } from "@docpipe/logger";
import { TriggerCategoryCache, TriggerEngine } from "@docpipe/notifications";
import { ParserRegistry } from "@docpipe/parser";
import { Preprocessor } from "@docpipe/preprocessor";
import { createProcessorRegistry } from "@docpipe/processors";
import {
  BullDeadLetterSink,
  BullDocumentQueue,
  BullNotificationSink,
  createDeadLetterQueue,
  createQueues,
} from "@docpipe/queue";
import { QualityTypeRouter } from "@docpipe/router";
import { S3ObjectStore, createS3Client } from "@docpipe/storage";
import type { AppConfig } from "@docpipe/types";
import { QdrantVectorStore } from "@docpipe/vector-store";

/** Wires every collaborator from configuration. Resolved once at startup. */
export function createPipeline(config: AppConfig, connection: ConnectionOptions, logger: Logger) {
  const { pipeline } = config;
  const policy = new RetryPolicy({
    ...pipeline.call,
    onRetry: (attempt, delayMs, error) => {
      logger.warn({ attempt, delayMs, error: summarizeError(error) }, "Retrying external call");
    },
  });

  const database = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  const metadata = new PostgresMetadataStore(database.db);
  const objectStore = new S3ObjectStore(config.storage.bucket, createS3Client(config.storage));

  const provider = new CircuitBreakingEmbeddingProvider(
    createEmbeddingProvider(config.embedding),
  );
  const embeddings = new EmbeddingGenerator(provider, {
    batchSize: config.embedding.batchSize,
    policy,
    logger: logger.child({ component: "embeddings" }),
  });
  const categories = new TriggerCategoryCache(pipeline.triggerCategories, embeddings, {
    ttlMs: pipeline.triggerCacheTtlSeconds * 1000,
    logger: logger.child({ component: "trigger-cache" }),
  });
  const vectorIndex = new QdrantVectorStore({
    url: config.qdrant.url,
    apiKey: config.qdrant.apiKey,
    collection: config.qdrant.collection,
  });

  const queues = createQueues({ connection });
  const deadLetterQueue = createDeadLetterQueue(connection);

  const orchestrator = new PipelineOrchestrator(
    {
      objectStore,
      metadata,
      router: new QualityTypeRouter({
        thresholds: {
          processThreshold: pipeline.processThreshold,
          enhanceThreshold: pipeline.enhanceThreshold,
        },
        maxFileSizeBytes: pipeline.maxFileSizeBytes,
        imageWeights: pipeline.imageQualityWeights,
      }),
      processors: createProcessorRegistry({
        ocrLanguages: pipeline.ocrLanguages,
        policy,
        parsers: new ParserRegistry({ doclingPython: pipeline.doclingPython, doclingScript: pipeline.doclingScript }),
        tesseractPath: pipeline.tesseractPath,
      }),
      preprocessor: new Preprocessor({ correctionConfidence: pipeline.ocrCorrectionConfidence }),
      classifier: new DocumentTypeClassifier(),
      chunker: new DocumentChunker(pipeline.chunkTable),
      embeddings,
      vectorIndex,
      triggers: new TriggerEngine(categories),
      notifications: new BullNotificationSink(queues.notificationQueue),
      deadLetters: new BullDeadLetterSink(deadLetterQueue),
      policy,
      logger,
    },
    {
      minExtractionConfidence: pipeline.minExtractionConfidence,
      humanReviewConfidence: pipeline.humanReviewConfidence,
    },
  );

  const service = new PipelineService({
    objectStore,
    metadata,
    queue: new BullDocumentQueue(queues.documentQueue),
    orchestrator,
    logger,
  });

  return {
    orchestrator,
    service,
    categories,
    vectorIndex,
    embeddings,
    async close(): Promise<void> {
      provider.shutdown();
      await Promise.all([
        queues.documentQueue.close(),
        queues.notificationQueue.close(),
        deadLetterQueue.close(),
      ]);
      await database.close();
    },
  };
}

export type Pipeline = ReturnType<typeof createPipeline>;
