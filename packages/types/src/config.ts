import type { DocumentType, ChunkingRule } from "./chunk.js";
import type { TriggerCategoryDefinition } from "./notification.js";
import type { ImageQualityWeights } from "./quality.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  qdrant: QdrantConfig;
  storage: StorageConfig;
  embedding: EmbeddingConfig;
  pipeline: PipelineConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface StorageConfig {
  endpoint?: string;
  region: string;
  bucket: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export type EmbeddingProviderName = "cohere" | "bge-m3";

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  cohereApiKey?: string;
  cohereModel: string;
  bgeM3Url?: string;
  dimensions: number;
  batchSize: number;
}

export interface CallPolicyConfig {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PipelineConfig {
  processThreshold: number;
  enhanceThreshold: number;
  maxFileSizeBytes: number;
  ocrLanguages: string[];
  ocrCorrectionConfidence: number;
  /** Below this extraction confidence the document goes to HUMAN_REVIEW at EXTRACTED. */
  minExtractionConfidence: number;
  /** Below this aggregate confidence the document goes to HUMAN_REVIEW at SCANNED. */
  humanReviewConfidence: number;
  imageQualityWeights: ImageQualityWeights;
  chunkTable: Record<DocumentType, ChunkingRule>;
  triggerCategories: TriggerCategoryDefinition[];
  triggerCacheTtlSeconds: number;
  call: CallPolicyConfig;
  tesseractPath: string;
  doclingPython: string;
  doclingScript: string;
}

export interface WorkerConfig {
  concurrency: number;
}

