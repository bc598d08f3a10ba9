import { cpus } from "node:os";
import { z } from "zod";
import type { AppConfig, ImageQualityWeights } from "@docpipe/types";
import {
  DEFAULT_CHUNK_TABLE,
  DEFAULT_IMAGE_QUALITY_WEIGHTS,
  applyThresholdOverrides,
  loadTriggerCategories,
} from "./defaults.js";

const unitInterval = z.number().min(0).max(1);

function numberVar(fallback: string) {
  return z.string().default(fallback).transform(Number);
}

/** `name=value,name=value` */
const thresholdOverrides = z
  .string()
  .optional()
  .transform((val, ctx) => {
    const out: Record<string, number> = {};
    if (!val) return out;
    for (const pair of val.split(",")) {
      const [name, value] = pair.split("=").map((p) => p.trim());
      const threshold = Number(value);
      if (!name || value === undefined || value === "" || !Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid threshold override "${pair}"` });
        return z.NEVER;
      }
      out[name] = threshold;
    }
    return out;
  });

/** `sharpness,contrast,brightness,noise,resolution` */
const imageWeights = z
  .string()
  .optional()
  .transform((val, ctx): ImageQualityWeights => {
    if (!val) return { ...DEFAULT_IMAGE_QUALITY_WEIGHTS };
    const parts = val.split(",").map((p) => Number(p.trim()));
    const [sharpness, contrast, brightness, noise, resolution] = parts;
    if (
      parts.length !== 5 ||
      sharpness === undefined ||
      contrast === undefined ||
      brightness === undefined ||
      noise === undefined ||
      resolution === undefined ||
      parts.some((p) => !Number.isFinite(p) || p < 0) ||
      parts.reduce((a, b) => a + b, 0) <= 0
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "IMAGE_QUALITY_WEIGHTS must be five non-negative numbers with a positive sum",
      });
      return z.NEVER;
    }
    return { sharpness, contrast, brightness, noise, resolution };
  });

/**
 * Zod schema for every environment variable the pipeline reads. Validates,
 * transforms, and provides defaults so that the resulting object is a
 * strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: numberVar("10").pipe(z.number().int().positive()),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().default("document_chunks"),

    // ---------- Object storage ----------
    S3_ENDPOINT: z.string().url().optional(),
    S3_REGION: z.string().default("us-east-1"),
    S3_BUCKET: z.string().min(1, "S3_BUCKET is required"),
    S3_ACCESS_KEY_ID: z.string().optional(),
    S3_SECRET_ACCESS_KEY: z.string().optional(),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),
    EMBEDDING_DIMENSIONS: numberVar("1024").pipe(z.number().int().positive()),
    EMBEDDING_BATCH_SIZE: numberVar("100").pipe(z.number().int().positive().max(100)),

    // ---------- Quality routing ----------
    PROCESS_THRESHOLD: numberVar("0.8").pipe(unitInterval),
    ENHANCE_THRESHOLD: numberVar("0.5").pipe(unitInterval),
    MAX_FILE_SIZE_BYTES: numberVar(String(200 * 1024 * 1024)).pipe(z.number().int().positive()),
    IMAGE_QUALITY_WEIGHTS: imageWeights,

    // ---------- Extraction ----------
    OCR_LANGUAGES: z
      .string()
      .default("eng,mal")
      .transform((val) => val.split(/[,+]/).map((l) => l.trim()).filter((l) => l.length > 0))
      .pipe(z.array(z.string()).min(1)),
    OCR_CORRECTION_CONFIDENCE: numberVar("0.85").pipe(unitInterval),
    MIN_EXTRACTION_CONFIDENCE: numberVar("0.3").pipe(unitInterval),
    HUMAN_REVIEW_CONFIDENCE: numberVar("0.6").pipe(unitInterval),
    TESSERACT_PATH: z.string().default("tesseract"),
    DOCLING_PYTHON: z.string().default("python3"),
    DOCLING_SCRIPT: z.string().default("scripts/docling-parse.py"),

    // ---------- Notifications ----------
    TRIGGER_CACHE_TTL_SECONDS: numberVar("3600").pipe(z.number().int().positive()),
    TRIGGER_THRESHOLDS: thresholdOverrides,

    // ---------- External calls ----------
    CALL_TIMEOUT_MS: numberVar("30000").pipe(z.number().int().positive()),
    CALL_MAX_ATTEMPTS: numberVar("3").pipe(z.number().int().min(1).max(10)),
    CALL_BASE_DELAY_MS: numberVar("500").pipe(z.number().int().nonnegative()),
    CALL_MAX_DELAY_MS: numberVar("8000").pipe(z.number().int().nonnegative()),

    // ---------- Worker ----------
    WORKER_CONCURRENCY: numberVar(String(Math.max(1, cpus().length))).pipe(z.number().int().positive()),
  })
  .refine((env) => env.ENHANCE_THRESHOLD < env.PROCESS_THRESHOLD, {
    message: "ENHANCE_THRESHOLD must be lower than PROCESS_THRESHOLD",
    path: ["ENHANCE_THRESHOLD"],
  })
  .refine((env) => env.EMBEDDING_PROVIDER !== "bge-m3" || env.BGE_M3_URL !== undefined, {
    message: "BGE_M3_URL is required when EMBEDDING_PROVIDER=bge-m3",
    path: ["BGE_M3_URL"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    storage: {
      endpoint: parsed.S3_ENDPOINT,
      region: parsed.S3_REGION,
      bucket: parsed.S3_BUCKET,
      accessKeyId: parsed.S3_ACCESS_KEY_ID,
      secretAccessKey: parsed.S3_SECRET_ACCESS_KEY,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      cohereApiKey: parsed.COHERE_API_KEY,
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
    },

    pipeline: {
      processThreshold: parsed.PROCESS_THRESHOLD,
      enhanceThreshold: parsed.ENHANCE_THRESHOLD,
      maxFileSizeBytes: parsed.MAX_FILE_SIZE_BYTES,
      ocrLanguages: parsed.OCR_LANGUAGES,
      ocrCorrectionConfidence: parsed.OCR_CORRECTION_CONFIDENCE,
      minExtractionConfidence: parsed.MIN_EXTRACTION_CONFIDENCE,
      humanReviewConfidence: parsed.HUMAN_REVIEW_CONFIDENCE,
      imageQualityWeights: parsed.IMAGE_QUALITY_WEIGHTS,
      chunkTable: { ...DEFAULT_CHUNK_TABLE },
      triggerCategories: applyThresholdOverrides(loadTriggerCategories(), parsed.TRIGGER_THRESHOLDS),
      triggerCacheTtlSeconds: parsed.TRIGGER_CACHE_TTL_SECONDS,
      call: {
        timeoutMs: parsed.CALL_TIMEOUT_MS,
        maxAttempts: parsed.CALL_MAX_ATTEMPTS,
        baseDelayMs: parsed.CALL_BASE_DELAY_MS,
        maxDelayMs: parsed.CALL_MAX_DELAY_MS,
      },
      tesseractPath: parsed.TESSERACT_PATH,
      doclingPython: parsed.DOCLING_PYTHON,
      doclingScript: parsed.DOCLING_SCRIPT,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}
