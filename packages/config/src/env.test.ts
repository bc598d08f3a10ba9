import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string | undefined> = {}): Record<string, string | undefined> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/test",
    REDIS_URL: "redis://localhost:6379",
    QDRANT_URL: "http://localhost:6333",
    S3_BUCKET: "documents",
    COHERE_API_KEY: "test-key",
    WORKER_CONCURRENCY: "4",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses a minimal env and fills defaults", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.database.url).toBe("postgresql://localhost:5432/test");
    expect(config.database.poolMax).toBe(10);
    expect(config.qdrant.collection).toBe("document_chunks");
    expect(config.storage).toEqual({
      endpoint: undefined,
      region: "us-east-1",
      bucket: "documents",
      accessKeyId: undefined,
      secretAccessKey: undefined,
    });
    expect(config.embedding.provider).toBe("cohere");
    expect(config.embedding.batchSize).toBe(100);
    expect(config.pipeline.processThreshold).toBe(0.8);
    expect(config.pipeline.enhanceThreshold).toBe(0.5);
    expect(config.pipeline.maxFileSizeBytes).toBe(209_715_200);
    expect(config.pipeline.ocrLanguages).toEqual(["eng", "mal"]);
    expect(config.pipeline.ocrCorrectionConfidence).toBe(0.85);
    expect(config.pipeline.triggerCacheTtlSeconds).toBe(3600);
    expect(config.pipeline.call).toEqual({ timeoutMs: 30000, maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 });
    expect(config.pipeline.imageQualityWeights).toEqual({
      sharpness: 0.3,
      contrast: 0.2,
      brightness: 0.2,
      noise: 0.2,
      resolution: 0.1,
    });
    expect(config.pipeline.chunkTable.incident).toEqual({ strategy: "event", maxUnits: 4, overlapUnits: 1 });
    expect(config.worker.concurrency).toBe(4);
  });

  it("loads the bundled trigger categories", () => {
    const config = parseEnv(makeValidEnv());
    const names = config.pipeline.triggerCategories.map((c) => c.name);

    expect(names).toEqual([
      "urgent_maintenance",
      "safety_incident",
      "compliance_violation",
      "deadline_approaching",
      "budget_exceeded",
    ]);
    const urgent = config.pipeline.triggerCategories[0];
    expect(urgent?.threshold).toBe(0.85);
    expect(urgent?.priority).toBe("high");
    expect(urgent?.recipients).toEqual(["engineering", "operations", "maintenance"]);
  });

  it("applies per-category threshold overrides", () => {
    const config = parseEnv(makeValidEnv({ TRIGGER_THRESHOLDS: "safety_incident=0.7, budget_exceeded=0.95" }));
    const byName = new Map(config.pipeline.triggerCategories.map((c) => [c.name, c.threshold]));

    expect(byName.get("safety_incident")).toBe(0.7);
    expect(byName.get("budget_exceeded")).toBe(0.95);
    expect(byName.get("urgent_maintenance")).toBe(0.85);
  });

  it("rejects a malformed threshold override", () => {
    expect(() => parseEnv(makeValidEnv({ TRIGGER_THRESHOLDS: "safety_incident" }))).toThrow();
    expect(() => parseEnv(makeValidEnv({ TRIGGER_THRESHOLDS: "safety_incident=2" }))).toThrow();
  });

  it("accepts OCR languages separated by plus or comma", () => {
    expect(parseEnv(makeValidEnv({ OCR_LANGUAGES: "mal+eng" })).pipeline.ocrLanguages).toEqual(["mal", "eng"]);
  });

  it("parses image quality weights", () => {
    const config = parseEnv(makeValidEnv({ IMAGE_QUALITY_WEIGHTS: "0.4,0.2,0.2,0.1,0.1" }));
    expect(config.pipeline.imageQualityWeights).toEqual({
      sharpness: 0.4,
      contrast: 0.2,
      brightness: 0.2,
      noise: 0.1,
      resolution: 0.1,
    });
  });

  it("rejects image weights of the wrong arity", () => {
    expect(() => parseEnv(makeValidEnv({ IMAGE_QUALITY_WEIGHTS: "0.5,0.5" }))).toThrow();
  });

  it("rejects ENHANCE_THRESHOLD at or above PROCESS_THRESHOLD", () => {
    expect(() => parseEnv(makeValidEnv({ PROCESS_THRESHOLD: "0.6", ENHANCE_THRESHOLD: "0.6" }))).toThrow(
      /ENHANCE_THRESHOLD must be lower/,
    );
  });

  it("rejects thresholds outside [0, 1]", () => {
    expect(() => parseEnv(makeValidEnv({ PROCESS_THRESHOLD: "1.5" }))).toThrow();
  });

  it("caps the embedding batch size at 100", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_BATCH_SIZE: "250" }))).toThrow();
  });

  it("requires BGE_M3_URL for the bge-m3 provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }))).toThrow(/BGE_M3_URL/);
    const config = parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3", BGE_M3_URL: "http://localhost:8080" }));
    expect(config.embedding.bgeM3Url).toBe("http://localhost:8080");
  });

  it("rejects invalid DATABASE_URL", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow();
  });

  it("rejects missing S3_BUCKET", () => {
    expect(() => parseEnv(makeValidEnv({ S3_BUCKET: undefined }))).toThrow();
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
