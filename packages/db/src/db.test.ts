import { describe, it, expect } from "vitest";
import { InvariantViolationError, NotFoundError } from "@docpipe/errors";
import type { Chunk, Embedding, NotificationEvent } from "@docpipe/types";
import { InMemoryMetadataStore } from "./memory-store.js";
import { chunkRow, toChunk, toDocument, type DocumentRow } from "./mappers.js";

const fixed = new Date("2026-01-05T10:00:00.000Z");

function chunk(documentId: string, index: number, total = 2): Chunk {
  return {
    id: `${documentId}:${index}`,
    documentId,
    index,
    totalChunks: total,
    text: `Chunk ${index}`,
    chunkType: "paragraph",
    language: "english",
    needsTranslation: false,
    wordCount: 2,
    confidence: 1,
    metadata: { startChar: 0, endChar: 7, overlapUnits: 0 },
  };
}

function embedding(chunkId: string, model: string): Embedding {
  return { chunkId, documentId: "doc-1", vector: [1, 0], model, dimensions: 2, createdAt: fixed };
}

function event(id: string): NotificationEvent {
  return {
    id,
    category: "safety_incident",
    similarity: 0.8,
    chunkId: "doc-1:0",
    documentId: "doc-1",
    priority: "critical",
    recipients: ["safety"],
    title: "Safety incident detected",
    message: "m",
    createdAt: fixed,
  };
}

const newDoc = { id: "doc-1", filename: "report.pdf", sizeBytes: 1024, declaredMimeType: "application/pdf" };

describe("InMemoryMetadataStore", () => {
  it("creates documents at INGESTED and keeps the first record on repeat", async () => {
    const store = new InMemoryMetadataStore(() => fixed);
    const created = await store.create(newDoc);
    expect(created.stage).toBe("INGESTED");
    expect(created.language).toBe("unknown");
    expect(created.createdAt).toEqual(fixed);

    await store.persistStage("doc-1", "TYPE_DETECTED", { fileCategory: "pdf" });
    const again = await store.create({ ...newDoc, filename: "other.pdf" });
    expect(again.filename).toBe("report.pdf");
    expect(again.stage).toBe("TYPE_DETECTED");
  });

  it("throws NotFoundError for unknown documents", async () => {
    const store = new InMemoryMetadataStore();
    await expect(store.load("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.persistStage("missing", "FAILED", {})).rejects.toBeInstanceOf(NotFoundError);
  });

  it("merges stage fields into the snapshot", async () => {
    const store = new InMemoryMetadataStore(() => fixed);
    await store.create(newDoc);
    await store.persistStage("doc-1", "QUALITY_ASSESSED", { qualityScore: 82, qualityDecision: "PROCESS" });
    const doc = await store.persistStage("doc-1", "EXTRACTED", { errors: ["ocr warning"] });
    expect(doc.stage).toBe("EXTRACTED");
    expect(doc.qualityScore).toBe(82);
    expect(doc.qualityDecision).toBe("PROCESS");
    expect(doc.errors).toEqual(["ocr warning"]);
  });

  it("returns copies so callers cannot mutate stored state", async () => {
    const store = new InMemoryMetadataStore();
    await store.create(newDoc);
    const doc = await store.load("doc-1");
    doc.errors.push("local");
    expect((await store.load("doc-1")).errors).toEqual([]);
  });

  it("replacing chunks drops embeddings of the old chunk set", async () => {
    const store = new InMemoryMetadataStore();
    await store.create(newDoc);
    await store.replaceChunks("doc-1", [chunk("doc-1", 1), chunk("doc-1", 0)]);
    expect((await store.loadChunks("doc-1")).map((c) => c.id)).toEqual(["doc-1:0", "doc-1:1"]);

    await store.replaceEmbeddings("doc-1", "test/m1", [embedding("doc-1:1", "test/m1"), embedding("doc-1:0", "test/m1")]);
    expect((await store.loadEmbeddings("doc-1", "test/m1")).map((e) => e.chunkId)).toEqual(["doc-1:0", "doc-1:1"]);

    await store.replaceChunks("doc-1", [chunk("doc-1", 0, 1)]);
    expect(await store.loadEmbeddings("doc-1", "test/m1")).toEqual([]);
  });

  it("keeps embeddings per model version", async () => {
    const store = new InMemoryMetadataStore();
    await store.create(newDoc);
    await store.replaceChunks("doc-1", [chunk("doc-1", 0, 1)]);
    await store.replaceEmbeddings("doc-1", "test/m1", [embedding("doc-1:0", "test/m1")]);
    await store.replaceEmbeddings("doc-1", "test/m2", [embedding("doc-1:0", "test/m2")]);
    await store.replaceEmbeddings("doc-1", "test/m1", []);
    expect(await store.loadEmbeddings("doc-1", "test/m1")).toEqual([]);
    expect((await store.loadEmbeddings("doc-1", "test/m2")).map((e) => e.model)).toEqual(["test/m2"]);
  });

  it("refuses writes for an unknown document", async () => {
    const store = new InMemoryMetadataStore();

    await expect(store.replaceChunks("missing", [chunk("missing", 0, 1)])).rejects.toBeInstanceOf(
      InvariantViolationError,
    );
    await expect(store.replaceEmbeddings("missing", "test/m1", [])).rejects.toBeInstanceOf(InvariantViolationError);
    await expect(store.recordNotifications("missing", [])).rejects.toThrow("Write for unknown document missing");
    expect(await store.loadChunks("missing")).toEqual([]);
  });

  it("refuses embeddings for chunks the document does not have", async () => {
    const store = new InMemoryMetadataStore();
    await store.create(newDoc);
    await store.replaceChunks("doc-1", [chunk("doc-1", 0, 1)]);

    await expect(store.replaceEmbeddings("doc-1", "test/m1", [embedding("doc-1:7", "test/m1")])).rejects.toThrow(
      "Embedding for unknown chunk doc-1:7 of document doc-1",
    );
  });

  it("records each notification event once", async () => {
    const store = new InMemoryMetadataStore();
    await store.create(newDoc);
    await store.recordNotifications("doc-1", [event("e1"), event("e2")]);
    await store.recordNotifications("doc-1", [{ ...event("e1"), similarity: 0.99 }]);
    const recorded = store.notificationsFor("doc-1");
    expect(recorded.map((e) => e.id)).toEqual(["e1", "e2"]);
    expect(recorded[0]?.similarity).toBe(0.8);
  });

  it("stores stage artifacts", async () => {
    const store = new InMemoryMetadataStore();
    await store.create(newDoc);
    expect(await store.loadExtraction("doc-1")).toBeNull();
    await store.saveExtraction("doc-1", {
      processor: "text",
      text: "hello",
      fragments: ["hello"],
      extractionConfidence: 1,
      ocrConfidence: null,
      humanReview: false,
      warnings: [],
      metadata: {},
    });
    expect((await store.loadExtraction("doc-1"))?.text).toBe("hello");
    expect(await store.loadPreprocessed("doc-1")).toBeNull();
  });
});

describe("row mappers", () => {
  it("maps a chunk row back without the created timestamp", () => {
    const original = chunk("doc-1", 0, 1);
    const row = { ...chunkRow(original), createdAt: fixed };
    expect(toChunk({ ...original, createdAt: fixed })).toEqual(original);
    expect(row.id).toBe("doc-1:0");
  });

  it("maps a document row field for field", () => {
    const row: DocumentRow = {
      id: "doc-1",
      filename: "a.txt",
      sizeBytes: 10,
      declaredMimeType: "text/plain",
      sniffedMimeType: "text/plain",
      fileCategory: "text",
      detectionConfidence: 1,
      qualityScore: null,
      qualityDecision: null,
      qualityReport: null,
      enhanced: false,
      language: "english",
      needsTranslation: false,
      documentType: "unclassified",
      stage: "READY",
      errors: [],
      humanReviewReason: null,
      chunkCount: 1,
      notificationCount: 0,
      createdAt: fixed,
      updatedAt: fixed,
    };
    expect(toDocument(row)).toEqual(row);
  });
});
