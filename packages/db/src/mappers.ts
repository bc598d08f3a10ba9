import type { Chunk, Document, Embedding, NotificationEvent } from "@docpipe/types";
import type { chunks, documents, embeddings, notificationEvents } from "./schema/index.js";

export type DocumentRow = typeof documents.$inferSelect;
export type ChunkRow = typeof chunks.$inferSelect;
export type ChunkInsert = typeof chunks.$inferInsert;
export type EmbeddingRow = typeof embeddings.$inferSelect;
export type EmbeddingInsert = typeof embeddings.$inferInsert;
export type NotificationInsert = typeof notificationEvents.$inferInsert;

export function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    filename: row.filename,
    sizeBytes: row.sizeBytes,
    declaredMimeType: row.declaredMimeType,
    sniffedMimeType: row.sniffedMimeType,
    fileCategory: row.fileCategory,
    detectionConfidence: row.detectionConfidence,
    qualityScore: row.qualityScore,
    qualityDecision: row.qualityDecision,
    qualityReport: row.qualityReport,
    enhanced: row.enhanced,
    language: row.language,
    needsTranslation: row.needsTranslation,
    documentType: row.documentType,
    stage: row.stage,
    errors: row.errors,
    humanReviewReason: row.humanReviewReason,
    chunkCount: row.chunkCount,
    notificationCount: row.notificationCount,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.documentId,
    index: row.index,
    totalChunks: row.totalChunks,
    text: row.text,
    chunkType: row.chunkType,
    language: row.language,
    needsTranslation: row.needsTranslation,
    wordCount: row.wordCount,
    confidence: row.confidence,
    metadata: row.metadata,
  };
}

export function chunkRow(chunk: Chunk): ChunkInsert {
  return { ...chunk };
}

export function toEmbedding(row: EmbeddingRow): Embedding {
  return {
    chunkId: row.chunkId,
    documentId: row.documentId,
    vector: row.vector,
    model: row.model,
    dimensions: row.dimensions,
    createdAt: row.createdAt,
  };
}

export function embeddingRow(embedding: Embedding): EmbeddingInsert {
  return { ...embedding };
}

export function notificationRow(event: NotificationEvent): NotificationInsert {
  return { ...event };
}
