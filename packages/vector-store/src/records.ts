import { v5 as uuidv5 } from "uuid";
import type { Chunk, Embedding, VectorRecord } from "@docpipe/types";

/** Namespace for vector point ids. */
export const POINT_NAMESPACE = "3f0c1b4e-8a57-4d1e-9b6a-2c7e5d9f0a14";

/**
 * Name-based (v5) UUID for a chunk under one model, so re-upserting
 * replaces instead of duplicating.
 */
export function pointId(chunkId: string, model: string): string {
  return uuidv5(`${model}\u0000${chunkId}`, POINT_NAMESPACE);
}

export function vectorRecordFor(chunk: Chunk, embedding: Embedding): VectorRecord {
  return {
    id: pointId(chunk.id, embedding.model),
    documentId: chunk.documentId,
    chunkId: chunk.id,
    vector: embedding.vector,
    payload: {
      model: embedding.model,
      index: chunk.index,
      chunkType: chunk.chunkType,
      language: chunk.language,
      needsTranslation: chunk.needsTranslation,
      text: chunk.text,
    },
  };
}
