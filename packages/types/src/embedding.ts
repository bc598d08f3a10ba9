export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface Embedding {
  chunkId: string;
  documentId: string;
  vector: number[];
  /** Provider-qualified model id, e.g. `cohere/embed-v4.0`. */
  model: string;
  dimensions: number;
  createdAt: Date;
}

export type EmbeddingOutcome =
  | { chunkId: string; status: "ok"; vector: number[] }
  | { chunkId: string; status: "failed"; error: string };

export interface VectorRecord {
  id: string;
  documentId: string;
  chunkId: string;
  vector: number[];
  payload: Record<string, unknown>;
}
