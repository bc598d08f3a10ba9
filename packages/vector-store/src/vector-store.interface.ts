import type { VectorRecord } from "@docpipe/types";

export interface VectorQuery {
  vector: number[];
  topK: number;
  scoreThreshold?: number;
  documentIds?: string[];
  /** Restrict to vectors of one embedding model. */
  model?: string;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface IVectorIndex {
  upsert(records: VectorRecord[]): Promise<void>;
  queryByVector(query: VectorQuery): Promise<VectorSearchResult[]>;
  /** Drops a document's points, optionally only those of one model. */
  deleteByDocument(documentId: string, model?: string): Promise<void>;
  ensureCollection(dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
