import { cosineSimilarity } from "@docpipe/embeddings";
import type { VectorRecord } from "@docpipe/types";
import type { IVectorIndex, VectorQuery, VectorSearchResult } from "./vector-store.interface.js";

/** In-process index for tests and local runs without Qdrant. */
export class InMemoryVectorIndex implements IVectorIndex {
  readonly points = new Map<string, VectorRecord>();

  async upsert(records: VectorRecord[]): Promise<void> {
    for (const record of records) this.points.set(record.id, record);
  }

  async queryByVector(query: VectorQuery): Promise<VectorSearchResult[]> {
    const results: VectorSearchResult[] = [];
    for (const record of this.points.values()) {
      if (query.documentIds?.length && !query.documentIds.includes(record.documentId)) continue;
      if (query.model && record.payload["model"] !== query.model) continue;
      if (record.vector.length !== query.vector.length) continue;
      const score = cosineSimilarity(query.vector, record.vector);
      if (query.scoreThreshold !== undefined && score < query.scoreThreshold) continue;
      results.push({
        id: record.id,
        score,
        payload: { documentId: record.documentId, chunkId: record.chunkId, ...record.payload },
      });
    }
    return results.sort((a, b) => b.score - a.score).slice(0, query.topK);
  }

  async deleteByDocument(documentId: string, model?: string): Promise<void> {
    for (const [id, record] of this.points) {
      if (record.documentId !== documentId) continue;
      if (model && record.payload["model"] !== model) continue;
      this.points.delete(id);
    }
  }

  async ensureCollection(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
