import type { IVectorIndex } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorIndex } from "./memory-index.js";

export type { IVectorIndex, VectorQuery, VectorSearchResult } from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantPort, QdrantVectorStoreConfig } from "./qdrant-adapter.js";
export { InMemoryVectorIndex } from "./memory-index.js";
export { pointId, vectorRecordFor } from "./records.js";

export type VectorStoreType = "qdrant" | "memory";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collection?: string;
}

export function createVectorStore(config: VectorStoreConfig): IVectorIndex {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collection: config.collection ?? "document_chunks",
      });
    case "memory":
      return new InMemoryVectorIndex();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
