import { QdrantClient } from "@qdrant/js-client-rest";
import { TransientIOError } from "@docpipe/errors";
import type { VectorRecord } from "@docpipe/types";
import type { IVectorIndex, VectorQuery, VectorSearchResult } from "./vector-store.interface.js";

const BATCH_SIZE = 100;

export type QdrantPort = Pick<
  QdrantClient,
  "upsert" | "search" | "delete" | "getCollections" | "createCollection" | "createPayloadIndex"
>;

export interface QdrantVectorStoreConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export class QdrantVectorStore implements IVectorIndex {
  private client: QdrantPort;
  private collection: string;

  constructor(config: QdrantVectorStoreConfig, client?: QdrantPort) {
    this.client = client ?? new QdrantClient({ url: config.url, apiKey: config.apiKey });
    this.collection = config.collection;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.guard("upsert", () =>
        this.client.upsert(this.collection, {
          wait: true,
          points: batch.map((r) => ({
            id: r.id,
            vector: r.vector,
            payload: {
              documentId: r.documentId,
              chunkId: r.chunkId,
              ...r.payload,
            },
          })),
        }),
      );
    }
  }

  async queryByVector(query: VectorQuery): Promise<VectorSearchResult[]> {
    const must = [
      ...(query.documentIds && query.documentIds.length > 0
        ? [{ key: "documentId", match: { any: query.documentIds } }]
        : []),
      ...(query.model ? [{ key: "model", match: { value: query.model } }] : []),
    ];

    const results = await this.guard("search", () =>
      this.client.search(this.collection, {
        vector: query.vector,
        limit: query.topK,
        score_threshold: query.scoreThreshold,
        filter: must.length > 0 ? { must } : undefined,
        with_payload: true,
      }),
    );

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: r.payload ?? {},
    }));
  }

  async deleteByDocument(documentId: string, model?: string): Promise<void> {
    const must = [
      { key: "documentId", match: { value: documentId } },
      ...(model ? [{ key: "model", match: { value: model } }] : []),
    ];
    await this.guard("delete", () => this.client.delete(this.collection, { wait: true, filter: { must } }));
  }

  async ensureCollection(dimensions: number): Promise<void> {
    const collections = await this.guard("getCollections", () => this.client.getCollections());
    const exists = collections.collections.some((c) => c.name === this.collection);
    if (exists) return;

    await this.guard("createCollection", () =>
      this.client.createCollection(this.collection, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
        optimizers_config: {
          indexing_threshold: 20000,
        },
      }),
    );

    // Payload indexes for filtering
    for (const field of ["documentId", "model", "language"]) {
      await this.guard("createPayloadIndex", () =>
        this.client.createPayloadIndex(this.collection, { field_name: field, field_schema: "keyword" }),
      );
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new TransientIOError(`Qdrant ${operation} failed`, "qdrant", { cause: error });
    }
  }
}
