export * from "./schema/index.js";
export { createDbClient, type DbClient, type DbClientOptions } from "./client.js";
export { PostgresMetadataStore, documentNotFound } from "./metadata-store.js";
export { InMemoryMetadataStore } from "./memory-store.js";
export { toChunk, toDocument, toEmbedding } from "./mappers.js";
