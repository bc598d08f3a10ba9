export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { CircuitBreakingEmbeddingProvider } from "./circuit-breaking-provider.js";
export { EmbeddingGenerator, MAX_BATCH_SIZE } from "./embedding-generator.js";
export type { EmbeddingInput, EmbeddingGeneratorOptions } from "./embedding-generator.js";
export { cosineSimilarity, meanVector } from "./similarity.js";
export { createEmbeddingProvider } from "./factory.js";
