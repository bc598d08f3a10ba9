import type { EmbeddingResult } from "@docpipe/types";

export interface IEmbeddingProvider {
  readonly name: string;
  /** Provider-qualified model id stored with every vector, e.g. `cohere/embed-v4.0`. */
  readonly model: string;
  readonly dimensions: number;

  embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
