import { ValidationError } from "@docpipe/errors";
import type { EmbeddingConfig } from "@docpipe/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

/**
 * Provider for the configured backend. Both backends emit vectors of the
 * configured size, so chunk and trigger vectors stay comparable.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohereApiKey) {
        throw new ValidationError("COHERE_API_KEY is required when EMBEDDING_PROVIDER=cohere", {
          COHERE_API_KEY: "required",
        });
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.cohereModel,
        dimensions: config.dimensions,
      });
    case "bge-m3":
      if (!config.bgeM3Url) {
        throw new ValidationError("BGE_M3_URL is required when EMBEDDING_PROVIDER=bge-m3", {
          BGE_M3_URL: "required",
        });
      }
      return new BgeM3EmbeddingProvider({ baseUrl: config.bgeM3Url, dimensions: config.dimensions });
    default: {
      const unknown: never = config.provider;
      throw new ValidationError(`Unknown embedding provider: ${String(unknown)}`, {
        EMBEDDING_PROVIDER: "unsupported",
      });
    }
  }
}
