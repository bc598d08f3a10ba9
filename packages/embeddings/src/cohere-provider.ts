import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import { TimeoutError, TransientIOError } from "@docpipe/errors";
import type { EmbeddingResult } from "@docpipe/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { upstreamError } from "./http-errors.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private client: CohereClient;
  private modelName: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.modelName = config.model ?? DEFAULT_MODEL;
    this.model = `cohere/${this.modelName}`;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.batchEmbed([text], signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      const response = await this.request(batch, signal);

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      // Use actual tokensUsed from Cohere response for billing accuracy
      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async request(batch: string[], signal?: AbortSignal) {
    try {
      return await this.client.v2.embed(
        {
          texts: batch,
          model: this.modelName,
          inputType: "search_document",
          embeddingTypes: ["float"],
          outputDimension: this.dimensions,
        },
        { abortSignal: signal, maxRetries: 0 },
      );
    } catch (error: unknown) {
      if (error instanceof CohereTimeoutError) {
        throw new TimeoutError("Cohere embed request timed out", this.name, 0, { cause: error });
      }
      if (error instanceof CohereError) {
        throw upstreamError(this.name, error.statusCode ?? 503, error.message, error);
      }
      throw new TransientIOError("Cohere embed request failed", this.name, { cause: error });
    }
  }
}
