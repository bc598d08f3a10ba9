import { z } from "zod";
import { TransientIOError } from "@docpipe/errors";
import type { EmbeddingResult } from "@docpipe/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { upstreamError } from "./http-errors.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative().default(0),
});

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP; its dense vectors cover
 * English and Malayalam in one space.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly model = "bge-m3/bge-m3";
  readonly dimensions: number;
  private baseUrl: string;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.batchEmbed([text], signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, dimensions: this.dimensions }),
        signal,
      });
    } catch (error: unknown) {
      throw new TransientIOError("BGE-M3 server unreachable", this.name, { cause: error });
    }

    if (!response.ok) {
      throw upstreamError(this.name, response.status, response.statusText);
    }

    const parsed = bgeM3ResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TransientIOError("BGE-M3 returned a malformed response", this.name, {
        details: { issues: parsed.error.issues.length },
      });
    }

    return {
      embeddings: parsed.data.embeddings,
      model: this.model,
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
