import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import {
  InvariantViolationError,
  RetryPolicy,
  TransientIOError,
  summarizeError,
} from "@docpipe/errors";
import { createNoopLogger, type Logger } from "@docpipe/logger";
import type { EmbeddingOutcome } from "@docpipe/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export const MAX_BATCH_SIZE = 100;

export interface EmbeddingInput {
  chunkId: string;
  text: string;
}

export interface EmbeddingGeneratorOptions {
  /** Texts per provider call, at most 100. */
  batchSize?: number;
  policy?: RetryPolicy;
  /** Cached vectors; 0 disables the cache. */
  cacheSize?: number;
  logger?: Logger;
}

/**
 * Turns chunk texts into vectors in bounded, order-preserving batches. A
 * failed batch is retried one chunk at a time; chunks that still fail come
 * back as `failed` outcomes rather than being dropped. Vectors are cached
 * per model and text, so unchanged text is never re-embedded.
 */
export class EmbeddingGenerator {
  private readonly batchSize: number;
  private readonly policy: RetryPolicy;
  private readonly cache: LRUCache<string, number[]> | null;
  private readonly logger: Logger;

  constructor(
    private readonly provider: IEmbeddingProvider,
    options: EmbeddingGeneratorOptions = {},
  ) {
    this.batchSize = Math.min(MAX_BATCH_SIZE, Math.max(1, options.batchSize ?? MAX_BATCH_SIZE));
    this.policy = options.policy ?? new RetryPolicy();
    const cacheSize = options.cacheSize ?? 10_000;
    this.cache = cacheSize > 0 ? new LRUCache<string, number[]>({ max: cacheSize }) : null;
    this.logger = options.logger ?? createNoopLogger();
  }

  get model(): string {
    return this.provider.model;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  async generate(inputs: EmbeddingInput[]): Promise<EmbeddingOutcome[]> {
    const outcomes = new Array<EmbeddingOutcome | undefined>(inputs.length).fill(undefined);
    const pending: number[] = [];

    inputs.forEach((input, i) => {
      const cached = this.cache?.get(this.cacheKey(input.text));
      if (cached) outcomes[i] = { chunkId: input.chunkId, status: "ok", vector: cached };
      else pending.push(i);
    });

    for (let start = 0; start < pending.length; start += this.batchSize) {
      const batch = pending.slice(start, start + this.batchSize);
      const texts = batch.map((i) => inputs[i]?.text ?? "");
      try {
        const vectors = await this.call(texts);
        batch.forEach((i, j) => {
          outcomes[i] = this.accept(inputs[i], vectors[j]);
        });
      } catch (error: unknown) {
        if (error instanceof InvariantViolationError) throw error;
        this.logger.warn(
          { batchSize: batch.length, error: summarizeError(error) },
          "Embedding batch failed, retrying chunks individually",
        );
        for (const i of batch) {
          outcomes[i] = await this.single(inputs[i]);
        }
      }
    }

    return outcomes.map((outcome, i) => {
      if (outcome) return outcome;
      throw new InvariantViolationError(`No embedding outcome for input ${String(i)}`);
    });
  }

  /** Embeds every text or throws; used for trigger phrases. */
  async embedAll(texts: string[]): Promise<number[][]> {
    const outcomes = await this.generate(texts.map((text, i) => ({ chunkId: String(i), text })));
    return outcomes.map((outcome) => {
      if (outcome.status === "failed") {
        throw new TransientIOError(`Embedding failed: ${outcome.error}`, this.provider.name);
      }
      return outcome.vector;
    });
  }

  private async single(input: EmbeddingInput | undefined): Promise<EmbeddingOutcome> {
    if (!input) throw new InvariantViolationError("Embedding input missing");
    try {
      const [vector] = await this.call([input.text]);
      return this.accept(input, vector);
    } catch (error: unknown) {
      if (error instanceof InvariantViolationError) throw error;
      return { chunkId: input.chunkId, status: "failed", error: summarizeError(error) };
    }
  }

  private async call(texts: string[]): Promise<number[][]> {
    const result = await this.policy.execute(
      (signal) => this.provider.batchEmbed(texts, signal),
      `embeddings:${this.provider.name}`,
    );
    if (result.embeddings.length !== texts.length) {
      throw new TransientIOError(
        `Provider returned ${String(result.embeddings.length)} vectors for ${String(texts.length)} texts`,
        this.provider.name,
      );
    }
    return result.embeddings;
  }

  private accept(input: EmbeddingInput | undefined, vector: number[] | undefined): EmbeddingOutcome {
    if (!input || !vector) throw new InvariantViolationError("Embedding batch lost its alignment");
    if (vector.length !== this.provider.dimensions) {
      return {
        chunkId: input.chunkId,
        status: "failed",
        error: `Model ${this.provider.model} returned ${String(vector.length)} dimensions, expected ${String(this.provider.dimensions)}`,
      };
    }
    this.cache?.set(this.cacheKey(input.text), vector);
    return { chunkId: input.chunkId, status: "ok", vector };
  }

  private cacheKey(text: string): string {
    return createHash("sha256").update(this.provider.model).update("\u0000").update(text).digest("hex");
  }
}
