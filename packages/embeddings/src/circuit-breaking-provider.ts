import {
  createCircuitBreaker,
  TransientIOError,
  type Breaker,
  type CircuitBreakerOptions,
} from "@docpipe/errors";
import type { EmbeddingResult } from "@docpipe/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

/**
 * Wraps a remote provider in an opossum breaker. While the circuit is open
 * calls fail fast with a retryable TransientIOError instead of reaching the
 * provider.
 */
export class CircuitBreakingEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  private readonly breaker: Breaker<[string[], AbortSignal | undefined], EmbeddingResult>;

  constructor(
    private readonly inner: IEmbeddingProvider,
    options?: CircuitBreakerOptions,
  ) {
    this.name = inner.name;
    this.model = inner.model;
    this.dimensions = inner.dimensions;
    this.breaker = createCircuitBreaker(
      `embeddings:${inner.name}`,
      (texts: string[], signal: AbortSignal | undefined) => inner.batchEmbed(texts, signal),
      options,
    );
  }

  get isOpen(): boolean {
    return this.breaker.opened;
  }

  embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.batchEmbed([text], signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    if (this.breaker.opened) {
      throw new TransientIOError(`Embedding circuit for ${this.name} is open`, this.name, {
        code: "CIRCUIT_OPEN",
      });
    }
    return this.breaker.fire(texts, signal);
  }

  healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
