import { LRUCache } from "lru-cache";
import { meanVector } from "@docpipe/embeddings";
import { InvariantViolationError, summarizeError } from "@docpipe/errors";
import { createNoopLogger, type Logger } from "@docpipe/logger";
import type { TriggerCategory, TriggerCategoryDefinition } from "@docpipe/types";

/** Anything that can embed phrases with the same model as the chunks. */
export interface PhraseEmbedder {
  readonly model: string;
  embedAll(texts: string[]): Promise<number[][]>;
}

export interface TriggerCategoryCacheOptions {
  ttlMs: number;
  /** Stamps `refreshedAt`; expiry follows the cache's own clock. */
  clock?: () => number;
  logger?: Logger;
}

const SNAPSHOT = "categories";

/**
 * Process-wide cache of category reference vectors. The first read waits
 * for the initial load; after the TTL a stale snapshot keeps being served
 * while a single background fetch computes the next one. A failed refresh
 * leaves the old snapshot in place.
 */
export class TriggerCategoryCache {
  private readonly cache: LRUCache<typeof SNAPSHOT, TriggerCategory[]>;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly definitions: TriggerCategoryDefinition[],
    private readonly embedder: PhraseEmbedder,
    options: TriggerCategoryCacheOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createNoopLogger();
    this.cache = new LRUCache<typeof SNAPSHOT, TriggerCategory[]>({
      max: 1,
      ttl: options.ttlMs,
      allowStale: true,
      noDeleteOnStaleGet: true,
      noDeleteOnFetchRejection: true,
      fetchMethod: () => this.load(),
    });
  }

  async categories(): Promise<TriggerCategory[]> {
    return this.resolve(await this.cache.fetch(SNAPSHOT));
  }

  /** Recomputes every category vector; concurrent callers share one run. */
  async refresh(): Promise<TriggerCategory[]> {
    return this.resolve(await this.cache.fetch(SNAPSHOT, { forceRefresh: true, allowStale: false }));
  }

  /** Drops the snapshot; the next read waits for a fresh load. */
  invalidate(): void {
    this.cache.delete(SNAPSHOT);
  }

  private resolve(categories: TriggerCategory[] | undefined): TriggerCategory[] {
    if (!categories) throw new InvariantViolationError("Trigger category load produced no snapshot");
    return categories;
  }

  private async load(): Promise<TriggerCategory[]> {
    const phrases = this.definitions.flatMap((definition) => definition.phrases);
    let vectors: number[][];
    try {
      vectors = await this.embedder.embedAll(phrases);
    } catch (error) {
      this.logger.warn(
        { error: summarizeError(error), categories: this.definitions.length },
        "Trigger category refresh failed",
      );
      throw error;
    }
    const refreshedAt = new Date(this.clock());

    let offset = 0;
    const categories = this.definitions.map((definition): TriggerCategory => {
      const own = vectors.slice(offset, offset + definition.phrases.length);
      offset += definition.phrases.length;
      return { ...definition, vector: meanVector(own), model: this.embedder.model, refreshedAt };
    });

    this.logger.info(
      { categories: categories.length, phrases: phrases.length, model: this.embedder.model },
      "Trigger categories refreshed",
    );
    return categories;
  }
}
