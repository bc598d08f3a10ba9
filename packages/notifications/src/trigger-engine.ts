import { createHash } from "node:crypto";
import { cosineSimilarity } from "@docpipe/embeddings";
import { InvariantViolationError } from "@docpipe/errors";
import type { Chunk, Embedding, NotificationEvent, TriggerCategory } from "@docpipe/types";
import type { TriggerCategoryCache } from "./category-cache.js";

/** Stable across reruns, so recording the same match twice is a no-op. */
export function notificationEventId(documentId: string, chunkId: string, category: string, model: string): string {
  return createHash("sha256").update([documentId, chunkId, category, model].join("\u0000")).digest("hex").slice(0, 32);
}

function label(category: string): string {
  const words = category.replace(/[_-]+/g, " ").trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Scores chunk embeddings against the cached category vectors. Every
 * category at or above its threshold yields one event; priority and
 * recipients come straight from the category definition.
 */
export class TriggerEngine {
  constructor(
    private readonly cache: Pick<TriggerCategoryCache, "categories">,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async scan(chunk: Chunk, embedding: Embedding): Promise<NotificationEvent[]> {
    const categories = await this.cache.categories();
    return this.match(categories, chunk, embedding);
  }

  /** Scans every chunk of a document; each chunk needs its embedding. */
  async scanDocument(chunks: Chunk[], embeddings: Embedding[]): Promise<NotificationEvent[]> {
    const categories = await this.cache.categories();
    const byChunk = new Map(embeddings.map((embedding) => [embedding.chunkId, embedding]));
    return chunks.flatMap((chunk) => {
      const embedding = byChunk.get(chunk.id);
      if (!embedding) throw new InvariantViolationError(`Chunk ${chunk.id} has no embedding`);
      return this.match(categories, chunk, embedding);
    });
  }

  private match(categories: TriggerCategory[], chunk: Chunk, embedding: Embedding): NotificationEvent[] {
    if (embedding.chunkId !== chunk.id) {
      throw new InvariantViolationError(`Embedding for ${embedding.chunkId} scanned against chunk ${chunk.id}`);
    }

    const events: NotificationEvent[] = [];
    for (const category of categories) {
      if (category.model !== embedding.model) {
        throw new InvariantViolationError(
          `Category ${category.name} was embedded with ${category.model}, chunk with ${embedding.model}`,
        );
      }
      const similarity = cosineSimilarity(embedding.vector, category.vector);
      if (similarity < category.threshold) continue;

      const name = label(category.name);
      events.push({
        id: notificationEventId(chunk.documentId, chunk.id, category.name, embedding.model),
        category: category.name,
        similarity,
        chunkId: chunk.id,
        documentId: chunk.documentId,
        priority: category.priority,
        recipients: [...category.recipients],
        title: `${name} detected`,
        message: `Chunk ${String(chunk.index + 1)} of ${String(chunk.totalChunks)} in document ${chunk.documentId} matches ${category.name} (similarity ${similarity.toFixed(3)}).`,
        createdAt: this.clock(),
      });
    }
    return events;
  }
}
