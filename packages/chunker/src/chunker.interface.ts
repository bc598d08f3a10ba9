import type { ChunkResult, ChunkStrategy, ChunkingRule } from "@docpipe/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  /**
   * Returns `null` when the text lacks the structure the strategy keys on
   * (no headings, timestamps or table rows); the caller then falls back to
   * paragraph chunking.
   */
  chunk(content: string, rule: ChunkingRule): ChunkResult[] | null;
}
