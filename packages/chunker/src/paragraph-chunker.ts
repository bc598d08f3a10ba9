import type { ChunkResult, ChunkingRule } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { numbered, paragraphs, sentences, spanPiece, windows } from "./units.js";

/**
 * Default strategy. Sentences are grouped within each paragraph, so a chunk
 * never crosses a blank line.
 */
export class ParagraphChunker implements IChunker {
  readonly strategy = "paragraph";

  chunk(content: string, rule: ChunkingRule): ChunkResult[] {
    return numbered(
      paragraphs(content).flatMap((paragraph) =>
        windows(sentences(paragraph), rule.maxUnits, rule.overlapUnits).map((w) =>
          spanPiece(content, w.units, w.overlap),
        ),
      ),
    );
  }
}
