import type { ChunkResult } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { numbered } from "./units.js";

/** Engineering and CAD records stay whole: one chunk per document. */
export class MetadataRecordChunker implements IChunker {
  readonly strategy = "metadata_record";

  chunk(content: string): ChunkResult[] {
    const record = content.trim();
    if (record.length === 0) return [];
    const startChar = content.length - content.trimStart().length;
    return numbered([
      { content: record, metadata: { startChar, endChar: startChar + record.length, overlapUnits: 0 } },
    ]);
  }
}
