import type { ChunkStrategy } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { MetadataRecordChunker } from "./metadata-record-chunker.js";
import { SectionChunker } from "./section-chunker.js";
import { EventChunker } from "./event-chunker.js";
import { TableRowChunker } from "./table-row-chunker.js";
import { ParagraphGroupChunker } from "./paragraph-group-chunker.js";
import { ParagraphChunker } from "./paragraph-chunker.js";

export function createChunker(strategy: ChunkStrategy): IChunker {
  switch (strategy) {
    case "metadata_record":
      return new MetadataRecordChunker();
    case "section":
      return new SectionChunker();
    case "event":
      return new EventChunker();
    case "table_row":
      return new TableRowChunker();
    case "paragraph_group":
      return new ParagraphGroupChunker();
    case "paragraph":
      return new ParagraphChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
