import { DEFAULT_CHUNK_TABLE } from "@docpipe/config";
import { detectLanguage, needsTranslation } from "@docpipe/preprocessor";
import type { Chunk, ChunkStrategy, ChunkingRule, ChunkingTable, DocumentType } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { createChunker } from "./factory.js";

export interface ChunkInput {
  documentId: string;
  text: string;
  documentType: DocumentType;
  needsTranslation: boolean;
  confidence: number;
}

export interface ChunkOutput {
  strategy: ChunkStrategy;
  chunks: Chunk[];
}

/**
 * Dispatches on document type through the chunking table and turns the
 * strategy output into Chunk records. A strategy that finds none of the
 * structure it needs hands over to paragraph chunking.
 */
export class DocumentChunker {
  private readonly table: Record<DocumentType, ChunkingRule>;
  private readonly chunkers = new Map<ChunkStrategy, IChunker>();

  constructor(overrides: ChunkingTable = {}) {
    this.table = { ...DEFAULT_CHUNK_TABLE, ...overrides };
  }

  ruleFor(documentType: DocumentType): ChunkingRule {
    return this.table[documentType];
  }

  chunk(input: ChunkInput): ChunkOutput {
    const rule = this.ruleFor(input.documentType);
    let strategy = rule.strategy;
    let results = this.chunker(strategy).chunk(input.text, rule);

    if (results === null) {
      strategy = "paragraph";
      results = this.chunker(strategy).chunk(input.text, this.table.unclassified) ?? [];
    }

    const totalChunks = results.length;
    const chunks = results.map((result): Chunk => {
      const { language } = detectLanguage(result.content);
      return {
        id: `${input.documentId}:${result.index}`,
        documentId: input.documentId,
        index: result.index,
        totalChunks,
        text: result.content,
        chunkType: strategy,
        language,
        needsTranslation: input.needsTranslation && needsTranslation(language),
        wordCount: result.wordCount,
        confidence: input.confidence,
        metadata: result.metadata,
      };
    });
    return { strategy, chunks };
  }

  private chunker(strategy: ChunkStrategy): IChunker {
    let chunker = this.chunkers.get(strategy);
    if (!chunker) {
      chunker = createChunker(strategy);
      this.chunkers.set(strategy, chunker);
    }
    return chunker;
  }
}
