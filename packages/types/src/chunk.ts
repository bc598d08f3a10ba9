import type { Language } from "./document.js";

export type DocumentType =
  | "engineering"
  | "maintenance"
  | "incident"
  | "financial"
  | "regulatory"
  | "unclassified";

export type ChunkStrategy =
  | "metadata_record"
  | "section"
  | "event"
  | "table_row"
  | "paragraph_group"
  | "paragraph";

export interface ChunkingRule {
  strategy: ChunkStrategy;
  /** Upper bound of units (sentences, rows, paragraphs) per chunk. */
  maxUnits: number;
  /** Units repeated from the end of the previous chunk. */
  overlapUnits: number;
}

export type ChunkingTable = Partial<Record<DocumentType, ChunkingRule>>;

export interface ChunkMetadata {
  startChar: number;
  endChar: number;
  sectionTitle?: string;
  header?: string;
  overlapUnits: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  wordCount: number;
  metadata: ChunkMetadata;
}

export interface Chunk {
  /** `${documentId}:${index}` */
  id: string;
  documentId: string;
  index: number;
  totalChunks: number;
  text: string;
  chunkType: ChunkStrategy;
  language: Language;
  needsTranslation: boolean;
  wordCount: number;
  confidence: number;
  metadata: ChunkMetadata;
}
