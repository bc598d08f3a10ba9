import type { Language } from "./document.js";

export type ProcessorName = "text" | "image" | "cad" | "fallback";

export interface ExtractionResult {
  processor: ProcessorName;
  text: string;
  /** Page- or part-level fragments in source order; joined they form `text`. */
  fragments: string[];
  extractionConfidence: number;
  /** Set only when OCR produced the text. */
  ocrConfidence: number | null;
  humanReview: boolean;
  warnings: string[];
  metadata: Record<string, unknown>;
}

export interface ExtractionContext {
  documentId: string;
  filename: string;
  mimeType: string;
  /** The bytes already went through the single enhancement pass. */
  enhanced: boolean;
  /** Processors that already failed on these bytes; the fallback skips them. */
  attempted?: readonly ProcessorName[];
}

export interface PreprocessedText {
  text: string;
  fragments: string[];
  language: Language;
  needsTranslation: boolean;
  correctionsApplied: number;
  duplicatesDropped: number;
  confidence: number;
}

export interface ParseResult {
  text: string;
  pageCount: number;
  pages: ParsedPage[];
  metadata: Record<string, unknown>;
}

export interface ParsedPage {
  text: string;
  hasImages: boolean;
}

export interface OcrWord {
  text: string;
  /** Engine confidence in [0, 100]; negative for non-word boxes. */
  confidence: number;
  line: number;
  paragraph: number;
  block: number;
}

export interface OcrResult {
  text: string;
  confidence: number;
  words: OcrWord[];
  languages: string[];
}
