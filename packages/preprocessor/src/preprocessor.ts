import type { ExtractionResult, PreprocessedText } from "@docpipe/types";
import { dedupeFragments, normalizeWhitespace } from "./normalize.js";
import { applyOcrCorrections } from "./ocr-corrections.js";
import { detectLanguage, needsTranslation } from "./language.js";

export interface PreprocessorOptions {
  /** OCR text below this confidence gets the correction table. */
  correctionConfidence: number;
}

/**
 * Cleans extracted text fragment by fragment, fixes known OCR confusions on
 * low-confidence OCR output, drops duplicate fragments and tags language.
 */
export class Preprocessor {
  constructor(private readonly options: PreprocessorOptions) {}

  process(extraction: ExtractionResult): PreprocessedText {
    const source = extraction.fragments.length > 0 ? extraction.fragments : [extraction.text];
    const correct =
      extraction.ocrConfidence !== null && extraction.ocrConfidence < this.options.correctionConfidence;

    let correctionsApplied = 0;
    const cleaned = source.map((fragment) => {
      const normalized = normalizeWhitespace(fragment);
      if (!correct) return normalized;
      const result = applyOcrCorrections(normalized);
      correctionsApplied += result.corrections;
      return result.text;
    });

    const { kept, dropped } = dedupeFragments(cleaned);
    const text = kept.join("\n\n");
    const { language } = detectLanguage(text);

    return {
      text,
      fragments: kept,
      language,
      needsTranslation: needsTranslation(language),
      correctionsApplied,
      duplicatesDropped: dropped,
      confidence: extraction.ocrConfidence ?? extraction.extractionConfidence,
    };
  }
}
