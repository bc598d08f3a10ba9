import { ExtractionError, RetryPolicy } from "@docpipe/errors";
import { TextParser, type IParser } from "@docpipe/parser";
import type { ExtractionContext, ExtractionResult, FileCategory } from "@docpipe/types";
import type { IFormatProcessor } from "./processor.interface.js";

/** Confidence of a complete text layer; scaled down by pages without text. */
const STRUCTURED_CONFIDENCE = 0.9;
const PLAIN_TEXT_CONFIDENCE = 0.95;

export interface ParserLookup {
  getParser(mimeType: string): IParser;
}

const CATEGORY_MIME_DEFAULTS: Partial<Record<FileCategory, string>> = {
  pdf: "application/pdf",
  office: "application/msword",
};

/**
 * Office, PDF and plain-text extraction through the structured-document
 * parsers. PDFs use their text layer only; pages that carry images but no
 * text are reported as mixed-content loss rather than dropped silently.
 */
export class TextDocumentProcessor implements IFormatProcessor {
  readonly name = "text" as const;

  constructor(
    private readonly parsers: ParserLookup,
    private readonly policy: RetryPolicy,
  ) {}

  async extract(
    bytes: Uint8Array,
    category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const mimeType = this.resolveMime(category, context.mimeType);
    const parser = this.parsers.getParser(mimeType);

    const parsed = await this.policy.execute(
      (signal) => parser.parse(bytes, mimeType, signal),
      "docling",
    );

    const pages = parsed.pages.length > 0 ? parsed.pages : [{ text: parsed.text, hasImages: false }];
    const fragments = pages.map((p) => p.text.trim()).filter((t) => t.length > 0);
    if (fragments.length === 0) {
      throw new ExtractionError(`No extractable text in ${context.filename}`, this.name);
    }

    const imageOnlyPages = pages
      .map((p, i) => ({ page: i + 1, empty: p.text.trim().length === 0, hasImages: p.hasImages }))
      .filter((p) => p.empty && p.hasImages)
      .map((p) => p.page);

    const warnings: string[] = [];
    const metadata: Record<string, unknown> = {
      ...parsed.metadata,
      mimeType,
      pageCount: parsed.pageCount,
      pagesWithText: fragments.length,
    };

    if (imageOnlyPages.length > 0) {
      metadata["imageOnlyPages"] = imageOnlyPages;
      metadata["mixedContentLoss"] = true;
      warnings.push(
        `Pages ${imageOnlyPages.join(", ")} contain only images; their content is not extracted`,
      );
    }

    const base = parser instanceof TextParser ? PLAIN_TEXT_CONFIDENCE : STRUCTURED_CONFIDENCE;
    const extractionConfidence = base * (fragments.length / pages.length);

    return {
      processor: this.name,
      text: fragments.join("\n\n"),
      fragments,
      extractionConfidence,
      ocrConfidence: null,
      humanReview: false,
      warnings,
      metadata,
    };
  }

  /** Containers sniffed without a precise type still go to the document converter. */
  private resolveMime(category: FileCategory, mimeType: string): string {
    const fallback = CATEGORY_MIME_DEFAULTS[category];
    if (fallback && this.parsers.getParser(mimeType) instanceof TextParser) {
      return fallback;
    }
    return mimeType;
  }
}
