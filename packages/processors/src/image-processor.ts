import { ExtractionError, RetryPolicy } from "@docpipe/errors";
import { enhanceImage, type EnhancedImage, type IOcrEngine } from "@docpipe/parser";
import type { ExtractionContext, ExtractionResult, FileCategory } from "@docpipe/types";
import type { IFormatProcessor } from "./processor.interface.js";

/**
 * Denoise, contrast normalization and sharpening followed by one OCR pass
 * with every configured language loaded at once. Bytes that already went
 * through the enhancement pass are not enhanced again.
 */
export class ImageProcessor implements IFormatProcessor {
  readonly name = "image" as const;

  constructor(
    private readonly ocr: IOcrEngine,
    private readonly languages: string[],
    private readonly policy: RetryPolicy,
  ) {}

  async extract(
    bytes: Uint8Array,
    _category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const image: EnhancedImage | null = context.enhanced ? null : await enhanceImage(bytes);
    const input = image ? image.bytes : bytes;

    const ocr = await this.policy.execute(
      (signal) => this.ocr.recognize(input, this.languages, signal),
      "ocr",
    );

    const text = ocr.text.trim();
    if (text.length === 0) {
      throw new ExtractionError(`OCR found no text in ${context.filename}`, this.name);
    }

    const fragments = text
      .split(/\n{2,}/)
      .map((f) => f.trim())
      .filter((f) => f.length > 0);

    return {
      processor: this.name,
      text,
      fragments,
      extractionConfidence: ocr.confidence,
      ocrConfidence: ocr.confidence,
      humanReview: false,
      warnings: [],
      metadata: {
        ocrEngine: this.ocr.name,
        languages: ocr.languages,
        wordCount: ocr.words.length,
        enhancementSteps: image ? image.steps : [],
        enhancedEarlier: context.enhanced,
        ...(image ? { width: image.width, height: image.height } : {}),
      },
    };
  }
}
