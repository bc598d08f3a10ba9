import { ExtractionError, FallbackChain, InvariantViolationError, summarizeError } from "@docpipe/errors";
import type { ExtractionContext, ExtractionResult, FileCategory } from "@docpipe/types";
import type { IFormatProcessor } from "./processor.interface.js";

/** Minimum share of printable characters for a best-effort text read. */
const MIN_PRINTABLE_RATIO = 0.6;

function printableShare(text: string): number {
  let total = 0;
  let printable = 0;
  for (const ch of text) {
    total += 1;
    const code = ch.codePointAt(0) ?? 0;
    if (code === 0xfffd) continue;
    if (code === 0x09 || code === 0x0a || code === 0x0d || (code >= 0x20 && code !== 0x7f)) printable += 1;
  }
  return total === 0 ? 0 : printable / total;
}

/**
 * Best-effort extraction for unknown or misbehaving input: the text
 * processor, then OCR, in that order, minus any processor that already
 * failed on the same bytes. When nothing succeeds the result is empty, has
 * confidence 0 and asks for human review.
 */
export class FallbackProcessor implements IFormatProcessor {
  readonly name = "fallback" as const;

  constructor(
    private readonly text: IFormatProcessor,
    private readonly image: IFormatProcessor,
  ) {}

  async extract(
    bytes: Uint8Array,
    category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const attempted = new Set(context.attempted ?? []);
    const legs = [
      { processor: this.text, run: () => this.readText(bytes, category, context) },
      { processor: this.image, run: () => this.image.extract(bytes, "image", context) },
    ];
    const chain = new FallbackChain<ExtractionResult>(
      legs
        .filter((leg) => !attempted.has(leg.processor.name))
        .map((leg) => ({ name: leg.processor.name, run: leg.run })),
      (err) => !(err instanceof InvariantViolationError),
    );

    const outcome = await chain.run();
    const warnings = outcome.failures.map((f) => `${f.name}: ${summarizeError(f.error)}`);

    if (outcome.ok) {
      return {
        ...outcome.value,
        processor: this.name,
        warnings: [...warnings, ...outcome.value.warnings],
        metadata: { ...outcome.value.metadata, delegate: outcome.name },
      };
    }

    const fatal = outcome.failures.find((f) => f.error instanceof InvariantViolationError);
    if (fatal) throw fatal.error;

    return {
      processor: this.name,
      text: "",
      fragments: [],
      extractionConfidence: 0,
      ocrConfidence: null,
      humanReview: true,
      warnings,
      metadata: { attempts: chain.names },
    };
  }

  private async readText(
    bytes: Uint8Array,
    category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const textCategory = category === "pdf" || category === "office" ? category : "text";
    const result = await this.text.extract(bytes, textCategory, context);
    if (printableShare(result.text) < MIN_PRINTABLE_RATIO) {
      throw new ExtractionError("Content is not readable text", this.text.name);
    }
    return result;
  }
}
