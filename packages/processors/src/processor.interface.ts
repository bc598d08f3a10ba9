import type { ExtractionContext, ExtractionResult, FileCategory, ProcessorName } from "@docpipe/types";

/**
 * Common contract of the format processors. Implementations throw
 * ExtractionError when the bytes cannot be turned into text and
 * TransientIOError when a converter call failed after retries. In-flight
 * converter calls are bounded by the retry policy's timeout only, never by
 * document cancellation.
 */
export interface IFormatProcessor {
  readonly name: ProcessorName;
  extract(
    bytes: Uint8Array,
    category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult>;
}
