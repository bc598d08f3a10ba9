import { RetryPolicy } from "@docpipe/errors";
import { ParserRegistry, TesseractOcrEngine, type IOcrEngine } from "@docpipe/parser";
import type { FileCategory } from "@docpipe/types";
import type { IFormatProcessor } from "./processor.interface.js";
import { TextDocumentProcessor, type ParserLookup } from "./text-processor.js";
import { ImageProcessor } from "./image-processor.js";
import { CadProcessor } from "./cad-processor.js";
import { FallbackProcessor } from "./fallback-processor.js";

/**
 * Category → processor table, resolved once at startup. Adding a type is a
 * `register` call.
 */
export class ProcessorRegistry {
  private readonly byCategory = new Map<FileCategory, IFormatProcessor>();

  constructor(readonly fallback: IFormatProcessor) {}

  register(category: FileCategory, processor: IFormatProcessor): this {
    this.byCategory.set(category, processor);
    return this;
  }

  /** Categories without a registered processor go to the fallback. */
  resolve(category: FileCategory): IFormatProcessor {
    return this.byCategory.get(category) ?? this.fallback;
  }
}

export interface ProcessorRegistryOptions {
  ocrLanguages: string[];
  /** Policy for OCR and document converter calls. */
  policy: RetryPolicy;
  parsers?: ParserLookup;
  ocr?: IOcrEngine;
  tesseractPath?: string;
}

export function createProcessorRegistry(options: ProcessorRegistryOptions): ProcessorRegistry {
  const parsers = options.parsers ?? new ParserRegistry();
  const ocr = options.ocr ?? new TesseractOcrEngine(options.tesseractPath);

  const text = new TextDocumentProcessor(parsers, options.policy);
  const image = new ImageProcessor(ocr, options.ocrLanguages, options.policy);
  const cad = new CadProcessor();
  const fallback = new FallbackProcessor(text, image);

  return new ProcessorRegistry(fallback)
    .register("text", text)
    .register("pdf", text)
    .register("office", text)
    .register("image", image)
    .register("cad", cad);
}
