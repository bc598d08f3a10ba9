import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { DoclingParser } from "./docling-parser.js";

export interface ParserRegistryOptions {
  doclingPython?: string;
  doclingScript?: string;
}

export class ParserRegistry {
  private readonly textParser = new TextParser();
  private readonly parsers: IParser[];

  constructor(options: ParserRegistryOptions = {}) {
    this.parsers = [this.textParser, new DoclingParser(options.doclingPython, options.doclingScript)];
  }

  /**
   * Select the parser for a MIME type, defaulting to the text parser.
   */
  getParser(mimeType: string): IParser {
    return this.parsers.find((p) => p.supportedMimeTypes.includes(mimeType)) ?? this.textParser;
  }
}
