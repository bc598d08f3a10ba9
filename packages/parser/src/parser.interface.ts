import type { ParseResult } from "@docpipe/types";

export interface IParser {
  readonly supportedMimeTypes: string[];
  parse(input: Uint8Array | string, mimeType: string, signal?: AbortSignal): Promise<ParseResult>;
}
