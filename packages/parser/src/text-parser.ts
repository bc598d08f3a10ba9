import type { ParseResult } from "@docpipe/types";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/x-rst",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
  "text/xml",
];

/**
 * Plain text, markup and delimited-data parser. Form feeds split pages.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const text = typeof input === "string" ? input : new TextDecoder().decode(input);

    const cleanedText = mimeType === "text/html" ? this.stripHtml(text) : text;
    const nonEmpty = cleanedText.split("\f").filter((page) => page.trim().length > 0);
    const pages = (nonEmpty.length > 0 ? nonEmpty : [cleanedText]).map((page) => ({
      text: page,
      hasImages: false,
    }));

    return {
      text: pages.map((p) => p.text).join("\n\n"),
      pageCount: pages.length,
      pages,
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<\/(p|div|h[1-6]|li|tr|table|section)>/gi, "\n\n")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<[^>]+>/g, " ")
      .replace(/&nbsp;/g, " ")
      .replace(/&amp;/g, "&")
      .replace(/&lt;/g, "<")
      .replace(/&gt;/g, ">")
      .replace(/[ \t]+/g, " ")
      .replace(/ *\n */g, "\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }
}
