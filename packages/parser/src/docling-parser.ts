import { z } from "zod";
import { ExtractionError } from "@docpipe/errors";
import type { ParseResult } from "@docpipe/types";
import type { IParser } from "./parser.interface.js";
import { runProcess } from "./process.js";

const DOCLING_MIME_TYPES = [
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/msword",
  "application/vnd.ms-excel",
  "application/vnd.ms-powerpoint",
];

const doclingResultSchema = z.object({
  text: z.string(),
  page_count: z.number().int().nonnegative(),
  pages: z
    .array(z.object({ text: z.string(), has_images: z.boolean() }))
    .default([]),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * Python bridge to Docling for PDF and office parsing.
 * Spawns a Python child process that reads the file from stdin and prints JSON.
 */
export class DoclingParser implements IParser {
  readonly supportedMimeTypes = DOCLING_MIME_TYPES;
  private pythonPath: string;
  private scriptPath: string;

  constructor(pythonPath = "python3", scriptPath = "scripts/docling-parse.py") {
    this.pythonPath = pythonPath;
    this.scriptPath = scriptPath;
  }

  async parse(input: Uint8Array | string, mimeType: string, signal?: AbortSignal): Promise<ParseResult> {
    const bytes = typeof input === "string" ? Buffer.from(input) : input;

    const output = await runProcess(this.pythonPath, [this.scriptPath, "--mime-type", mimeType], bytes, {
      signal,
      service: "docling",
    });

    if (output.code !== 0) {
      throw new ExtractionError(
        `Docling parser exited with code ${String(output.code)}: ${output.stderr.trim()}`,
        "text",
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(output.stdout.toString("utf8"));
    } catch (err: unknown) {
      throw new ExtractionError("Docling printed malformed JSON", "text", { cause: err });
    }

    const parsed = doclingResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtractionError(`Unexpected Docling output: ${parsed.error.message}`, "text");
    }

    const result = parsed.data;
    return {
      text: result.text,
      pageCount: result.page_count,
      pages: result.pages.map((p) => ({ text: p.text, hasImages: p.has_images })),
      metadata: result.metadata,
    };
  }
}
