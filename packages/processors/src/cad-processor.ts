import type { ExtractionContext, ExtractionResult, FileCategory } from "@docpipe/types";
import type { IFormatProcessor } from "./processor.interface.js";
import {
  CAD_FORMATS,
  formatFor,
  readDwg,
  readDxf,
  readIges,
  readStep,
  type CadFormat,
  type TitleBlock,
} from "./cad-metadata.js";

const CAD_CONFIDENCE = 0.6;

export const SPECIALIZED_VIEWER_MARKER = "[FLAGGED FOR SPECIALIZED VIEWER]";

function readTitleBlock(format: CadFormat | null, bytes: Uint8Array): TitleBlock {
  switch (format) {
    case "dxf":
      return readDxf(bytes);
    case "dwg":
      return readDwg(bytes);
    case "step":
      return readStep(bytes);
    case "iges":
      return readIges(bytes);
    case null:
      return {};
  }
}

/**
 * Metadata-only handling of drawings and models: container-level fields
 * plus a short placeholder text. Geometry is never parsed.
 */
export class CadProcessor implements IFormatProcessor {
  readonly name = "cad" as const;

  async extract(
    bytes: Uint8Array,
    _category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const format = formatFor(context.filename, context.mimeType);
    const info = format ? CAD_FORMATS[format] : null;
    const block = readTitleBlock(format, bytes);

    const lines = [
      `Technical file: ${context.filename}`,
      `Format: ${info?.label ?? "Unrecognized CAD format"}`,
      `Category: ${info?.formatCategory ?? "Technical Drawing"}`,
    ];
    if (block.title) lines.push(`Title: ${block.title}`);
    if (block.drawingNumber) lines.push(`Drawing number: ${block.drawingNumber}`);
    if (block.revision) lines.push(`Revision: ${block.revision}`);
    if (block.scale) lines.push(`Scale: ${block.scale}`);
    if (block.release ?? block.version) lines.push(`Version: ${block.release ?? block.version ?? ""}`);
    if (block.description) lines.push(`Description: ${block.description}`);
    lines.push(
      `${SPECIALIZED_VIEWER_MARKER} Open with ${info?.viewerRecommendation ?? "CAD software"} for full content.`,
    );

    const text = lines.join("\n");
    const warnings = Object.keys(block).length === 0 ? ["No container metadata found"] : [];

    return {
      processor: this.name,
      text,
      fragments: [text],
      extractionConfidence: CAD_CONFIDENCE,
      ocrConfidence: null,
      humanReview: false,
      warnings,
      metadata: {
        ...block,
        format: format ?? "unknown",
        formatCategory: info?.formatCategory ?? null,
        viewerRecommendation: info?.viewerRecommendation ?? null,
        requiresSpecializedViewer: true,
        sizeBytes: bytes.byteLength,
      },
    };
  }
}
