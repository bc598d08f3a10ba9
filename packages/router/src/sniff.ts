import type { FileCategory } from "@docpipe/types";

export interface SniffResult {
  category: FileCategory;
  mimeType: string;
}

const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];
const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const OOXML_PARTS: ReadonlyArray<{ marker: string; mimeType: string }> = [
  { marker: "word/", mimeType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document" },
  { marker: "xl/", mimeType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet" },
  { marker: "ppt/", mimeType: "application/vnd.openxmlformats-officedocument.presentationml.presentation" },
];

/** Bytes inspected when deciding whether content is text. */
const TEXT_SAMPLE_BYTES = 8192;

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((b, i) => bytes[offset + i] === b);
}

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1", start, end);
}

export function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Share of code points in a UTF-8 decode that are printable or ordinary
 * whitespace. Replacement characters from invalid sequences count against it.
 */
export function printableRatio(bytes: Uint8Array, limit = TEXT_SAMPLE_BYTES): number {
  const sample = bytes.subarray(0, limit);
  if (sample.length === 0) return 0;
  const text = new TextDecoder("utf-8", { fatal: false }).decode(sample);
  let printable = 0;
  let total = 0;
  for (const ch of text) {
    total += 1;
    const code = ch.codePointAt(0) ?? 0;
    if (code === 0xfffd) continue;
    if (code === 0x09 || code === 0x0a || code === 0x0d || code === 0x0c) printable += 1;
    else if (code >= 0x20 && code !== 0x7f && !(code >= 0x80 && code < 0xa0)) printable += 1;
  }
  return total === 0 ? 0 : printable / total;
}

function sniffZip(bytes: Uint8Array): SniffResult | null {
  const buffer = asBuffer(bytes);
  for (const part of OOXML_PARTS) {
    if (buffer.includes(part.marker, 0, "latin1")) {
      return { category: "office", mimeType: part.mimeType };
    }
  }
  return null;
}

function sniffText(bytes: Uint8Array): SniffResult | null {
  const head = ascii(bytes, 0, Math.min(bytes.length, 256)).trimStart();

  // DXF: group code 0 followed by SECTION on the next line
  if (/^0\r?\n\s*SECTION\r?\n/.test(head)) {
    return { category: "cad", mimeType: "image/vnd.dxf" };
  }
  if (head.startsWith("ISO-10303-21;")) {
    return { category: "cad", mimeType: "model/step" };
  }

  if (bytes.subarray(0, TEXT_SAMPLE_BYTES).includes(0) || printableRatio(bytes) < 0.95) return null;

  const lower = head.toLowerCase();
  if (lower.startsWith("<!doctype html") || lower.startsWith("<html")) {
    return { category: "text", mimeType: "text/html" };
  }
  if (lower.startsWith("<?xml")) {
    return { category: "text", mimeType: "application/xml" };
  }
  return { category: "text", mimeType: "text/plain" };
}

/**
 * Magic-byte and content sniffing. Returns null when nothing recognizable is
 * found, including generic ZIP archives that are not office containers.
 */
export function sniffContent(bytes: Uint8Array): SniffResult | null {
  if (bytes.length === 0) return null;

  const head = ascii(bytes, 0, Math.min(bytes.length, 16));

  if (head.startsWith("%PDF-")) return { category: "pdf", mimeType: "application/pdf" };
  if (startsWith(bytes, PNG_SIGNATURE)) return { category: "image", mimeType: "image/png" };
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return { category: "image", mimeType: "image/jpeg" };
  if (head.startsWith("GIF87a") || head.startsWith("GIF89a")) return { category: "image", mimeType: "image/gif" };
  if (head.startsWith("II*\0") || head.startsWith("MM\0*")) return { category: "image", mimeType: "image/tiff" };
  if (head.startsWith("RIFF") && head.slice(8, 12) === "WEBP") return { category: "image", mimeType: "image/webp" };
  if (head.startsWith("BM") && bytes.length >= 26 && startsWith(bytes, [0, 0, 0, 0], 6)) return { category: "image", mimeType: "image/bmp" };
  if (/^AC10\d\d/.test(head)) return { category: "cad", mimeType: "image/vnd.dwg" };
  if (head.startsWith("PK\x03\x04")) return sniffZip(bytes);
  if (startsWith(bytes, OLE_SIGNATURE)) return { category: "office", mimeType: "application/x-ole-storage" };

  return sniffText(bytes);
}
