import type { ChunkMetadata, ChunkResult } from "@docpipe/types";

/** A trimmed slice of the source text with absolute offsets. */
export interface Span {
  text: string;
  start: number;
  end: number;
}

export interface Window<T> {
  units: T[];
  /** Units repeated from the previous window. */
  overlap: number;
}

export interface Piece {
  content: string;
  metadata: ChunkMetadata;
}

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_BREAK = /(?<=[.!?।])\s+/;
const LINE_BREAK = /\n/;

export function splitSpans(text: string, separator: RegExp, base = 0): Span[] {
  const flags = separator.flags.includes("g") ? separator.flags : `${separator.flags}g`;
  const spans: Span[] = [];
  let cursor = 0;
  for (const match of text.matchAll(new RegExp(separator.source, flags))) {
    const at = match.index ?? cursor;
    pushTrimmed(spans, text, cursor, at, base);
    cursor = at + match[0].length;
  }
  pushTrimmed(spans, text, cursor, text.length, base);
  return spans;
}

function pushTrimmed(spans: Span[], text: string, from: number, to: number, base: number): void {
  const raw = text.slice(from, to);
  const body = raw.trim();
  if (body.length === 0) return;
  const start = base + from + (raw.length - raw.trimStart().length);
  spans.push({ text: body, start, end: start + body.length });
}

/** Spans of `source` between `start` and `end`, split on blank lines. */
export function paragraphs(source: string, start = 0, end = source.length): Span[] {
  return splitSpans(source.slice(start, end), PARAGRAPH_BREAK, start);
}

export function sentences(span: Span): Span[] {
  return splitSpans(span.text, SENTENCE_BREAK, span.start);
}

export function lines(source: string): Span[] {
  return splitSpans(source, LINE_BREAK);
}

/** True when only a single line break separates the two spans. */
export function adjacent(source: string, before: Span, after: Span): boolean {
  return !PARAGRAPH_BREAK.test(source.slice(before.end, after.start));
}

/**
 * Fixed-size windows over `units`, each repeating `overlap` units of the
 * previous one. The last window always reaches the final unit.
 */
export function windows<T>(units: T[], maxUnits: number, overlap: number): Window<T>[] {
  const size = Math.max(1, maxUnits);
  const step = Math.max(1, size - Math.max(0, overlap));
  const out: Window<T>[] = [];
  for (let i = 0; i < units.length; i += step) {
    out.push({ units: units.slice(i, i + size), overlap: i === 0 ? 0 : size - step });
    if (i + size >= units.length) break;
  }
  return out;
}

/** A piece covering the source text from the first to the last span. */
export function spanPiece(
  source: string,
  group: Span[],
  overlap: number,
  extra: Partial<ChunkMetadata> = {},
): Piece | null {
  const first = group[0];
  const last = group[group.length - 1];
  if (!first || !last) return null;
  return {
    content: source.slice(first.start, last.end),
    metadata: { startChar: first.start, endChar: last.end, overlapUnits: overlap, ...extra },
  };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function numbered(pieces: Array<Piece | null>): ChunkResult[] {
  const results: ChunkResult[] = [];
  for (const piece of pieces) {
    if (!piece) continue;
    results.push({
      content: piece.content,
      index: results.length,
      wordCount: countWords(piece.content),
      metadata: piece.metadata,
    });
  }
  return results;
}
