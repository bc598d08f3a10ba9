import type { ChunkResult, ChunkingRule } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { lines, numbered, spanPiece, windows, type Span } from "./units.js";

const TIME = String.raw`\d{1,2}:\d{2}(?::\d{2})?(?:\s?[AaPp][Mm])?`;
const DATE = String.raw`(?:\d{4}-\d{2}-\d{2}|\d{1,2}[/-]\d{1,2}[/-]\d{2,4})`;
const EVENT_START = new RegExp(String.raw`^\[?(?:${DATE}(?:[ T,]+${TIME})?|${TIME})\]?(?=[\s,:-]|$)`);

export function startsEvent(line: string): boolean {
  return EVENT_START.test(line);
}

/**
 * Incident timelines: each line starting with a date or time opens an
 * event that runs until the next one. Text before the first event is an
 * event of its own.
 */
export class EventChunker implements IChunker {
  readonly strategy = "event";

  chunk(content: string, rule: ChunkingRule): ChunkResult[] | null {
    const starts = lines(content).filter((line) => startsEvent(line.text));
    const first = starts[0];
    if (!first) return null;

    const events: Span[] = [];
    const push = (from: number, to: number) => {
      const raw = content.slice(from, to);
      const text = raw.trim();
      if (text.length === 0) return;
      const start = from + (raw.length - raw.trimStart().length);
      events.push({ text, start, end: start + text.length });
    };

    push(0, first.start);
    starts.forEach((line, i) => push(line.start, starts[i + 1]?.start ?? content.length));

    return numbered(
      windows(events, rule.maxUnits, rule.overlapUnits).map((w) => spanPiece(content, w.units, w.overlap)),
    );
  }
}
