import type { ChunkResult, ChunkingRule } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { sectionsByHeading } from "./sections.js";
import { numbered, paragraphs, sentences, spanPiece, windows, type Span } from "./units.js";

const MAX_HEADING_LENGTH = 80;
const NUMBERED = /^\d+(?:\.\d+)*[.)]?\s+\S/;
const LABELLED = /^(?:step|section|procedure|part|task|stage)\s+\d+\b/i;
const ALL_CAPS = /^\p{Lu}[\p{Lu}\p{N} ,&/()-]{2,}:?$/u;
const COLON_TITLE = /^[^:.!?]{2,60}:$/;

/** Procedure headings: numbered, labelled, upper-case or colon-terminated lines. */
export function isProcedureHeading(line: string): boolean {
  if (line.length > MAX_HEADING_LENGTH || /[.;,]$/.test(line)) return false;
  return NUMBERED.test(line) || LABELLED.test(line) || ALL_CAPS.test(line) || COLON_TITLE.test(line);
}

/**
 * Maintenance and procedural text: windows of sentences inside each
 * headed section. The heading is the first unit of its section and no
 * window crosses into the next section.
 */
export class SectionChunker implements IChunker {
  readonly strategy = "section";

  chunk(content: string, rule: ChunkingRule): ChunkResult[] | null {
    const sections = sectionsByHeading(content, isProcedureHeading);
    if (sections.length === 0) return null;

    return numbered(
      sections.flatMap((section) => {
        const units: Span[] = paragraphs(content, section.start, section.end).flatMap(sentences);
        if (section.title) units.unshift(section.title);
        const sectionTitle = section.title?.text;
        return windows(units, rule.maxUnits, rule.overlapUnits).map((w) =>
          spanPiece(content, w.units, w.overlap, sectionTitle === undefined ? {} : { sectionTitle }),
        );
      }),
    );
  }
}
