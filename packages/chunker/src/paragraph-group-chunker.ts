import type { ChunkResult, ChunkingRule } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { sectionsByHeading, type Section } from "./sections.js";
import { numbered, paragraphs, spanPiece, windows } from "./units.js";

const LEGAL_HEADING = /^(?:section|article|chapter|clause|part|schedule|regulation|rule)\s+(?:\d+[A-Za-z]?|[IVXLC]+)\b/i;

export function isLegalHeading(line: string): boolean {
  return line.length <= 120 && !line.endsWith(".") && LEGAL_HEADING.test(line);
}

/**
 * Regulatory and legal text: groups of paragraphs within each article or
 * section. Without headings the whole text is one section.
 */
export class ParagraphGroupChunker implements IChunker {
  readonly strategy = "paragraph_group";

  chunk(content: string, rule: ChunkingRule): ChunkResult[] {
    const found = sectionsByHeading(content, isLegalHeading);
    const sections: Section[] = found.length > 0 ? found : [{ start: 0, end: content.length }];

    return numbered(
      sections.flatMap((section) => {
        const units = paragraphs(content, section.start, section.end);
        if (section.title) units.unshift(section.title);
        const sectionTitle = section.title?.text;
        return windows(units, rule.maxUnits, rule.overlapUnits).map((w) =>
          spanPiece(content, w.units, w.overlap, sectionTitle === undefined ? {} : { sectionTitle }),
        );
      }),
    );
  }
}
