import { lines, type Span } from "./units.js";

export interface Section {
  title?: Span;
  /** Body offsets, excluding the heading line. */
  start: number;
  end: number;
}

/**
 * Splits `source` at heading lines. Text before the first heading becomes
 * an untitled section. Returns an empty list when no line is a heading.
 */
export function sectionsByHeading(source: string, isHeading: (line: string) => boolean): Section[] {
  const headings = lines(source).filter((line) => isHeading(line.text));
  const first = headings[0];
  if (!first) return [];

  const sections: Section[] = [];
  if (source.slice(0, first.start).trim().length > 0) {
    sections.push({ start: 0, end: first.start });
  }
  headings.forEach((heading, i) => {
    sections.push({ title: heading, start: heading.end, end: headings[i + 1]?.start ?? source.length });
  });
  return sections;
}
