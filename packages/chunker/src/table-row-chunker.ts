import type { ChunkResult, ChunkingRule } from "@docpipe/types";
import type { IChunker } from "./chunker.interface.js";
import { adjacent, lines, numbered, spanPiece, windows, type Piece, type Span } from "./units.js";

const AMOUNT = /(?<![\p{L}\p{N}])[₹$€£]?-?(?:\d{1,3}(?:,\d{2,3})+|\d+)(?:\.\d+)?%?(?![\p{L}\p{N}])/gu;
const MAX_HEADER_LENGTH = 120;

interface RowBlock {
  kind: "rows";
  header?: Span;
  rows: Span[];
}

interface Prose {
  kind: "prose";
  lines: Span[];
}

function pipeCells(line: string): string[] {
  if (!line.includes("|")) return [];
  return line
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split("|")
    .map((cell) => cell.trim());
}

/** A pipe-delimited line with two filled cells, or a line carrying two amounts. */
export function isTableRow(line: string): boolean {
  const filled = pipeCells(line).filter((cell) => cell.length > 0).length;
  return filled >= 2 || (line.match(AMOUNT) ?? []).length >= 2;
}

function isContinuation(line: string): boolean {
  const cells = pipeCells(line);
  if (cells.length > 1) return cells[0] === "" && cells.some((cell) => cell.length > 0);
  return /^\p{Ll}/u.test(line) && !isTableRow(line);
}

function isHeaderText(line: string): boolean {
  return line.length <= MAX_HEADER_LENGTH && !/\d/.test(line);
}

/**
 * Financial tables: one chunk per row (or per `maxUnits` rows) with the
 * table header repeated at the top of every chunk. Wrapped rows and rows
 * whose first cell is empty merge into the row above. Prose between
 * tables is chunked one paragraph at a time.
 */
export class TableRowChunker implements IChunker {
  readonly strategy = "table_row";

  chunk(content: string, rule: ChunkingRule): ChunkResult[] | null {
    const blocks = this.blocks(content);
    if (!blocks.some((block) => block.kind === "rows")) return null;

    const pieces: Array<Piece | null> = [];
    for (const block of blocks) {
      if (block.kind === "prose") {
        pieces.push(spanPiece(content, block.lines, 0));
        continue;
      }
      const { header, rows } = block;
      if (rows.length === 0) {
        if (header) pieces.push(spanPiece(content, [header], 0));
        continue;
      }
      for (const w of windows(rows, rule.maxUnits, rule.overlapUnits)) {
        const piece = spanPiece(content, w.units, w.overlap, header ? { header: header.text } : {});
        if (piece && header) piece.content = `${header.text}\n${piece.content}`;
        pieces.push(piece);
      }
    }
    return numbered(pieces);
  }

  private blocks(content: string): Array<RowBlock | Prose> {
    const blocks: Array<RowBlock | Prose> = [];
    let previous: Span | undefined;

    for (const line of lines(content)) {
      const touching = previous !== undefined && adjacent(content, previous, line);
      const current = blocks[blocks.length - 1];
      previous = line;

      if (current?.kind === "rows" && touching && current.rows.length > 0 && isContinuation(line.text)) {
        const last = current.rows[current.rows.length - 1];
        if (last) current.rows[current.rows.length - 1] = { ...last, text: content.slice(last.start, line.end), end: line.end };
        continue;
      }

      if (isTableRow(line.text)) {
        let block = current?.kind === "rows" && touching ? current : undefined;
        if (!block) {
          block = { kind: "rows", rows: [] };
          if (current?.kind === "prose" && touching) {
            const candidate = current.lines[current.lines.length - 1];
            if (candidate && isHeaderText(candidate.text)) {
              block.header = candidate;
              current.lines.pop();
              if (current.lines.length === 0) blocks.pop();
            }
          }
          blocks.push(block);
          if (!block.header && pipeCells(line.text).length > 1 && isHeaderText(line.text)) {
            block.header = line;
            continue;
          }
        }
        block.rows.push(line);
        continue;
      }

      if (current?.kind === "prose" && touching) current.lines.push(line);
      else blocks.push({ kind: "prose", lines: [line] });
    }
    return blocks;
  }
}
