import { TransientIOError } from "@docpipe/errors";
import type { OcrResult, OcrWord } from "@docpipe/types";
import { runProcess } from "./process.js";

export interface IOcrEngine {
  readonly name: string;
  /** Single pass over all `languages` at once. */
  recognize(image: Uint8Array, languages: string[], signal?: AbortSignal): Promise<OcrResult>;
}

const TSV_COLUMNS = 12;
const WORD_LEVEL = "5";

/**
 * Parse Tesseract's TSV output into words, layout-preserving text and a
 * single confidence in [0, 1]: the mean word confidence weighted by word
 * length, so one confidently-read character does not outweigh a long
 * uncertain word.
 */
export function parseTesseractTsv(tsv: string): { text: string; confidence: number; words: OcrWord[] } {
  const words: OcrWord[] = [];

  for (const line of tsv.split(/\r?\n/).slice(1)) {
    const cols = line.split("\t");
    if (cols.length < TSV_COLUMNS || cols[0] !== WORD_LEVEL) continue;

    const text = cols.slice(11).join("\t").trim();
    const confidence = Number(cols[10]);
    if (text.length === 0 || !Number.isFinite(confidence) || confidence < 0) continue;

    words.push({
      text,
      confidence,
      block: Number(cols[2]),
      paragraph: Number(cols[3]),
      line: Number(cols[4]),
    });
  }

  let weighted = 0;
  let totalLength = 0;
  for (const word of words) {
    weighted += word.confidence * word.text.length;
    totalLength += word.text.length;
  }
  const confidence = totalLength === 0 ? 0 : weighted / totalLength / 100;

  return { text: layoutText(words), confidence: Math.min(1, Math.max(0, confidence)), words };
}

function layoutText(words: OcrWord[]): string {
  let out = "";
  let prev: OcrWord | undefined;
  for (const word of words) {
    if (prev === undefined) {
      out = word.text;
    } else if (prev.block !== word.block || prev.paragraph !== word.paragraph) {
      out += `\n\n${word.text}`;
    } else if (prev.line !== word.line) {
      out += `\n${word.text}`;
    } else {
      out += ` ${word.text}`;
    }
    prev = word;
  }
  return out;
}

/**
 * Tesseract CLI engine. The image goes in on stdin and TSV comes back on
 * stdout; `-l eng+mal` runs both language models in one pass.
 */
export class TesseractOcrEngine implements IOcrEngine {
  readonly name = "tesseract";

  constructor(
    private readonly binaryPath = "tesseract",
    private readonly pageSegmentationMode = 6,
  ) {}

  async recognize(image: Uint8Array, languages: string[], signal?: AbortSignal): Promise<OcrResult> {
    const args = [
      "stdin",
      "stdout",
      "-l",
      languages.join("+"),
      "--oem",
      "1",
      "--psm",
      String(this.pageSegmentationMode),
      "tsv",
    ];

    const output = await runProcess(this.binaryPath, args, image, { signal, service: "ocr" });

    if (output.code !== 0) {
      throw new TransientIOError(
        `Tesseract exited with code ${String(output.code)}: ${output.stderr.trim()}`,
        "ocr",
      );
    }

    const parsed = parseTesseractTsv(output.stdout.toString("utf8"));
    return { ...parsed, languages };
  }
}
