import type { DetectionResult, FileCategory, SignalVote } from "@docpipe/types";
import {
  CATEGORY_PRIORITY,
  categoryForExtension,
  categoryForMime,
  loadFileTypeTable,
  type FileTypeTable,
} from "./file-types.js";
import { sniffContent } from "./sniff.js";

export interface SignalWeights {
  content: number;
  extension: number;
  mime: number;
}

/** Content sniffing is the most reliable signal and outweighs the other two together. */
export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = {
  content: 0.5,
  extension: 0.25,
  mime: 0.25,
};

/** Confidence reported when no signal recognizes the file. */
const UNKNOWN_CONFIDENCE = 0.1;

const GENERIC_MIME = "application/octet-stream";

function priorityOf(category: FileCategory): number {
  const idx = CATEGORY_PRIORITY.indexOf(category);
  return idx === -1 ? CATEGORY_PRIORITY.length : idx;
}

/**
 * Multi-signal file type detection. Each signal that recognizes the file
 * casts a weighted vote; the category with the largest total wins and the
 * confidence is the share of total signal weight that agrees with it.
 */
export class FileTypeDetector {
  private readonly table: FileTypeTable;
  private readonly weights: SignalWeights;

  constructor(options: { table?: FileTypeTable; weights?: SignalWeights } = {}) {
    this.table = options.table ?? loadFileTypeTable();
    this.weights = options.weights ?? { ...DEFAULT_SIGNAL_WEIGHTS };
  }

  detect(bytes: Uint8Array, filename: string, declaredMimeType: string): DetectionResult {
    const votes: SignalVote[] = [];

    const sniffed = sniffContent(bytes);
    if (sniffed) {
      votes.push({ signal: "content", category: sniffed.category, weight: this.weights.content });
    }

    const byExtension = categoryForExtension(this.table, filename);
    if (byExtension) {
      votes.push({ signal: "extension", category: byExtension.category, weight: this.weights.extension });
    }

    const byMime = categoryForMime(this.table, declaredMimeType);
    if (byMime) {
      votes.push({ signal: "mime", category: byMime, weight: this.weights.mime });
    }

    if (votes.length === 0) {
      return {
        category: "unknown",
        confidence: UNKNOWN_CONFIDENCE,
        mimeType: declaredMimeType || GENERIC_MIME,
        votes,
      };
    }

    const totals = new Map<FileCategory, number>();
    for (const vote of votes) {
      totals.set(vote.category, (totals.get(vote.category) ?? 0) + vote.weight);
    }

    let winner: FileCategory = "unknown";
    let best = -1;
    for (const [category, total] of totals) {
      const better = total > best || (total === best && priorityOf(category) < priorityOf(winner));
      if (better) {
        winner = category;
        best = total;
      }
    }

    const totalWeight = this.weights.content + this.weights.extension + this.weights.mime;
    const confidence = totalWeight > 0 ? Math.min(1, best / totalWeight) : 0;

    return {
      category: winner,
      confidence: Number(confidence.toFixed(4)),
      mimeType: this.resolveMime(winner, sniffed, byExtension, declaredMimeType),
      votes,
    };
  }

  /**
   * Most specific MIME agreeing with the winner: the extension's (it tells
   * .doc from .xls inside an OLE container), then the sniffed one, then the
   * declared one.
   */
  private resolveMime(
    winner: FileCategory,
    sniffed: { category: FileCategory; mimeType: string } | null,
    byExtension: { category: FileCategory; mimeType: string } | null,
    declared: string,
  ): string {
    if (byExtension?.category === winner) return byExtension.mimeType;
    if (sniffed?.category === winner) return sniffed.mimeType;
    return declared || GENERIC_MIME;
  }
}
