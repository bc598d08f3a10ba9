import { readFileSync } from "node:fs";
import { z } from "zod";
import type { DocumentType, FileCategory } from "@docpipe/types";

const keywordTableSchema = z.object({
  minimumHits: z.number().int().positive(),
  types: z
    .array(
      z.object({
        type: z.enum(["maintenance", "incident", "financial", "regulatory"]),
        keywords: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

export type KeywordTable = z.infer<typeof keywordTableSchema>;

const KEYWORDS_FILE = new URL("../data/document-type-keywords.json", import.meta.url);

export function loadKeywordTable(file: URL | string = KEYWORDS_FILE): KeywordTable {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return keywordTableSchema.parse(raw);
}

function escape(keyword: string): string {
  return keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface CompiledType {
  type: DocumentType;
  patterns: RegExp[];
}

/**
 * Picks the chunking document type. CAD files are always engineering
 * records; other text is scored by how many distinct keywords of each type
 * it contains. Fewer than `minimumHits` leaves it unclassified; ties go to
 * the type listed first.
 */
export class DocumentTypeClassifier {
  private readonly types: CompiledType[];
  private readonly minimumHits: number;

  constructor(table: KeywordTable = loadKeywordTable()) {
    this.minimumHits = table.minimumHits;
    this.types = table.types.map(({ type, keywords }) => ({
      type,
      patterns: keywords.map(
        (keyword) => new RegExp(`(?<![\\p{L}\\p{M}\\p{N}])${escape(keyword.toLowerCase())}(?![\\p{L}\\p{M}\\p{N}])`, "u"),
      ),
    }));
  }

  classify(text: string, category: FileCategory): DocumentType {
    if (category === "cad") return "engineering";

    const lower = text.toLowerCase();
    let best: DocumentType = "unclassified";
    let bestHits = this.minimumHits - 1;
    for (const { type, patterns } of this.types) {
      const hits = patterns.filter((pattern) => pattern.test(lower)).length;
      if (hits > bestHits) {
        best = type;
        bestHits = hits;
      }
    }
    return best;
  }
}
