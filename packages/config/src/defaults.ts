import { readFileSync } from "node:fs";
import { z } from "zod";
import type {
  ChunkingRule,
  DocumentType,
  ImageQualityWeights,
  TriggerCategoryDefinition,
} from "@docpipe/types";

/** Units, sizes and overlaps per document type; callers override per key. */
export const DEFAULT_CHUNK_TABLE: Readonly<Record<DocumentType, ChunkingRule>> = {
  engineering: { strategy: "metadata_record", maxUnits: 1, overlapUnits: 0 },
  maintenance: { strategy: "section", maxUnits: 3, overlapUnits: 1 },
  incident: { strategy: "event", maxUnits: 4, overlapUnits: 1 },
  financial: { strategy: "table_row", maxUnits: 1, overlapUnits: 0 },
  regulatory: { strategy: "paragraph_group", maxUnits: 3, overlapUnits: 1 },
  unclassified: { strategy: "paragraph", maxUnits: 4, overlapUnits: 1 },
};

export const DEFAULT_IMAGE_QUALITY_WEIGHTS: Readonly<ImageQualityWeights> = {
  sharpness: 0.3,
  contrast: 0.2,
  brightness: 0.2,
  noise: 0.2,
  resolution: 0.1,
};

export const triggerCategorySchema = z.object({
  name: z.string().min(1),
  phrases: z.array(z.string().min(1)).min(1),
  threshold: z.number().min(-1).max(1),
  priority: z.enum(["low", "medium", "high", "critical"]),
  recipients: z.array(z.string().min(1)).min(1),
});

const TRIGGER_CATEGORIES_FILE = new URL("../data/trigger-categories.json", import.meta.url);

/**
 * Reads and validates a trigger category file. Defaults to the bundled set
 * (urgent maintenance, safety incident, compliance violation, approaching
 * deadline, exceeded budget).
 */
export function loadTriggerCategories(file: URL | string = TRIGGER_CATEGORIES_FILE): TriggerCategoryDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return z.array(triggerCategorySchema).parse(raw);
}

/** Applies `name=value` threshold overrides; unknown names are ignored. */
export function applyThresholdOverrides(
  categories: TriggerCategoryDefinition[],
  overrides: Record<string, number>,
): TriggerCategoryDefinition[] {
  return categories.map((c) => {
    const threshold = overrides[c.name];
    return threshold === undefined ? c : { ...c, threshold };
  });
}
