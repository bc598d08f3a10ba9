import { readFileSync } from "node:fs";
import { z } from "zod";
import type { FileCategory } from "@docpipe/types";

const categorySchema = z.enum(["text", "image", "pdf", "office", "cad", "unknown"]);

const fileTypeTableSchema = z.object({
  extensions: z.record(z.object({ category: categorySchema, mimeType: z.string() })),
  mimeTypes: z.record(categorySchema),
  mimePrefixes: z.record(categorySchema),
});

export type FileTypeTable = z.infer<typeof fileTypeTableSchema>;

const FILE_TYPES_FILE = new URL("../data/file-types.json", import.meta.url);

export function loadFileTypeTable(file: URL | string = FILE_TYPES_FILE): FileTypeTable {
  return fileTypeTableSchema.parse(JSON.parse(readFileSync(file, "utf8")));
}

/** Ties between equally-weighted votes go to the earlier category. */
export const CATEGORY_PRIORITY: readonly FileCategory[] = ["cad", "image", "pdf", "office", "text"];

export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0 || dot === filename.length - 1) return "";
  return filename.slice(dot).toLowerCase();
}

export function categoryForExtension(
  table: FileTypeTable,
  filename: string,
): { category: FileCategory; mimeType: string } | null {
  return table.extensions[extensionOf(filename)] ?? null;
}

export function categoryForMime(table: FileTypeTable, mimeType: string): FileCategory | null {
  const normalized = mimeType.split(";")[0]?.trim().toLowerCase() ?? "";
  const exact = table.mimeTypes[normalized];
  if (exact) return exact;
  for (const [prefix, category] of Object.entries(table.mimePrefixes)) {
    if (normalized.startsWith(prefix)) return category;
  }
  return null;
}
