import { pgTable, text, timestamp, jsonb, integer, real, boolean, index, primaryKey } from "drizzle-orm/pg-core";
import type { ChunkMetadata } from "@docpipe/types";
import { documents } from "./documents.js";
import { chunkStrategyEnum, languageEnum } from "./enums.js";

export const chunks = pgTable(
  "chunks",
  {
    id: text("id").primaryKey(),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    index: integer("index").notNull(),
    totalChunks: integer("total_chunks").notNull(),
    text: text("text").notNull(),
    chunkType: chunkStrategyEnum("chunk_type").notNull(),
    language: languageEnum("language").notNull(),
    needsTranslation: boolean("needs_translation").notNull(),
    wordCount: integer("word_count").notNull(),
    confidence: real("confidence").notNull(),
    metadata: jsonb("metadata").notNull().$type<ChunkMetadata>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index("chunks_document_idx").on(table.documentId, table.index),
  }),
);

/** One row per chunk per model version. */
export const embeddings = pgTable(
  "embeddings",
  {
    chunkId: text("chunk_id")
      .notNull()
      .references(() => chunks.id, { onDelete: "cascade" }),
    model: text("model").notNull(),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    vector: real("vector").array().notNull(),
    dimensions: integer("dimensions").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.chunkId, table.model] }),
    documentModelIdx: index("embeddings_document_model_idx").on(table.documentId, table.model),
  }),
);
