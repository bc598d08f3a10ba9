import { pgTable, text, timestamp, jsonb, integer, bigint, real, boolean } from "drizzle-orm/pg-core";
import type { ExtractionResult, PreprocessedText, QualityAssessment } from "@docpipe/types";
import {
  documentTypeEnum,
  fileCategoryEnum,
  languageEnum,
  pipelineStageEnum,
  qualityDecisionEnum,
} from "./enums.js";

export const documents = pgTable("documents", {
  id: text("id").primaryKey(),
  filename: text("filename").notNull(),
  sizeBytes: bigint("size_bytes", { mode: "number" }).notNull().default(0),
  declaredMimeType: text("declared_mime_type").notNull().default("application/octet-stream"),
  sniffedMimeType: text("sniffed_mime_type"),
  fileCategory: fileCategoryEnum("file_category"),
  detectionConfidence: real("detection_confidence"),
  qualityScore: real("quality_score"),
  qualityDecision: qualityDecisionEnum("quality_decision"),
  qualityReport: jsonb("quality_report").$type<QualityAssessment>(),
  enhanced: boolean("enhanced").notNull().default(false),
  language: languageEnum("language").notNull().default("unknown"),
  needsTranslation: boolean("needs_translation").notNull().default(false),
  documentType: documentTypeEnum("document_type"),
  stage: pipelineStageEnum("stage").notNull().default("INGESTED"),
  errors: jsonb("errors").notNull().$type<string[]>().default([]),
  humanReviewReason: text("human_review_reason"),
  chunkCount: integer("chunk_count").notNull().default(0),
  notificationCount: integer("notification_count").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

/** Stage outputs kept so a crashed run resumes without re-extracting. */
export const documentArtifacts = pgTable("document_artifacts", {
  documentId: text("document_id")
    .primaryKey()
    .references(() => documents.id, { onDelete: "cascade" }),
  extraction: jsonb("extraction").$type<ExtractionResult>(),
  preprocessed: jsonb("preprocessed").$type<PreprocessedText>(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
