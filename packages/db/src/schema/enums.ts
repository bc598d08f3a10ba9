import { pgEnum } from "drizzle-orm/pg-core";

export const pipelineStageEnum = pgEnum("pipeline_stage", [
  "INGESTED",
  "TYPE_DETECTED",
  "QUALITY_ASSESSED",
  "ENHANCING",
  "EXTRACTED",
  "PREPROCESSED",
  "CHUNKED",
  "EMBEDDED",
  "SCANNED",
  "READY",
  "REJECTED",
  "FAILED",
  "HUMAN_REVIEW",
]);

export const fileCategoryEnum = pgEnum("file_category", ["text", "image", "pdf", "office", "cad", "unknown"]);

export const qualityDecisionEnum = pgEnum("quality_decision", ["PROCESS", "ENHANCE", "REJECT"]);

export const languageEnum = pgEnum("language", ["english", "malayalam", "mixed", "unknown"]);

export const documentTypeEnum = pgEnum("document_type", [
  "engineering",
  "maintenance",
  "incident",
  "financial",
  "regulatory",
  "unclassified",
]);

export const chunkStrategyEnum = pgEnum("chunk_strategy", [
  "metadata_record",
  "section",
  "event",
  "table_row",
  "paragraph_group",
  "paragraph",
]);

export const notificationPriorityEnum = pgEnum("notification_priority", ["low", "medium", "high", "critical"]);
