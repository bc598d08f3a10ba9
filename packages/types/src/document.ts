import type { ExtractionResult, PreprocessedText } from "./extraction.js";
import type { DocumentType } from "./chunk.js";
import type { QualityAssessment } from "./quality.js";

export type FileCategory = "text" | "image" | "pdf" | "office" | "cad" | "unknown";

export type QualityDecision = "PROCESS" | "ENHANCE" | "REJECT";

export type Language = "english" | "malayalam" | "mixed" | "unknown";

export type PipelineStage =
  | "INGESTED"
  | "TYPE_DETECTED"
  | "QUALITY_ASSESSED"
  | "ENHANCING"
  | "EXTRACTED"
  | "PREPROCESSED"
  | "CHUNKED"
  | "EMBEDDED"
  | "SCANNED"
  | "READY"
  | "REJECTED"
  | "FAILED"
  | "HUMAN_REVIEW";

export const TERMINAL_STAGES: readonly PipelineStage[] = [
  "READY",
  "REJECTED",
  "FAILED",
  "HUMAN_REVIEW",
];

export interface Document {
  id: string;
  filename: string;
  sizeBytes: number;
  declaredMimeType: string;
  sniffedMimeType: string | null;
  fileCategory: FileCategory | null;
  detectionConfidence: number | null;
  qualityScore: number | null;
  qualityDecision: QualityDecision | null;
  qualityReport: QualityAssessment | null;
  /** True once the single ENHANCING pass has run. */
  enhanced: boolean;
  language: Language;
  needsTranslation: boolean;
  documentType: DocumentType | null;
  stage: PipelineStage;
  errors: string[];
  humanReviewReason: string | null;
  chunkCount: number;
  notificationCount: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields a stage may change on the persisted snapshot. Identity and
 * timestamps are owned by the metadata store.
 */
export type DocumentPatch = Partial<
  Omit<Document, "id" | "filename" | "declaredMimeType" | "stage" | "createdAt" | "updatedAt">
>;

export interface DocumentStatus {
  documentId: string;
  stage: PipelineStage;
  qualityScore: number | null;
  language: Language;
  error?: string;
}

/** Intermediate artifacts kept so a crashed run can resume mid-pipeline. */
export interface StageArtifacts {
  extraction: ExtractionResult;
  preprocessed: PreprocessedText;
}
