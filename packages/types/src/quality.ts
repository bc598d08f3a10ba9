import type { FileCategory, QualityDecision } from "./document.js";

export type DetectionSignal = "extension" | "mime" | "content";

export interface SignalVote {
  signal: DetectionSignal;
  category: FileCategory;
  weight: number;
}

export interface DetectionResult {
  category: FileCategory;
  /** Normalized agreement across signals, 1.0 when all three agree. */
  confidence: number;
  mimeType: string;
  votes: SignalVote[];
}

export interface ImageQualityMetrics {
  sharpness: number;
  contrast: number;
  brightness: number;
  noise: number;
  resolution: number;
}

export type ImageQualityWeights = ImageQualityMetrics;

export interface QualityAssessment {
  score: number;
  decision: QualityDecision;
  fileSizeValid: boolean;
  imageMetrics?: ImageQualityMetrics;
  textDensity?: number;
  sizeSanity?: number;
  issues: string[];
  recommendations: string[];
}

export interface QualityThresholds {
  processThreshold: number;
  enhanceThreshold: number;
}
