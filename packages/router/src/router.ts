import { decodeGreyscale, type GreyscaleImage } from "@docpipe/parser";
import type {
  DetectionResult,
  FileCategory,
  ImageQualityWeights,
  QualityAssessment,
  QualityThresholds,
} from "@docpipe/types";
import { FileTypeDetector } from "./detector.js";
import {
  computeImageMetrics,
  decide,
  imageQualityScore,
  sizeSanity,
  textDensity,
  textQualityScore,
} from "./quality.js";

export interface QualityTypeRouterOptions {
  thresholds: QualityThresholds;
  maxFileSizeBytes: number;
  imageWeights: ImageQualityWeights;
  detector?: FileTypeDetector;
}

/** Below this density the report carries a readability issue. */
const LOW_DENSITY = 0.5;

function megabytes(bytes: number): string {
  return `${String(Math.round(bytes / (1024 * 1024)))}MB`;
}

/**
 * Quality & Type Router: classifies a file from its extension, declared
 * MIME and content, scores its processing quality and decides
 * PROCESS / ENHANCE / REJECT.
 */
export class QualityTypeRouter {
  private readonly detector: FileTypeDetector;

  constructor(private readonly options: QualityTypeRouterOptions) {
    this.detector = options.detector ?? new FileTypeDetector();
  }

  get thresholds(): QualityThresholds {
    return this.options.thresholds;
  }

  detect(bytes: Uint8Array, filename: string, declaredMimeType: string): DetectionResult {
    return this.detector.detect(bytes, filename, declaredMimeType);
  }

  /**
   * Hard size cap. Returns a REJECT assessment when `sizeBytes` exceeds it,
   * null otherwise; callers check the declared size before fetching bytes.
   */
  checkSize(sizeBytes: number): QualityAssessment | null {
    if (sizeBytes <= this.options.maxFileSizeBytes) return null;
    return {
      score: 0,
      decision: "REJECT",
      fileSizeValid: false,
      issues: [`File size exceeds ${megabytes(this.options.maxFileSizeBytes)} limit`],
      recommendations: ["Compress or split the file"],
    };
  }

  async assess(bytes: Uint8Array, category: FileCategory): Promise<QualityAssessment> {
    const oversize = this.checkSize(bytes.byteLength);
    if (oversize) return oversize;

    if (category === "image") {
      return this.assessImage(bytes);
    }

    const density = textDensity(bytes, category);
    const sanity = sizeSanity(bytes.byteLength, this.options.maxFileSizeBytes);
    const score = textQualityScore(density, sanity);
    const issues: string[] = [];
    const recommendations: string[] = [];

    if (density < LOW_DENSITY) {
      issues.push(`Low text density: ${density.toFixed(2)}`);
      recommendations.push("Check if document contains readable text");
    }
    if (sanity < 1) {
      issues.push(sanity === 0.6 ? "File is unusually large" : "File is empty or nearly empty");
    }

    return {
      score,
      decision: decide(score, this.options.thresholds),
      fileSizeValid: true,
      textDensity: density,
      sizeSanity: sanity,
      issues,
      recommendations,
    };
  }

  private async assessImage(bytes: Uint8Array): Promise<QualityAssessment> {
    let image: GreyscaleImage;
    try {
      image = await decodeGreyscale(bytes);
    } catch {
      return {
        score: 0,
        decision: "REJECT",
        fileSizeValid: true,
        issues: ["Image could not be decoded"],
        recommendations: ["Re-scan or re-export the image"],
      };
    }

    const metrics = computeImageMetrics(image, image.originalWidth * image.originalHeight);
    const score = imageQualityScore(metrics, this.options.imageWeights);
    const decision = decide(score, this.options.thresholds);
    const issues: string[] = [];
    const recommendations: string[] = [];

    if (decision !== "PROCESS") {
      issues.push(`Low image quality: ${score.toFixed(2)}`);
      recommendations.push(decision === "ENHANCE" ? "Apply image enhancement" : "Re-scan at higher quality");
    }

    return {
      score,
      decision,
      fileSizeValid: true,
      imageMetrics: metrics,
      issues,
      recommendations,
    };
  }
}
