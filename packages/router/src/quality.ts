import type {
  FileCategory,
  ImageQualityMetrics,
  ImageQualityWeights,
  QualityDecision,
  QualityThresholds,
} from "@docpipe/types";
import { asBuffer, printableRatio } from "./sniff.js";

export interface PixelGrid {
  width: number;
  height: number;
  data: Uint8Array;
}

const HD_PIXELS = 1920 * 1080;

/** Below this size a text-bearing file is treated as near-empty. */
const NEAR_EMPTY_BYTES = 256;

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Variance of the 4-neighbour Laplacian over interior pixels.
 */
function laplacianVariance(image: PixelGrid): number {
  const { width, height, data } = image;
  if (width < 3 || height < 3) return 0;

  let sum = 0;
  let sumSq = 0;
  let n = 0;
  for (let y = 1; y < height - 1; y++) {
    const row = y * width;
    for (let x = 1; x < width - 1; x++) {
      const i = row + x;
      const lap =
        (data[i - width] ?? 0) + (data[i + width] ?? 0) + (data[i - 1] ?? 0) + (data[i + 1] ?? 0) - 4 * (data[i] ?? 0);
      sum += lap;
      sumSq += lap * lap;
      n += 1;
    }
  }
  const mean = sum / n;
  return sumSq / n - mean * mean;
}

/**
 * Per-metric image quality, each normalized to [0, 1]. `originalPixels`
 * is the pixel count of the source when `image` is a downscaled copy.
 */
export function computeImageMetrics(image: PixelGrid, originalPixels = image.width * image.height): ImageQualityMetrics {
  const { data } = image;
  let sum = 0;
  let sumSq = 0;
  for (const v of data) {
    sum += v;
    sumSq += v * v;
  }
  const n = data.length;
  const mean = n === 0 ? 0 : sum / n;
  const std = n === 0 ? 0 : Math.sqrt(Math.max(0, sumSq / n - mean * mean));
  const lapVar = laplacianVariance(image);

  return {
    sharpness: clamp01(lapVar / 1000),
    contrast: clamp01(std / 128),
    brightness: n === 0 ? 0 : clamp01(1 - Math.abs(mean - 127) / 127),
    noise: clamp01(1 - lapVar / 10000),
    resolution: clamp01(originalPixels / HD_PIXELS),
  };
}

/** Weighted mean of the metrics; weights need not sum to 1. */
export function imageQualityScore(metrics: ImageQualityMetrics, weights: ImageQualityWeights): number {
  const keys = ["sharpness", "contrast", "brightness", "noise", "resolution"] as const;
  let total = 0;
  let weightSum = 0;
  for (const key of keys) {
    total += metrics[key] * weights[key];
    weightSum += weights[key];
  }
  return weightSum > 0 ? clamp01(total / weightSum) : 0;
}

export function sizeSanity(sizeBytes: number, maxFileSizeBytes: number): number {
  if (sizeBytes <= 0) return 0;
  if (sizeBytes < NEAR_EMPTY_BYTES) return 0.3;
  if (sizeBytes > maxFileSizeBytes / 2) return 0.6;
  return 1;
}

/**
 * Byte-to-text density heuristic for text-bearing formats, without parsing.
 */
export function textDensity(bytes: Uint8Array, category: FileCategory): number {
  const buffer = asBuffer(bytes);
  switch (category) {
    case "text":
      return printableRatio(bytes, 65_536);
    case "pdf":
      if (buffer.includes("/Font", 0, "latin1")) return 0.9;
      // Font resources hidden in compressed object streams
      if (buffer.includes("/ObjStm", 0, "latin1")) return 0.8;
      if (buffer.includes("/Image", 0, "latin1")) return 0.3;
      return 0.5;
    case "office":
      if (
        buffer.includes("word/document.xml", 0, "latin1") ||
        buffer.includes("xl/worksheets/", 0, "latin1") ||
        buffer.includes("ppt/slides/", 0, "latin1")
      ) {
        return 0.85;
      }
      return 0.6;
    case "cad":
      return 0.8;
    case "image":
    case "unknown":
      return 0.5;
  }
}

export function textQualityScore(density: number, sanity: number): number {
  return clamp01(0.5 * density + 0.5 * sanity);
}

/**
 * PROCESS at or above the process threshold, ENHANCE at or above the
 * enhance threshold, REJECT below it. Pure in the score.
 */
export function decide(score: number, thresholds: QualityThresholds): QualityDecision {
  const s = clamp01(score);
  if (s >= thresholds.processThreshold) return "PROCESS";
  if (s >= thresholds.enhanceThreshold) return "ENHANCE";
  return "REJECT";
}
