import { describe, it, expect } from "vitest";
import { computeImageMetrics, decide, imageQualityScore, sizeSanity, textDensity } from "./quality.js";

const thresholds = { processThreshold: 0.8, enhanceThreshold: 0.5 };
const weights = { sharpness: 0.3, contrast: 0.2, brightness: 0.2, noise: 0.2, resolution: 0.1 };

function grid(width: number, height: number, pixel: (x: number, y: number) => number) {
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) data[y * width + x] = pixel(x, y);
  }
  return { width, height, data };
}

describe("computeImageMetrics", () => {
  it("scores a flat mid-grey image as dull but noise-free", () => {
    const metrics = computeImageMetrics(grid(4, 4, () => 127));

    expect(metrics.sharpness).toBe(0);
    expect(metrics.contrast).toBe(0);
    expect(metrics.brightness).toBe(1);
    expect(metrics.noise).toBe(1);
    expect(metrics.resolution).toBeCloseTo(16 / (1920 * 1080), 12);
  });

  it("scores a checkerboard as maximally sharp and noisy", () => {
    const metrics = computeImageMetrics(grid(4, 4, (x, y) => ((x + y) % 2 === 0 ? 255 : 0)));

    expect(metrics.sharpness).toBe(1);
    expect(metrics.noise).toBe(0);
    expect(metrics.contrast).toBeCloseTo(127.5 / 128, 10);
    expect(metrics.brightness).toBeCloseTo(1 - 0.5 / 127, 10);
  });

  it("uses the original pixel count for resolution", () => {
    const metrics = computeImageMetrics(grid(4, 4, () => 0), 1920 * 1080 * 2);
    expect(metrics.resolution).toBe(1);
  });

  it("keeps every metric within [0, 1] for an empty grid", () => {
    const metrics = computeImageMetrics({ width: 0, height: 0, data: new Uint8Array(0) });
    for (const value of Object.values(metrics)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });
});

describe("imageQualityScore", () => {
  it("is the weighted mean of the metrics", () => {
    const metrics = { sharpness: 1, contrast: 0, brightness: 0, noise: 0, resolution: 0 };
    expect(imageQualityScore(metrics, weights)).toBeCloseTo(0.3, 10);
  });

  it("normalizes weights that do not sum to one", () => {
    const metrics = { sharpness: 1, contrast: 0, brightness: 0, noise: 0, resolution: 0 };
    const doubled = { sharpness: 0.6, contrast: 0.4, brightness: 0.4, noise: 0.4, resolution: 0.2 };
    expect(imageQualityScore(metrics, doubled)).toBeCloseTo(0.3, 10);
  });
});

describe("decide", () => {
  it("maps score bands to decisions", () => {
    expect(decide(0.8, thresholds)).toBe("PROCESS");
    expect(decide(0.79, thresholds)).toBe("ENHANCE");
    expect(decide(0.5, thresholds)).toBe("ENHANCE");
    expect(decide(0.49, thresholds)).toBe("REJECT");
  });

  it("clamps out-of-range scores", () => {
    expect(decide(1.5, thresholds)).toBe("PROCESS");
    expect(decide(-1, thresholds)).toBe("REJECT");
    expect(decide(Number.NaN, thresholds)).toBe("REJECT");
  });
});

describe("sizeSanity", () => {
  it("penalizes empty, tiny and oversized inputs", () => {
    expect(sizeSanity(0, 1_000_000)).toBe(0);
    expect(sizeSanity(100, 1_000_000)).toBe(0.3);
    expect(sizeSanity(1_000, 1_000_000)).toBe(1);
    expect(sizeSanity(600_000, 1_000_000)).toBe(0.6);
  });
});

describe("textDensity", () => {
  const enc = (s: string) => new TextEncoder().encode(s);

  it("rates PDFs by their font and image resources", () => {
    expect(textDensity(enc("%PDF-1.4 /Type /Font"), "pdf")).toBe(0.9);
    expect(textDensity(enc("%PDF-1.5 /Type /ObjStm"), "pdf")).toBe(0.8);
    expect(textDensity(enc("%PDF-1.4 /Subtype /Image"), "pdf")).toBe(0.3);
    expect(textDensity(enc("%PDF-1.4"), "pdf")).toBe(0.5);
  });

  it("rates office containers by their content parts", () => {
    expect(textDensity(enc("PK\x03\x04xl/worksheets/sheet1.xml"), "office")).toBe(0.85);
    expect(textDensity(enc("PK\x03\x04"), "office")).toBe(0.6);
  });

  it("uses the printable ratio for text", () => {
    expect(textDensity(enc("all printable"), "text")).toBe(1);
  });
});
