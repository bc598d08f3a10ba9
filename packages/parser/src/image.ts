import sharp from "sharp";
import { ExtractionError } from "@docpipe/errors";

export interface GreyscaleImage {
  width: number;
  height: number;
  /** One byte per pixel, row-major. */
  data: Uint8Array;
  /** Dimensions of the source before any analysis downscale. */
  originalWidth: number;
  originalHeight: number;
}

export interface EnhancedImage {
  bytes: Buffer;
  width: number;
  height: number;
  steps: string[];
}

/** Quality metrics are computed on at most this many pixels per side. */
const ANALYSIS_MAX_SIDE = 2048;

export const ENHANCEMENT_STEPS = ["median_denoise", "contrast_normalize", "sharpen"];

/**
 * Decode any sharp-supported image into 8-bit greyscale pixels for quality
 * analysis.
 */
export async function decodeGreyscale(bytes: Uint8Array): Promise<GreyscaleImage> {
  try {
    const meta = await sharp(bytes).metadata();
    const { data, info } = await sharp(bytes)
      .greyscale()
      .resize({ width: ANALYSIS_MAX_SIDE, height: ANALYSIS_MAX_SIDE, fit: "inside", withoutEnlargement: true })
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      data: new Uint8Array(data.buffer, data.byteOffset, data.length),
      originalWidth: meta.width ?? info.width,
      originalHeight: meta.height ?? info.height,
    };
  } catch (err: unknown) {
    throw new ExtractionError("Image could not be decoded", "image", { cause: err });
  }
}

/**
 * Denoise, normalize contrast and sharpen. Output is PNG so every input
 * format reaches the OCR engine in one encoding. Deterministic for the same
 * input bytes.
 */
export async function enhanceImage(bytes: Uint8Array): Promise<EnhancedImage> {
  try {
    const { data, info } = await sharp(bytes)
      .greyscale()
      .median(3)
      .normalise()
      .sharpen()
      .png()
      .toBuffer({ resolveWithObject: true });
    return { bytes: data, width: info.width, height: info.height, steps: [...ENHANCEMENT_STEPS] };
  } catch (err: unknown) {
    throw new ExtractionError("Image enhancement failed", "image", { cause: err });
  }
}
