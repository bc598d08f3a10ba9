export { QualityTypeRouter } from "./router.js";
export type { QualityTypeRouterOptions } from "./router.js";
export { FileTypeDetector, DEFAULT_SIGNAL_WEIGHTS } from "./detector.js";
export type { SignalWeights } from "./detector.js";
export {
  computeImageMetrics,
  imageQualityScore,
  textDensity,
  sizeSanity,
  textQualityScore,
  decide,
} from "./quality.js";
export type { PixelGrid } from "./quality.js";
export { sniffContent, printableRatio } from "./sniff.js";
export type { SniffResult } from "./sniff.js";
export { loadFileTypeTable, extensionOf, CATEGORY_PRIORITY } from "./file-types.js";
export type { FileTypeTable } from "./file-types.js";
