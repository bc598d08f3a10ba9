export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { DoclingParser } from "./docling-parser.js";
export { ParserRegistry } from "./factory.js";
export type { ParserRegistryOptions } from "./factory.js";
export { runProcess } from "./process.js";
export type { ProcessOutput } from "./process.js";
export { TesseractOcrEngine, parseTesseractTsv } from "./ocr-engine.js";
export type { IOcrEngine } from "./ocr-engine.js";
export { decodeGreyscale, enhanceImage, ENHANCEMENT_STEPS } from "./image.js";
export type { GreyscaleImage, EnhancedImage } from "./image.js";
