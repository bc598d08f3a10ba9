export { Preprocessor } from "./preprocessor.js";
export type { PreprocessorOptions } from "./preprocessor.js";
export { normalizeWhitespace, dedupeFragments, fragmentKey } from "./normalize.js";
export { applyOcrCorrections } from "./ocr-corrections.js";
export { detectLanguage, needsTranslation, MALAYALAM_RATIO } from "./language.js";
export type { LanguageProfile } from "./language.js";
