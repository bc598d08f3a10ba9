export type { IFormatProcessor } from "./processor.interface.js";
export { TextDocumentProcessor } from "./text-processor.js";
export type { ParserLookup } from "./text-processor.js";
export { ImageProcessor } from "./image-processor.js";
export { CadProcessor, SPECIALIZED_VIEWER_MARKER } from "./cad-processor.js";
export { FallbackProcessor } from "./fallback-processor.js";
export { ProcessorRegistry, createProcessorRegistry } from "./registry.js";
export type { ProcessorRegistryOptions } from "./registry.js";
export { CAD_FORMATS, formatFor, readDxf, readDwg, readStep, readIges } from "./cad-metadata.js";
export type { CadFormat, CadFormatInfo, TitleBlock } from "./cad-metadata.js";
