export type { IChunker } from "./chunker.interface.js";
export { MetadataRecordChunker } from "./metadata-record-chunker.js";
export { SectionChunker, isProcedureHeading } from "./section-chunker.js";
export { EventChunker, startsEvent } from "./event-chunker.js";
export { TableRowChunker, isTableRow } from "./table-row-chunker.js";
export { ParagraphGroupChunker, isLegalHeading } from "./paragraph-group-chunker.js";
export { ParagraphChunker } from "./paragraph-chunker.js";
export { createChunker } from "./factory.js";
export { DocumentChunker } from "./document-chunker.js";
export type { ChunkInput, ChunkOutput } from "./document-chunker.js";
export { DocumentTypeClassifier, loadKeywordTable } from "./classifier.js";
export type { KeywordTable } from "./classifier.js";
export { windows, paragraphs, sentences, splitSpans } from "./units.js";
export type { Span } from "./units.js";
