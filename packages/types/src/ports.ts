import type { Chunk } from "./chunk.js";
import type { Document, DocumentPatch, PipelineStage } from "./document.js";
import type { Embedding } from "./embedding.js";
import type { ExtractionResult, PreprocessedText } from "./extraction.js";
import type { DeadLetterEntry } from "./job.js";
import type { NotificationEvent } from "./notification.js";

export interface StoredObjectInfo {
  filename: string;
  sizeBytes: number;
  contentType: string;
}

export interface IObjectStore {
  /** Rejects with NotFoundError when no object exists for the id. */
  getBytes(documentId: string, signal?: AbortSignal): Promise<Uint8Array>;
  /** Object metadata without the body; NotFoundError when missing. */
  describe(documentId: string, signal?: AbortSignal): Promise<StoredObjectInfo>;
}

export interface NewDocument {
  id: string;
  filename: string;
  sizeBytes: number;
  declaredMimeType: string;
}

export interface IMetadataStore {
  /** Throws NotFoundError for an unknown id. */
  load(documentId: string): Promise<Document>;
  /** Registers a document at INGESTED; returns the existing record if already known. */
  create(document: NewDocument): Promise<Document>;
  persistStage(documentId: string, stage: PipelineStage, fields: DocumentPatch): Promise<Document>;
  saveExtraction(documentId: string, result: ExtractionResult): Promise<void>;
  loadExtraction(documentId: string): Promise<ExtractionResult | null>;
  savePreprocessed(documentId: string, result: PreprocessedText): Promise<void>;
  loadPreprocessed(documentId: string): Promise<PreprocessedText | null>;
  /** Replaces the full chunk set of the document. */
  replaceChunks(documentId: string, chunks: Chunk[]): Promise<void>;
  loadChunks(documentId: string): Promise<Chunk[]>;
  /** Replaces the document's embeddings for one model version only. */
  replaceEmbeddings(documentId: string, model: string, embeddings: Embedding[]): Promise<void>;
  loadEmbeddings(documentId: string, model: string): Promise<Embedding[]>;
  /** Idempotent per event id. */
  recordNotifications(documentId: string, events: NotificationEvent[]): Promise<void>;
}

export interface INotificationSink {
  enqueue(event: NotificationEvent): Promise<void>;
}

export interface IDocumentQueue {
  enqueue(documentId: string): Promise<void>;
}

export interface IDeadLetterSink {
  deadLetter(entry: DeadLetterEntry): Promise<void>;
}
