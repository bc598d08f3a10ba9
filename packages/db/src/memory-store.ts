import type {
  Chunk,
  Document,
  DocumentPatch,
  Embedding,
  ExtractionResult,
  IMetadataStore,
  NewDocument,
  NotificationEvent,
  PipelineStage,
  PreprocessedText,
} from "@docpipe/types";
import { InvariantViolationError } from "@docpipe/errors";
import { documentNotFound } from "./metadata-store.js";

/**
 * Process-local store with the same semantics as the Postgres one.
 * Used by tests and single-process runs. Writes that the Postgres foreign
 * keys would refuse raise InvariantViolationError.
 */
export class InMemoryMetadataStore implements IMetadataStore {
  private readonly documents = new Map<string, Document>();
  private readonly extractions = new Map<string, ExtractionResult>();
  private readonly preprocessed = new Map<string, PreprocessedText>();
  private readonly chunks = new Map<string, Chunk[]>();
  private readonly embeddings = new Map<string, Embedding[]>();
  private readonly notifications = new Map<string, NotificationEvent>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async load(documentId: string): Promise<Document> {
    const doc = this.documents.get(documentId);
    if (!doc) throw documentNotFound(documentId);
    return { ...doc, errors: [...doc.errors] };
  }

  async create(document: NewDocument): Promise<Document> {
    if (!this.documents.has(document.id)) {
      const now = this.clock();
      this.documents.set(document.id, {
        ...document,
        sniffedMimeType: null,
        fileCategory: null,
        detectionConfidence: null,
        qualityScore: null,
        qualityDecision: null,
        qualityReport: null,
        enhanced: false,
        language: "unknown",
        needsTranslation: false,
        documentType: null,
        stage: "INGESTED",
        errors: [],
        humanReviewReason: null,
        chunkCount: 0,
        notificationCount: 0,
        createdAt: now,
        updatedAt: now,
      });
    }
    return this.load(document.id);
  }

  async persistStage(documentId: string, stage: PipelineStage, fields: DocumentPatch): Promise<Document> {
    const current = this.documents.get(documentId);
    if (!current) throw documentNotFound(documentId);
    this.documents.set(documentId, { ...current, ...fields, stage, updatedAt: this.clock() });
    return this.load(documentId);
  }

  async saveExtraction(documentId: string, result: ExtractionResult): Promise<void> {
    this.requireDocument(documentId);
    this.extractions.set(documentId, result);
  }

  async loadExtraction(documentId: string): Promise<ExtractionResult | null> {
    return this.extractions.get(documentId) ?? null;
  }

  async savePreprocessed(documentId: string, result: PreprocessedText): Promise<void> {
    this.requireDocument(documentId);
    this.preprocessed.set(documentId, result);
  }

  async loadPreprocessed(documentId: string): Promise<PreprocessedText | null> {
    return this.preprocessed.get(documentId) ?? null;
  }

  async replaceChunks(documentId: string, items: Chunk[]): Promise<void> {
    this.requireDocument(documentId);
    this.chunks.set(documentId, [...items].sort((a, b) => a.index - b.index));
    for (const key of this.embeddings.keys()) {
      if (key.startsWith(`${documentId}\0`)) this.embeddings.delete(key);
    }
  }

  async loadChunks(documentId: string): Promise<Chunk[]> {
    return [...(this.chunks.get(documentId) ?? [])];
  }

  async replaceEmbeddings(documentId: string, model: string, items: Embedding[]): Promise<void> {
    this.requireDocument(documentId);
    const known = new Set((this.chunks.get(documentId) ?? []).map((chunk) => chunk.id));
    const orphan = items.find((item) => !known.has(item.chunkId));
    if (orphan) {
      throw new InvariantViolationError(`Embedding for unknown chunk ${orphan.chunkId} of document ${documentId}`);
    }
    this.embeddings.set(`${documentId}\0${model}`, [...items]);
  }

  async loadEmbeddings(documentId: string, model: string): Promise<Embedding[]> {
    const order = new Map((this.chunks.get(documentId) ?? []).map((chunk) => [chunk.id, chunk.index]));
    return (this.embeddings.get(`${documentId}\0${model}`) ?? [])
      .filter((embedding) => order.has(embedding.chunkId))
      .sort((a, b) => (order.get(a.chunkId) ?? 0) - (order.get(b.chunkId) ?? 0));
  }

  async recordNotifications(documentId: string, events: NotificationEvent[]): Promise<void> {
    this.requireDocument(documentId);
    for (const event of events) {
      if (!this.notifications.has(event.id)) this.notifications.set(event.id, event);
    }
  }

  private requireDocument(documentId: string): void {
    if (!this.documents.has(documentId)) {
      throw new InvariantViolationError(`Write for unknown document ${documentId}`);
    }
  }

  /** Recorded events for one document, in insertion order. */
  notificationsFor(documentId: string): NotificationEvent[] {
    return [...this.notifications.values()].filter((event) => event.documentId === documentId);
  }
}
