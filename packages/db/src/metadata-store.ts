import { and, asc, eq } from "drizzle-orm";
import { NotFoundError } from "@docpipe/errors";
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
import type { DbClient } from "./client.js";
import { chunks, documentArtifacts, documents, embeddings, notificationEvents } from "./schema/index.js";
import { chunkRow, embeddingRow, notificationRow, toChunk, toDocument, toEmbedding } from "./mappers.js";

export class PostgresMetadataStore implements IMetadataStore {
  constructor(private readonly db: DbClient) {}

  async load(documentId: string): Promise<Document> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, documentId)).limit(1);
    if (!row) throw documentNotFound(documentId);
    return toDocument(row);
  }

  async create(document: NewDocument): Promise<Document> {
    await this.db.insert(documents).values(document).onConflictDoNothing({ target: documents.id });
    return this.load(document.id);
  }

  async persistStage(documentId: string, stage: PipelineStage, fields: DocumentPatch): Promise<Document> {
    const [row] = await this.db
      .update(documents)
      .set({ ...fields, stage, updatedAt: new Date() })
      .where(eq(documents.id, documentId))
      .returning();
    if (!row) throw documentNotFound(documentId);
    return toDocument(row);
  }

  async saveExtraction(documentId: string, result: ExtractionResult): Promise<void> {
    await this.db
      .insert(documentArtifacts)
      .values({ documentId, extraction: result })
      .onConflictDoUpdate({
        target: documentArtifacts.documentId,
        set: { extraction: result, updatedAt: new Date() },
      });
  }

  async loadExtraction(documentId: string): Promise<ExtractionResult | null> {
    const [row] = await this.db
      .select({ extraction: documentArtifacts.extraction })
      .from(documentArtifacts)
      .where(eq(documentArtifacts.documentId, documentId))
      .limit(1);
    return row?.extraction ?? null;
  }

  async savePreprocessed(documentId: string, result: PreprocessedText): Promise<void> {
    await this.db
      .insert(documentArtifacts)
      .values({ documentId, preprocessed: result })
      .onConflictDoUpdate({
        target: documentArtifacts.documentId,
        set: { preprocessed: result, updatedAt: new Date() },
      });
  }

  async loadPreprocessed(documentId: string): Promise<PreprocessedText | null> {
    const [row] = await this.db
      .select({ preprocessed: documentArtifacts.preprocessed })
      .from(documentArtifacts)
      .where(eq(documentArtifacts.documentId, documentId))
      .limit(1);
    return row?.preprocessed ?? null;
  }

  async replaceChunks(documentId: string, items: Chunk[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      // embeddings cascade with their chunks
      await tx.delete(chunks).where(eq(chunks.documentId, documentId));
      if (items.length > 0) {
        await tx.insert(chunks).values(items.map(chunkRow));
      }
    });
  }

  async loadChunks(documentId: string): Promise<Chunk[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(eq(chunks.documentId, documentId))
      .orderBy(asc(chunks.index));
    return rows.map(toChunk);
  }

  async replaceEmbeddings(documentId: string, model: string, items: Embedding[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .delete(embeddings)
        .where(and(eq(embeddings.documentId, documentId), eq(embeddings.model, model)));
      if (items.length > 0) {
        await tx.insert(embeddings).values(items.map(embeddingRow));
      }
    });
  }

  async loadEmbeddings(documentId: string, model: string): Promise<Embedding[]> {
    const rows = await this.db
      .select({ embedding: embeddings })
      .from(embeddings)
      .innerJoin(chunks, eq(embeddings.chunkId, chunks.id))
      .where(and(eq(embeddings.documentId, documentId), eq(embeddings.model, model)))
      .orderBy(asc(chunks.index));
    return rows.map((row) => toEmbedding(row.embedding));
  }

  async recordNotifications(_documentId: string, events: NotificationEvent[]): Promise<void> {
    if (events.length === 0) return;
    await this.db
      .insert(notificationEvents)
      .values(events.map(notificationRow))
      .onConflictDoNothing({ target: notificationEvents.id });
  }
}

export function documentNotFound(documentId: string): NotFoundError {
  return new NotFoundError(`Document ${documentId} not found`, { details: { documentId } });
}
