import { NotFoundError } from "@docpipe/errors";
import { createNoopLogger, type Logger } from "@docpipe/logger";
import type { Document, DocumentStatus, IDocumentQueue, IMetadataStore, IObjectStore } from "@docpipe/types";
import type { PipelineOrchestrator } from "./orchestrator.js";
import { isTerminal } from "./state-machine.js";

export interface PipelineServiceDependencies {
  objectStore: IObjectStore;
  metadata: IMetadataStore;
  queue: IDocumentQueue;
  orchestrator: Pick<PipelineOrchestrator, "cancel">;
  logger?: Logger;
}

/** Entry points for the upstream ingestion layer. */
export class PipelineService {
  private readonly logger: Logger;

  constructor(private readonly deps: PipelineServiceDependencies) {
    this.logger = deps.logger ?? createNoopLogger();
  }

  /**
   * Registers a document already present in the object store and queues it.
   * Documents in a terminal stage are not queued again.
   */
  async submit(documentId: string): Promise<DocumentStatus> {
    const doc = await this.findOrCreate(documentId);
    if (isTerminal(doc.stage)) {
      this.logger.info({ documentId, stage: doc.stage }, "Document already processed, not queued");
      return toStatus(doc);
    }
    await this.deps.queue.enqueue(documentId);
    this.logger.info({ documentId, stage: doc.stage }, "Document queued");
    return toStatus(doc);
  }

  async getStatus(documentId: string): Promise<DocumentStatus> {
    return toStatus(await this.deps.metadata.load(documentId));
  }

  /** Stops an active run of this process before its next transition. */
  cancel(documentId: string): boolean {
    return this.deps.orchestrator.cancel(documentId);
  }

  private async findOrCreate(documentId: string): Promise<Document> {
    try {
      return await this.deps.metadata.load(documentId);
    } catch (error: unknown) {
      if (!(error instanceof NotFoundError)) throw error;
    }
    const info = await this.deps.objectStore.describe(documentId);
    return this.deps.metadata.create({
      id: documentId,
      filename: info.filename,
      sizeBytes: info.sizeBytes,
      declaredMimeType: info.contentType,
    });
  }
}

/** Failure stages carry the latest recorded error; human review carries its reason. */
export function toStatus(doc: Document): DocumentStatus {
  const status: DocumentStatus = {
    documentId: doc.id,
    stage: doc.stage,
    qualityScore: doc.qualityScore,
    language: doc.language,
  };
  if (doc.stage === "FAILED" || doc.stage === "REJECTED") {
    const error = doc.errors[doc.errors.length - 1];
    if (error) status.error = error;
  } else if (doc.stage === "HUMAN_REVIEW" && doc.humanReviewReason) {
    status.error = doc.humanReviewReason;
  }
  return status;
}
