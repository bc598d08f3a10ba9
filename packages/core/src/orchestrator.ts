import type { DocumentChunker, DocumentTypeClassifier } from "@docpipe/chunker";
import type { EmbeddingGenerator } from "@docpipe/embeddings";
import {
  ExtractionError,
  FallbackChain,
  InvariantViolationError,
  LowConfidenceError,
  RetryPolicy,
  TransientIOError,
  ValidationError,
  summarizeError,
} from "@docpipe/errors";
import { createChildLogger, createNoopLogger, type Logger } from "@docpipe/logger";
import type { TriggerEngine } from "@docpipe/notifications";
import { enhanceImage, type EnhancedImage } from "@docpipe/parser";
import type { Preprocessor } from "@docpipe/preprocessor";
import type { ProcessorRegistry } from "@docpipe/processors";
import type { QualityTypeRouter } from "@docpipe/router";
import type {
  Chunk,
  Document,
  DocumentPatch,
  Embedding,
  ExtractionContext,
  ExtractionResult,
  FileCategory,
  IDeadLetterSink,
  IMetadataStore,
  INotificationSink,
  IObjectStore,
  PipelineRunResult,
  PipelineStage,
  PreprocessedText,
  QualityAssessment,
  RunOptions,
  StageTransition,
} from "@docpipe/types";
import { vectorRecordFor, type IVectorIndex } from "@docpipe/vector-store";
import { assertTransition, canTransition, isTerminal } from "./state-machine.js";

export interface OrchestratorDependencies {
  objectStore: IObjectStore;
  metadata: IMetadataStore;
  router: Pick<QualityTypeRouter, "detect" | "assess" | "checkSize">;
  processors: Pick<ProcessorRegistry, "resolve" | "fallback">;
  preprocessor: Pick<Preprocessor, "process">;
  classifier: Pick<DocumentTypeClassifier, "classify">;
  chunker: Pick<DocumentChunker, "chunk">;
  embeddings: Pick<EmbeddingGenerator, "model" | "dimensions" | "generate">;
  vectorIndex: IVectorIndex;
  triggers: Pick<TriggerEngine, "scanDocument">;
  notifications: INotificationSink;
  deadLetters: IDeadLetterSink;
  /** Single enhancement pass for low-quality images. */
  enhance?: (bytes: Uint8Array) => Promise<EnhancedImage>;
  /** Policy for object store, vector index and notification sink calls. */
  policy?: RetryPolicy;
  logger?: Logger;
  clock?: () => Date;
}

export interface OrchestratorOptions {
  /** Below this extraction confidence the document goes to HUMAN_REVIEW at EXTRACTED. */
  minExtractionConfidence: number;
  /** Below this aggregate confidence the document goes to HUMAN_REVIEW at SCANNED. */
  humanReviewConfidence: number;
}

/** Stage outputs held for the rest of one run; reloaded from the store on resume. */
interface RunState {
  doc: Document;
  transitions: StageTransition[];
  logger: Logger;
  bytes?: Uint8Array;
  enhancedBytes?: Uint8Array;
  extraction?: ExtractionResult;
  preprocessed?: PreprocessedText;
  chunks?: Chunk[];
  embeddings?: Embedding[];
}

/** A stage write failed; the run cannot record anything and must not continue. */
class StageWriteError extends Error {
  constructor(
    readonly documentId: string,
    readonly stage: PipelineStage,
    readonly failure: unknown,
  ) {
    super(`Could not persist ${stage} for ${documentId}`);
  }
}

/**
 * Drives one document through the pipeline state machine, persisting
 * every transition before the next stage starts. A run picks up at the
 * last persisted stage, so a crashed worker's document resumes where it
 * stopped. Stage errors end in REJECTED, FAILED or HUMAN_REVIEW; only
 * invariant violations and failed stage writes escape `run`.
 */
export class PipelineOrchestrator {
  private readonly enhance: (bytes: Uint8Array) => Promise<EnhancedImage>;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly active = new Map<string, AbortController>();

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly options: OrchestratorOptions,
  ) {
    this.enhance = deps.enhance ?? enhanceImage;
    this.policy = deps.policy ?? new RetryPolicy();
    this.logger = deps.logger ?? createNoopLogger();
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(documentId: string, options: RunOptions = {}): Promise<PipelineRunResult> {
    const controller = new AbortController();
    this.active.set(documentId, controller);
    const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;

    try {
      return await this.drive(documentId, signal);
    } catch (error: unknown) {
      if (error instanceof StageWriteError) throw error.failure;
      throw error;
    } finally {
      if (this.active.get(documentId) === controller) this.active.delete(documentId);
    }
  }

  /**
   * Cooperative cancel: the stage in flight finishes and persists, then
   * the run stops. Returns false when no run is active for the document.
   */
  cancel(documentId: string): boolean {
    const controller = this.active.get(documentId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  private async drive(documentId: string, signal: AbortSignal): Promise<PipelineRunResult> {
    const run: RunState = {
      doc: await this.deps.metadata.load(documentId),
      transitions: [],
      logger: createChildLogger(this.logger, { documentId }),
    };

    while (!isTerminal(run.doc.stage)) {
      if (signal.aborted) {
        run.logger.info({ documentId, stage: run.doc.stage }, "Pipeline run cancelled");
        return this.result(run, true);
      }
      try {
        await this.advance(run);
      } catch (error: unknown) {
        if (error instanceof InvariantViolationError || error instanceof StageWriteError) throw error;
        await this.fail(run, error);
      }
    }

    return this.result(run, false);
  }

  private result(run: RunState, cancelled: boolean): PipelineRunResult {
    return {
      documentId: run.doc.id,
      finalStage: run.doc.stage,
      transitions: run.transitions,
      cancelled,
    };
  }

  private advance(run: RunState): Promise<void> {
    switch (run.doc.stage) {
      case "INGESTED":
        return this.detectType(run);
      case "TYPE_DETECTED":
        return this.assessQuality(run);
      case "QUALITY_ASSESSED":
        return this.route(run);
      case "ENHANCING":
        return this.rescore(run);
      case "EXTRACTED":
        return this.preprocess(run);
      case "PREPROCESSED":
        return this.chunk(run);
      case "CHUNKED":
        return this.embed(run);
      case "EMBEDDED":
        return this.scan(run);
      case "SCANNED":
        return this.finish(run);
      default:
        throw new InvariantViolationError(`No handler for stage ${run.doc.stage}`);
    }
  }

  private async detectType(run: RunState): Promise<void> {
    const oversize = this.deps.router.checkSize(run.doc.sizeBytes);
    if (oversize) return this.reject(run, oversize);

    const bytes = await this.bytes(run);
    const detection = this.deps.router.detect(bytes, run.doc.filename, run.doc.declaredMimeType);
    await this.transition(run, "TYPE_DETECTED", {
      sizeBytes: bytes.byteLength,
      sniffedMimeType: detection.mimeType,
      fileCategory: detection.category,
      detectionConfidence: detection.confidence,
    });
  }

  private async assessQuality(run: RunState): Promise<void> {
    const assessment = await this.deps.router.assess(await this.bytes(run), this.category(run.doc));
    await this.transition(run, "QUALITY_ASSESSED", qualityFields(assessment));
  }

  private async route(run: RunState): Promise<void> {
    const { doc } = run;
    const category = this.category(doc);

    switch (doc.qualityDecision) {
      case "REJECT":
        return this.reject(run, doc.qualityReport);
      case "ENHANCE":
        if (doc.enhanced) {
          throw new LowConfidenceError(
            `Quality score ${formatScore(doc.qualityScore)} still below the process threshold after enhancement`,
            doc.qualityScore ?? 0,
          );
        }
        if (category === "image") {
          await this.transition(run, "ENHANCING", {});
          return;
        }
        run.logger.warn({ documentId: doc.id, category }, "Enhancement applies to images only, extracting as-is");
        return this.extract(run, [`Quality ${formatScore(doc.qualityScore)} below process threshold; no enhancement for ${category}`]);
      case "PROCESS":
        return this.extract(run, []);
      default:
        throw new InvariantViolationError(`Document ${doc.id} reached QUALITY_ASSESSED without a decision`);
    }
  }

  /** The one ENHANCING pass: enhance, then re-score the enhanced image once. */
  private async rescore(run: RunState): Promise<void> {
    const enhanced = await this.enhanced(run);
    const assessment = await this.deps.router.assess(enhanced, "image");
    await this.transition(run, "QUALITY_ASSESSED", { ...qualityFields(assessment), enhanced: true });
  }

  private async extract(run: RunState, warnings: string[]): Promise<void> {
    const { doc } = run;
    const category = this.category(doc);
    const bytes = doc.enhanced ? await this.enhanced(run) : await this.bytes(run);
    const context: ExtractionContext = {
      documentId: doc.id,
      filename: doc.filename,
      mimeType: doc.sniffedMimeType ?? doc.declaredMimeType,
      enhanced: doc.enhanced,
    };

    const result = await this.runProcessors(bytes, category, context);
    const extraction: ExtractionResult = { ...result, warnings: [...warnings, ...result.warnings] };
    if (extraction.warnings.length > 0) {
      run.logger.warn({ documentId: doc.id, warnings: extraction.warnings }, "Extraction completed with warnings");
    }

    await this.deps.metadata.saveExtraction(doc.id, extraction);
    run.extraction = extraction;
    await this.transition(run, "EXTRACTED", {});
  }

  /** Primary processor, then the fallback processor once on ExtractionError. */
  private async runProcessors(
    bytes: Uint8Array,
    category: FileCategory,
    context: ExtractionContext,
  ): Promise<ExtractionResult> {
    const primary = this.deps.processors.resolve(category);
    const fallback = this.deps.processors.fallback;
    if (primary === fallback) return primary.extract(bytes, category, context);

    const outcome = await new FallbackChain<ExtractionResult>(
      [
        { name: primary.name, run: () => primary.extract(bytes, category, context) },
        {
          name: fallback.name,
          run: () => fallback.extract(bytes, category, { ...context, attempted: [primary.name] }),
        },
      ],
      (error) => error instanceof ExtractionError,
    ).run();

    if (!outcome.ok) {
      const last = outcome.failures[outcome.failures.length - 1];
      if (!last) throw new InvariantViolationError("Fallback chain failed without recording a failure");
      throw last.error;
    }

    const [primaryFailure] = outcome.failures;
    if (!primaryFailure) return outcome.value;

    const reason = `${primaryFailure.name}: ${summarizeError(primaryFailure.error)}`;
    if (outcome.value.text.trim().length === 0) {
      throw new ExtractionError(`Fallback extraction found no text after ${reason}`, fallback.name, {
        cause: primaryFailure.error,
      });
    }
    return { ...outcome.value, warnings: [reason, ...outcome.value.warnings] };
  }

  private async preprocess(run: RunState): Promise<void> {
    const extraction = await this.extraction(run);
    if (extraction.humanReview) {
      throw new LowConfidenceError(`Extraction by ${extraction.processor} needs human review`, extraction.extractionConfidence);
    }
    if (extraction.extractionConfidence < this.options.minExtractionConfidence) {
      throw new LowConfidenceError(
        `Extraction confidence ${extraction.extractionConfidence.toFixed(2)} below ${this.options.minExtractionConfidence.toFixed(2)}`,
        extraction.extractionConfidence,
      );
    }

    const preprocessed = this.deps.preprocessor.process(extraction);
    await this.deps.metadata.savePreprocessed(run.doc.id, preprocessed);
    run.preprocessed = preprocessed;
    await this.transition(run, "PREPROCESSED", {
      language: preprocessed.language,
      needsTranslation: preprocessed.needsTranslation,
    });
  }

  private async chunk(run: RunState): Promise<void> {
    const { doc } = run;
    const preprocessed = await this.preprocessed(run);
    const documentType = this.deps.classifier.classify(preprocessed.text, this.category(doc));
    const { strategy, chunks } = this.deps.chunker.chunk({
      documentId: doc.id,
      text: preprocessed.text,
      documentType,
      needsTranslation: preprocessed.needsTranslation,
      confidence: preprocessed.confidence,
    });

    await this.deps.metadata.replaceChunks(doc.id, chunks);
    run.chunks = chunks;
    run.logger.debug({ documentId: doc.id, documentType, strategy, chunkCount: chunks.length }, "Document chunked");
    await this.transition(run, "CHUNKED", { documentType, chunkCount: chunks.length });
  }

  private async embed(run: RunState): Promise<void> {
    const { doc } = run;
    const chunks = await this.chunks(run);
    const { model, dimensions } = this.deps.embeddings;
    const outcomes = await this.deps.embeddings.generate(chunks.map((c) => ({ chunkId: c.id, text: c.text })));

    const failed = outcomes.filter((o) => o.status === "failed");
    if (failed.length > 0) {
      const reasons = failed.map((o) => (o.status === "failed" ? o.error : ""));
      throw new TransientIOError(
        `Embedding failed for ${String(failed.length)} of ${String(chunks.length)} chunks: ${reasons[0] ?? ""}`,
        "embeddings",
      );
    }

    const createdAt = this.clock();
    const embeddings = outcomes.map((outcome): Embedding => {
      if (outcome.status !== "ok") throw new InvariantViolationError(`Missing vector for ${outcome.chunkId}`);
      return { chunkId: outcome.chunkId, documentId: doc.id, vector: outcome.vector, model, dimensions, createdAt };
    });

    await this.deps.metadata.replaceEmbeddings(doc.id, model, embeddings);
    const records = chunks.map((chunk, i) => {
      const embedding = embeddings[i];
      if (!embedding) throw new InvariantViolationError(`Chunk ${chunk.id} has no embedding`);
      return vectorRecordFor(chunk, embedding);
    });
    await this.policy.execute(() => this.deps.vectorIndex.deleteByDocument(doc.id, model), "vector-index");
    if (records.length > 0) {
      await this.policy.execute(() => this.deps.vectorIndex.upsert(records), "vector-index");
    }

    run.embeddings = embeddings;
    await this.transition(run, "EMBEDDED", {});
  }

  private async scan(run: RunState): Promise<void> {
    const { doc } = run;
    const chunks = await this.chunks(run);
    const embeddings = run.embeddings ?? (await this.deps.metadata.loadEmbeddings(doc.id, this.deps.embeddings.model));
    if (embeddings.length !== chunks.length) {
      throw new InvariantViolationError(
        `Document ${doc.id} has ${String(chunks.length)} chunks but ${String(embeddings.length)} embeddings`,
      );
    }

    const events = await this.deps.triggers.scanDocument(chunks, embeddings);
    await this.deps.metadata.recordNotifications(doc.id, events);
    for (const event of events) {
      await this.policy.execute(() => this.deps.notifications.enqueue(event), "notification-sink");
    }

    await this.transition(run, "SCANNED", { notificationCount: events.length });
  }

  private async finish(run: RunState): Promise<void> {
    const { confidence } = await this.preprocessed(run);
    if (confidence < this.options.humanReviewConfidence) {
      throw new LowConfidenceError(
        `Document confidence ${confidence.toFixed(2)} below ${this.options.humanReviewConfidence.toFixed(2)}`,
        confidence,
      );
    }
    await this.transition(run, "READY", {});
  }

  private async reject(run: RunState, assessment: QualityAssessment | null): Promise<void> {
    const reason = assessment?.issues.join("; ") || "Quality score below the enhancement threshold";
    const message = summarizeError(new ValidationError(reason));
    await this.transition(run, "REJECTED", {
      ...(assessment ? qualityFields(assessment) : {}),
      errors: [...run.doc.errors, message],
    });
    run.logger.warn({ documentId: run.doc.id, reason }, "Document rejected");
  }

  private async fail(run: RunState, error: unknown): Promise<void> {
    const stage = run.doc.stage;

    if (error instanceof LowConfidenceError && canTransition(stage, "HUMAN_REVIEW")) {
      await this.transition(run, "HUMAN_REVIEW", { humanReviewReason: error.message });
      run.logger.info({ documentId: run.doc.id, stage, reason: error.message }, "Document routed to human review");
      return;
    }

    const message = summarizeError(error);
    const to = error instanceof ValidationError ? "REJECTED" : "FAILED";
    await this.transition(run, to, { errors: [...run.doc.errors, message] });

    if (to === "REJECTED") {
      run.logger.warn({ documentId: run.doc.id, stage, error: message }, "Document rejected");
      return;
    }

    run.logger.error({ documentId: run.doc.id, stage, error: message }, "Document processing failed");
    try {
      await this.deps.deadLetters.deadLetter({
        documentId: run.doc.id,
        stage,
        failureReason: message,
        failedAt: this.clock(),
      });
    } catch (dlqError: unknown) {
      run.logger.error({ documentId: run.doc.id, error: summarizeError(dlqError) }, "Dead-letter enqueue failed");
    }
  }

  private async transition(run: RunState, to: PipelineStage, fields: DocumentPatch): Promise<void> {
    const from = run.doc.stage;
    assertTransition(from, to, run.doc.enhanced);

    let next: Document;
    try {
      next = await this.deps.metadata.persistStage(run.doc.id, to, fields);
    } catch (error: unknown) {
      throw new StageWriteError(run.doc.id, to, error);
    }

    run.doc = next;
    run.transitions.push({ documentId: next.id, from, to, at: this.clock() });
    run.logger.info({ documentId: next.id, from, to }, "Stage transition");
  }

  private category(doc: Document): FileCategory {
    if (!doc.fileCategory) {
      throw new InvariantViolationError(`Document ${doc.id} at ${doc.stage} has no file category`);
    }
    return doc.fileCategory;
  }

  private async bytes(run: RunState): Promise<Uint8Array> {
    if (!run.bytes) {
      const id = run.doc.id;
      run.bytes = await this.policy.execute((signal) => this.deps.objectStore.getBytes(id, signal), "object-store");
    }
    return run.bytes;
  }

  /** Enhancement is deterministic, so a resumed run recomputes it from the original. */
  private async enhanced(run: RunState): Promise<Uint8Array> {
    if (!run.enhancedBytes) {
      const image = await this.enhance(await this.bytes(run));
      run.enhancedBytes = image.bytes;
      run.logger.debug({ documentId: run.doc.id, steps: image.steps }, "Image enhanced");
    }
    return run.enhancedBytes;
  }

  private async extraction(run: RunState): Promise<ExtractionResult> {
    const extraction = run.extraction ?? (await this.deps.metadata.loadExtraction(run.doc.id));
    if (!extraction) throw new InvariantViolationError(`Document ${run.doc.id} is EXTRACTED without an extraction`);
    return extraction;
  }

  private async preprocessed(run: RunState): Promise<PreprocessedText> {
    const preprocessed = run.preprocessed ?? (await this.deps.metadata.loadPreprocessed(run.doc.id));
    if (!preprocessed) {
      throw new InvariantViolationError(`Document ${run.doc.id} at ${run.doc.stage} has no preprocessed text`);
    }
    return preprocessed;
  }

  private async chunks(run: RunState): Promise<Chunk[]> {
    if (!run.chunks) run.chunks = await this.deps.metadata.loadChunks(run.doc.id);
    return run.chunks;
  }
}

function qualityFields(assessment: QualityAssessment): DocumentPatch {
  return {
    qualityScore: assessment.score,
    qualityDecision: assessment.decision,
    qualityReport: assessment,
  };
}

function formatScore(score: number | null): string {
  return score === null ? "n/a" : score.toFixed(2);
}
