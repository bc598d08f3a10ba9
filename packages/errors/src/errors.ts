import { AppError } from "./app-error.js";

interface ErrorOptions {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorOptions) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ExtractionError extends AppError {
  public readonly processor: string;

  constructor(message = "Extraction failed", processor = "unknown", options?: ErrorOptions) {
    super({
      message,
      statusCode: 422,
      code: "EXTRACTION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.processor = processor;
  }
}

/** A store, OCR or embedding call failed in a way that may succeed on retry. */
export class TransientIOError extends AppError {
  public readonly service: string;

  constructor(
    message = "Transient I/O failure",
    service = "unknown",
    options?: ErrorOptions & { statusCode?: number; code?: string },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 503,
      code: options?.code ?? "TRANSIENT_IO_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class TimeoutError extends TransientIOError {
  public readonly timeoutMs: number;

  constructor(message = "Operation timed out", service = "unknown", timeoutMs = 0, options?: ErrorOptions) {
    super(message, service, { ...options, statusCode: 504, code: "TIMEOUT" });
    this.timeoutMs = timeoutMs;
  }
}

/** Not a failure: routes the document to HUMAN_REVIEW. */
export class LowConfidenceError extends AppError {
  public readonly confidence: number;

  constructor(message = "Confidence too low for automated processing", confidence = 0, options?: ErrorOptions) {
    super({
      message,
      statusCode: 422,
      code: "LOW_CONFIDENCE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.confidence = confidence;
  }
}

/** Data-model corruption. Never translated into a stage transition. */
export class InvariantViolationError extends AppError {
  constructor(message = "Invariant violated", options?: ErrorOptions) {
    super({
      message,
      statusCode: 500,
      code: "INVARIANT_VIOLATION",
      isOperational: false,
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}
