import { AppError } from "./app-error.js";
import { withTimeout } from "./timeout.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 2 (three calls in total) */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each backoff sleep. */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Determines whether an error is retryable.
 * Client errors (4xx) are NOT retried; server errors (5xx) and network errors ARE retried.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }
    if (!error.isOperational) {
      return false;
    }
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }
    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * Does NOT retry on 4xx (client) errors -- only 5xx and network errors.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryableErrors = options?.retryableErrors;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || !isRetryable(error, retryableErrors)) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      options?.onRetry?.(attempt + 1, delay, error);
      await sleep(delay);
    }
  }

  throw lastError;
}

export interface RetryPolicyOptions {
  /** Total calls including the first. Default: 3 */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Per-attempt deadline. Default: 30000 */
  timeoutMs?: number;
  retryableErrors?: string[];
  onRetry?: RetryOptions["onRetry"];
}

/**
 * Failure policy for one kind of external call: a per-attempt timeout and a
 * small fixed retry budget with exponential backoff. Exhaustion rethrows the
 * last error.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly timeoutMs: number;
  private readonly retryableErrors?: string[];
  private readonly onRetry?: RetryOptions["onRetry"];

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryableErrors = options.retryableErrors;
    this.onRetry = options.onRetry;
  }

  execute<T>(fn: (signal: AbortSignal) => Promise<T>, service = "unknown"): Promise<T> {
    return withRetry(() => withTimeout(fn, this.timeoutMs, service), {
      maxRetries: this.maxAttempts - 1,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      retryableErrors: this.retryableErrors,
      onRetry: this.onRetry,
    });
  }

  with(overrides: RetryPolicyOptions): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      timeoutMs: this.timeoutMs,
      retryableErrors: this.retryableErrors,
      onRetry: this.onRetry,
      ...overrides,
    });
  }
}
