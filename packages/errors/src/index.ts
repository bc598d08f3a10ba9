export { AppError, summarizeError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ValidationError,
  NotFoundError,
  ExtractionError,
  TransientIOError,
  TimeoutError,
  LowConfidenceError,
  InvariantViolationError,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { Breaker, CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry, isRetryable, RetryPolicy } from "./retry.js";
export type { RetryOptions, RetryPolicyOptions } from "./retry.js";

export { withTimeout } from "./timeout.js";

export { FallbackChain } from "./fallback.js";
export type { FallbackAttempt, FallbackFailure, FallbackOutcome } from "./fallback.js";
