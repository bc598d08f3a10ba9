import { TransientIOError } from "@docpipe/errors";

/**
 * Maps an upstream HTTP status onto a TransientIOError. Rate limiting stays
 * retryable; other 4xx keep their status and are not retried.
 */
export function upstreamError(service: string, status: number, detail: string, cause?: unknown): TransientIOError {
  const statusCode = status === 429 || status >= 500 ? 503 : status;
  return new TransientIOError(`${service} responded ${String(status)}: ${detail}`, service, {
    statusCode,
    details: { upstreamStatus: status },
    cause,
  });
}
