import { TimeoutError } from "./errors.js";

/**
 * Run `fn` with a deadline. The signal handed to `fn` aborts when the
 * deadline passes so cooperative callees (fetch, child processes) can stop.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  service = "unknown",
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${service} call exceeded ${String(timeoutMs)}ms`, service, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
