import { describe, it, expect, vi } from "vitest";
import { withRetry, RetryPolicy } from "./retry.js";
import { AppError } from "./app-error.js";
import { NotFoundError, TimeoutError, TransientIOError } from "./errors.js";
import { withTimeout } from "./timeout.js";

describe("withRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws the last error after maxRetries exhausted", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi.fn().mockRejectedValue(new NotFoundError("missing"));

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("missing");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TransientIOError("store down", "s3"))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does NOT retry non-operational errors", async () => {
    const fn = vi.fn().mockRejectedValue(
      new AppError({ message: "corrupt", statusCode: 500, code: "INVARIANT", isOperational: false }),
    );

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("corrupt");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(new AppError({ message: "Server error", statusCode: 502, code: "BAD_GATEWAY" }));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1, retryableErrors: ["TIMEOUT"] }),
    ).rejects.toThrow("Server error");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("reports each retry through onRetry", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new Error("fail"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, onRetry })).rejects.toThrow(
      "fail",
    );

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
    expect(onRetry.mock.calls[1]?.[0]).toBe(2);
  });
});

describe("withTimeout", () => {
  it("resolves when the call finishes in time", async () => {
    await expect(withTimeout(async () => "done", 100, "store")).resolves.toBe("done");
  });

  it("rejects with TimeoutError and aborts the signal", async () => {
    let seen: AbortSignal | undefined;
    const never = (signal: AbortSignal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    };

    await expect(withTimeout(never, 10, "ocr")).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });
});

describe("RetryPolicy", () => {
  it("makes maxAttempts calls in total before giving up", async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, timeoutMs: 100 });
    const fn = vi.fn().mockRejectedValue(new TransientIOError("ocr crashed", "ocr"));

    await expect(policy.execute(fn, "ocr")).rejects.toThrow("ocr crashed");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("retries an attempt that timed out", async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, timeoutMs: 10 });
    let calls = 0;
    const fn = () => {
      calls += 1;
      return calls === 1 ? new Promise<string>(() => undefined) : Promise.resolve("second");
    };

    await expect(policy.execute(fn, "embedding")).resolves.toBe("second");
    expect(calls).toBe(2);
  });

  it("never makes fewer than one attempt", () => {
    expect(new RetryPolicy({ maxAttempts: 0 }).maxAttempts).toBe(1);
  });

  it("derives a policy with overrides", () => {
    const base = new RetryPolicy({ maxAttempts: 3, timeoutMs: 30_000 });
    const ocr = base.with({ timeoutMs: 120_000 });
    expect(ocr.maxAttempts).toBe(3);
    expect(ocr.timeoutMs).toBe(120_000);
  });
});
