import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import type { NotificationEvent, PipelineRunResult } from "@docpipe/types";
import { createDocumentProcessor } from "./process-document.js";
import { createNotificationDeliverer } from "./deliver-notification.js";

function capturingLogger() {
  const lines: unknown[] = [];
  const logger = pino(
    { level: "info", base: undefined, timestamp: false },
    { write: (line: string) => void lines.push(JSON.parse(line)) },
  );
  return { logger, lines };
}

describe("createDocumentProcessor", () => {
  it("runs the orchestrator for the job's document and returns its result", async () => {
    const result: PipelineRunResult = {
      documentId: "doc-1",
      finalStage: "READY",
      transitions: [],
      cancelled: false,
    };
    const run = vi.fn().mockResolvedValue(result);
    const { logger, lines } = capturingLogger();

    const handle = createDocumentProcessor({ run }, logger);
    const out = await handle({ data: { type: "process-document", documentId: "doc-1" }, attemptsMade: 1 });

    expect(out).toBe(result);
    expect(run).toHaveBeenCalledWith("doc-1");
    expect(lines[0]).toMatchObject({ documentId: "doc-1", finalStage: "READY", attempt: 2, msg: "Document run finished" });
  });

  it("lets run errors fail the job", async () => {
    const run = vi.fn().mockRejectedValue(new Error("connection reset"));
    const handle = createDocumentProcessor({ run }, capturingLogger().logger);

    await expect(
      handle({ data: { type: "process-document", documentId: "doc-1" }, attemptsMade: 0 }),
    ).rejects.toThrow("connection reset");
  });
});

describe("createNotificationDeliverer", () => {
  it("hands the event over as a structured record titled by the event", async () => {
    const event: NotificationEvent = {
      id: "evt-1",
      category: "urgent_maintenance",
      similarity: 0.91,
      chunkId: "doc-1:0",
      documentId: "doc-1",
      priority: "high",
      recipients: ["engineering"],
      title: "Urgent maintenance detected",
      message: "m",
      createdAt: new Date("2026-01-01T00:00:00.000Z"),
    };
    const { logger, lines } = capturingLogger();

    await createNotificationDeliverer(logger)({ data: { type: "notify", event } });

    expect(lines).toEqual([
      {
        level: 30,
        eventId: "evt-1",
        documentId: "doc-1",
        chunkId: "doc-1:0",
        category: "urgent_maintenance",
        priority: "high",
        similarity: 0.91,
        recipients: ["engineering"],
        msg: "Urgent maintenance detected",
      },
    ]);
  });
});
