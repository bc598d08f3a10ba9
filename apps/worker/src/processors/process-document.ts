import type { Job } from "bullmq";
import type { PipelineOrchestrator } from "@docpipe/core";
import type { Logger } from "@docpipe/logger";
import type { PipelineRunResult, ProcessDocumentJobData } from "@docpipe/types";

/**
 * One job runs one document to a terminal stage, or to the point of
 * cancellation. A thrown error (a failed stage write or an invariant
 * violation) fails the job; BullMQ's retry then resumes from the last
 * persisted stage.
 */
export function createDocumentProcessor(orchestrator: Pick<PipelineOrchestrator, "run">, logger: Logger) {
  return async (job: Pick<Job<ProcessDocumentJobData>, "data" | "attemptsMade">): Promise<PipelineRunResult> => {
    const { documentId } = job.data;
    const result = await orchestrator.run(documentId);
    logger.info(
      {
        documentId,
        finalStage: result.finalStage,
        transitions: result.transitions.length,
        cancelled: result.cancelled,
        attempt: job.attemptsMade + 1,
      },
      "Document run finished",
    );
    return result;
  };
}
