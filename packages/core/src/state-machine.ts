import { InvariantViolationError } from "@docpipe/errors";
import { TERMINAL_STAGES, type PipelineStage } from "@docpipe/types";

/**
 * Forward edges of the pipeline. REJECTED and FAILED are reachable from
 * every non-terminal stage and are not listed here.
 */
const FORWARD: Readonly<Record<PipelineStage, readonly PipelineStage[]>> = {
  INGESTED: ["TYPE_DETECTED"],
  TYPE_DETECTED: ["QUALITY_ASSESSED"],
  QUALITY_ASSESSED: ["ENHANCING", "EXTRACTED", "HUMAN_REVIEW"],
  ENHANCING: ["QUALITY_ASSESSED"],
  EXTRACTED: ["PREPROCESSED", "HUMAN_REVIEW"],
  PREPROCESSED: ["CHUNKED"],
  CHUNKED: ["EMBEDDED"],
  EMBEDDED: ["SCANNED"],
  SCANNED: ["READY", "HUMAN_REVIEW"],
  READY: [],
  REJECTED: [],
  FAILED: [],
  HUMAN_REVIEW: [],
};

export function isTerminal(stage: PipelineStage): boolean {
  return TERMINAL_STAGES.includes(stage);
}

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  if (isTerminal(from)) return false;
  if (to === "REJECTED" || to === "FAILED") return true;
  return FORWARD[from].includes(to);
}

/**
 * Throws on an edge outside the state machine. The re-score loop
 * (QUALITY_ASSESSED → ENHANCING) is allowed once per document.
 */
export function assertTransition(from: PipelineStage, to: PipelineStage, enhanced: boolean): void {
  if (!canTransition(from, to)) {
    throw new InvariantViolationError(`Illegal stage transition ${from} → ${to}`, { details: { from, to } });
  }
  if (to === "ENHANCING" && enhanced) {
    throw new InvariantViolationError("Enhancement pass already ran", { details: { from, to } });
  }
}
