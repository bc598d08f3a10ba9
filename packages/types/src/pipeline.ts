import type { PipelineStage } from "./document.js";

export interface StageTransition {
  documentId: string;
  from: PipelineStage;
  to: PipelineStage;
  at: Date;
}

export interface PipelineRunResult {
  documentId: string;
  finalStage: PipelineStage;
  transitions: StageTransition[];
  cancelled: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
}
