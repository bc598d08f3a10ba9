export { PipelineOrchestrator } from "./orchestrator.js";
export type { OrchestratorDependencies, OrchestratorOptions } from "./orchestrator.js";
export { PipelineService, toStatus } from "./pipeline-service.js";
export type { PipelineServiceDependencies } from "./pipeline-service.js";
export { assertTransition, canTransition, isTerminal } from "./state-machine.js";
