export { executePlan, type ExecuteOptions, type ExecutionReport, type StepApprover } from "./agent/executor";
export { runLifecycle, type LifecycleInput, type LifecycleResult } from "./agent/lifecycle";
export type { LifecycleObserver } from "./agent/observer";
export {
  createScriptedOracle,
  type OracleReply,
  type PlanOracle,
  type PlanRequest,
  type PlanningMode,
} from "./agent/oracle";
export { createLlmPlanOracle } from "./agent/planner";
export { extractPlanPayload, stripReasoningTraces } from "./agent/planner/parser";
export { containsPlaceholder, findPlaceholders } from "./agent/placeholders";
export { buildNarrative, reflect } from "./agent/reflector";
export { RunLog, type FeedbackSink } from "./agent/run-log";
export { simulatePlan, simulateStep } from "./agent/simulator";
export { canTransition, decide, type LifecycleState } from "./agent/state";
export { isExecutable, validatePlan } from "./agent/validator";
export { LlmClient } from "./llm/client";
export { builtinTools, createDefaultRegistry, createRegistry, ToolRegistry } from "./tools";
export { DEFAULT_LIFECYCLE_OPTIONS, type AgentConfig, type LifecycleOptions } from "./types/config";
export * from "./types/plan";
export * from "./types/tool";
export * from "./utils/errors";
