import type { Diagnostic, ExecutionResult, Feedback, SimulationResult, ToolStep } from "../types/plan";
import type { PlanningMode } from "./oracle";
import type { LifecycleState } from "./state";

export interface LifecycleTransitionEvent {
  attempt: number;
  from: LifecycleState;
  to: LifecycleState;
}

export interface LifecycleAttemptStartEvent {
  attempt: number;
  maxAttempts: number;
  mode: PlanningMode;
}

export interface LifecycleDiagnosticsEvent {
  attempt: number;
  diagnostics: readonly Diagnostic[];
}

export interface LifecycleSimulationEvent {
  attempt: number;
  results: readonly SimulationResult[];
}

export interface LifecycleStepStartEvent {
  attempt: number;
  step: ToolStep;
}

export interface LifecycleStepResultEvent {
  attempt: number;
  result: ExecutionResult;
}

export interface LifecycleObserver {
  onAttemptStart?: (event: LifecycleAttemptStartEvent) => void;
  onDiagnostics?: (event: LifecycleDiagnosticsEvent) => void;
  onFeedback?: (feedback: Feedback) => void;
  onSimulation?: (event: LifecycleSimulationEvent) => void;
  onStepResult?: (event: LifecycleStepResultEvent) => void;
  onStepStart?: (event: LifecycleStepStartEvent) => void;
  onTransition?: (event: LifecycleTransitionEvent) => void;
}
