import type { ExitStatus } from "./tool";

export type Goal = string;

export interface ToolStep {
  index: number;
  inputs: Readonly<Record<string, string>>;
  kind: "tool";
  rationale: string;
  toolName: string;
}

export interface InfoStep {
  index: number;
  kind: "info";
  text: string;
}

export type PlanStep = InfoStep | ToolStep;

export interface Plan {
  attempt: number;
  source: "planner" | "replanner";
  steps: readonly PlanStep[];
}

export const DIAGNOSTIC_KINDS = [
  "MalformedStep",
  "MissingInput",
  "PlaceholderDetected",
  "UnknownTool",
] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  stepIndex: number;
}

export interface SimulationResult {
  predictedEffect: string;
  riskFlag: boolean;
  riskReason?: string;
  stepIndex: number;
  toolName?: string;
}

export interface ExecutionResult {
  exitStatus: ExitStatus | null;
  fault?: string;
  stderr: string;
  stdout: string;
  stepIndex: number;
  success: boolean;
  toolName?: string;
}

export type AttemptOutcome = "executed" | "rejected" | "simulated" | "unparseable";

export interface Feedback {
  attempt: number;
  diagnostics: readonly Diagnostic[];
  executionResults: readonly ExecutionResult[];
  goal: Goal;
  narrativeSummary: string;
  outcome: AttemptOutcome;
  simulationResults: readonly SimulationResult[];
}

export function isToolStep(step: PlanStep): step is ToolStep {
  return step.kind === "tool";
}

export function getToolSteps(plan: Plan): ToolStep[] {
  return plan.steps.filter(isToolStep);
}
