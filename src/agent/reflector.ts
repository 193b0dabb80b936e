import type {
  AttemptOutcome,
  Diagnostic,
  ExecutionResult,
  Feedback,
  Goal,
  Plan,
  SimulationResult,
  ToolStep,
} from "../types/plan";
import type { RunLog } from "./run-log";

import { getToolSteps } from "../types/plan";
import { describeExitStatus } from "../types/tool";

const FAILURE_DETAIL_MAX_CHARS = 200;

export interface ReflectionInput {
  attempt: number;
  diagnostics: readonly Diagnostic[];
  executionResults: readonly ExecutionResult[];
  goal: Goal;
  outcome: AttemptOutcome;
  parseFailure?: {
    detail: string;
    reason: string;
  };
  plan?: Plan;
  simulationResults: readonly SimulationResult[];
}

function lastMeaningfulLine(text: string): string | undefined {
  const lines = text
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const last = lines[lines.length - 1];
  if (!last) {
    return undefined;
  }
  return last.length > FAILURE_DETAIL_MAX_CHARS ? `${last.slice(0, FAILURE_DETAIL_MAX_CHARS)}...` : last;
}

function labelStep(stepIndex: number, toolName?: string): string {
  return toolName ? `step ${stepIndex} (${toolName})` : `step ${stepIndex}`;
}

function describeExecutionFailure(result: ExecutionResult): string {
  const label = labelStep(result.stepIndex, result.toolName);
  if (result.fault) {
    return `${label} could not run: ${result.fault}`;
  }

  const status = result.exitStatus ? describeExitStatus(result.exitStatus) : "no exit status";
  const detail = lastMeaningfulLine(result.stderr) ?? lastMeaningfulLine(result.stdout);
  return detail ? `${label} failed with ${status}: ${detail}` : `${label} failed with ${status}`;
}

function describeRejection(diagnostics: readonly Diagnostic[]): string {
  const reasons = diagnostics.map(
    (diagnostic) => `step ${diagnostic.stepIndex}: ${diagnostic.message} [${diagnostic.kind}]`
  );
  return reasons.join("; ");
}

function describeExecution(
  toolSteps: readonly ToolStep[],
  executionResults: readonly ExecutionResult[]
): string[] {
  const byIndex = new Map(executionResults.map((result) => [result.stepIndex, result]));
  const ran = toolSteps.filter((step) => byIndex.has(step.index));
  const succeeded = ran.filter((step) => byIndex.get(step.index)?.success === true);

  const lines = [
    `executed ${ran.length} of ${toolSteps.length} tool steps; ${succeeded.length} succeeded.`,
  ];

  for (const step of toolSteps) {
    const result = byIndex.get(step.index);
    if (!result) {
      lines.push(`- ${labelStep(step.index, step.toolName)} was not reached`);
    } else if (!result.success) {
      lines.push(`- ${describeExecutionFailure(result)}`);
    }
  }

  if (toolSteps.length > 0 && succeeded.length === toolSteps.length) {
    lines.push("All tool steps succeeded.");
  }

  return lines;
}

function describeSimulationWarnings(simulationResults: readonly SimulationResult[]): string[] {
  const flagged = simulationResults.filter((result) => result.riskFlag);
  if (flagged.length === 0) {
    return [];
  }

  return [
    "Simulation warnings:",
    ...flagged.map(
      (result) =>
        `- ${labelStep(result.stepIndex, result.toolName)}: ${result.riskReason ?? "flagged as risky"}`
    ),
  ];
}

export function buildNarrative(input: ReflectionInput): string {
  const prefix = `Attempt ${input.attempt}:`;

  if (input.outcome === "unparseable") {
    const reason = input.parseFailure
      ? `${input.parseFailure.detail} (${input.parseFailure.reason})`
      : "unknown";
    return `${prefix} planner response could not be parsed, reason: ${reason}.`;
  }

  if (input.outcome === "rejected") {
    return `${prefix} plan rejected before execution, reason: ${describeRejection(input.diagnostics)}.`;
  }

  const toolSteps = input.plan ? getToolSteps(input.plan) : [];
  const simulationWarnings = describeSimulationWarnings(input.simulationResults);

  if (input.outcome === "simulated") {
    const predictions = input.simulationResults.map(
      (result) => `- ${labelStep(result.stepIndex, result.toolName)}: ${result.predictedEffect}`
    );
    return [
      `${prefix} dry run; ${toolSteps.length} tool steps simulated, none executed.`,
      ...predictions,
      ...simulationWarnings,
    ].join("\n");
  }

  const [summary, ...details] = describeExecution(toolSteps, input.executionResults);
  return [`${prefix} ${summary ?? ""}`, ...details, ...simulationWarnings].join("\n");
}

export function reflect(input: ReflectionInput, runLog: RunLog): Feedback {
  const feedback: Feedback = {
    attempt: input.attempt,
    diagnostics: [...input.diagnostics],
    executionResults: [...input.executionResults],
    goal: input.goal,
    narrativeSummary: buildNarrative(input),
    outcome: input.outcome,
    simulationResults: [...input.simulationResults],
  };

  runLog.append(feedback);
  return feedback;
}
