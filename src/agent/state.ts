import type { AttemptOutcome, Diagnostic, ExecutionResult, Plan } from "../types/plan";

import { getToolSteps } from "../types/plan";
import { AgentError } from "../utils/errors";
import { hasBlockingDiagnostics } from "./validator";

export type LifecycleState =
  | "deciding"
  | "dry_run"
  | "executing"
  | "failed"
  | "planning"
  | "reflecting"
  | "simulating"
  | "succeeded"
  | "validating";

export type TerminalState = Extract<LifecycleState, "dry_run" | "failed" | "succeeded">;

export type LifecycleFailureReason = "lifecycle_exhausted" | "planner_unparseable";

const VALID_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  deciding: ["planning", "succeeded", "failed", "dry_run"],
  dry_run: [],
  executing: ["reflecting"],
  failed: [],
  planning: ["validating", "reflecting"],
  reflecting: ["deciding"],
  simulating: ["executing", "reflecting"],
  succeeded: [],
  validating: ["simulating", "reflecting"],
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: LifecycleState, to: LifecycleState): LifecycleState {
  if (!canTransition(from, to)) {
    throw new AgentError(`Invalid lifecycle transition: ${from} -> ${to}`, "INVALID_TRANSITION");
  }
  return to;
}

export function isTerminalState(state: LifecycleState): state is TerminalState {
  return VALID_TRANSITIONS[state].length === 0;
}

export type Decision =
  | {
      next: "dry_run";
    }
  | {
      next: "failed";
      reason: LifecycleFailureReason;
    }
  | {
      next: "replan";
    }
  | {
      next: "succeeded";
    };

export interface DecisionInput {
  attempt: number;
  consecutiveParseFailures: number;
  diagnostics: readonly Diagnostic[];
  executionResults: readonly ExecutionResult[];
  maxAttempts: number;
  maxConsecutiveParseFailures: number;
  outcome: AttemptOutcome;
  plan?: Plan;
}

export function allToolStepsSucceeded(
  plan: Plan,
  executionResults: readonly ExecutionResult[]
): boolean {
  const byIndex = new Map(executionResults.map((result) => [result.stepIndex, result]));
  return getToolSteps(plan).every((step) => byIndex.get(step.index)?.success === true);
}

export function decide(input: DecisionInput): Decision {
  if (input.outcome === "simulated") {
    return { next: "dry_run" };
  }

  if (
    input.outcome === "executed" &&
    input.plan &&
    !hasBlockingDiagnostics(input.diagnostics) &&
    allToolStepsSucceeded(input.plan, input.executionResults)
  ) {
    return { next: "succeeded" };
  }

  if (input.consecutiveParseFailures >= input.maxConsecutiveParseFailures) {
    return { next: "failed", reason: "planner_unparseable" };
  }

  if (input.attempt >= input.maxAttempts) {
    return { next: "failed", reason: "lifecycle_exhausted" };
  }

  return { next: "replan" };
}
