import { describe, expect, test } from "vitest";

import type { DecisionInput } from "../../src/agent/state";
import type { Plan } from "../../src/types/plan";

import { assertTransition, canTransition, decide, isTerminalState } from "../../src/agent/state";
import { AgentError } from "../../src/utils/errors";

const onePlan: Plan = {
  attempt: 1,
  source: "planner",
  steps: [{ index: 0, inputs: {}, kind: "tool", rationale: "", toolName: "git_status" }],
};

function decisionInput(overrides: Partial<DecisionInput>): DecisionInput {
  return {
    attempt: 1,
    consecutiveParseFailures: 0,
    diagnostics: [],
    executionResults: [],
    maxAttempts: 3,
    maxConsecutiveParseFailures: 2,
    outcome: "rejected",
    ...overrides,
  };
}

describe("lifecycle transitions", () => {
  test("allows the documented paths", () => {
    expect(canTransition("planning", "validating")).toBe(true);
    expect(canTransition("planning", "reflecting")).toBe(true);
    expect(canTransition("simulating", "reflecting")).toBe(true);
    expect(canTransition("deciding", "planning")).toBe(true);
  });

  test("rejects skipping validation", () => {
    expect(canTransition("planning", "executing")).toBe(false);
    expect(() => assertTransition("planning", "executing")).toThrow(AgentError);
  });

  test("terminal states have no way out", () => {
    expect(isTerminalState("succeeded")).toBe(true);
    expect(isTerminalState("failed")).toBe(true);
    expect(isTerminalState("dry_run")).toBe(true);
    expect(isTerminalState("reflecting")).toBe(false);
    expect(canTransition("succeeded", "planning")).toBe(false);
  });
});

describe("deciding", () => {
  test("succeeds when every tool step succeeded", () => {
    const decision = decide(
      decisionInput({
        executionResults: [
          {
            exitStatus: { code: 0, kind: "code" },
            stderr: "",
            stdout: "",
            stepIndex: 0,
            success: true,
            toolName: "git_status",
          },
        ],
        outcome: "executed",
        plan: onePlan,
      })
    );

    expect(decision).toEqual({ next: "succeeded" });
  });

  test("replans when a step was not reached", () => {
    expect(decide(decisionInput({ outcome: "executed", plan: onePlan }))).toEqual({ next: "replan" });
  });

  test("fails as exhausted on the last attempt", () => {
    expect(decide(decisionInput({ attempt: 3 }))).toEqual({
      next: "failed",
      reason: "lifecycle_exhausted",
    });
  });

  test("gives up on repeated unparseable replies before the attempt cap", () => {
    expect(
      decide(decisionInput({ attempt: 2, consecutiveParseFailures: 2, outcome: "unparseable" }))
    ).toEqual({ next: "failed", reason: "planner_unparseable" });
  });

  test("ends a dry run after simulation", () => {
    expect(decide(decisionInput({ outcome: "simulated", plan: onePlan }))).toEqual({ next: "dry_run" });
  });
});
