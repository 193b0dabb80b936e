import { describe, expect, test } from "vitest";

import type { ExecutionResult, Plan } from "../../src/types/plan";

import { buildNarrative, reflect } from "../../src/agent/reflector";
import { RunLog } from "../../src/agent/run-log";

const twoStepPlan: Plan = {
  attempt: 1,
  source: "planner",
  steps: [
    { index: 0, inputs: {}, kind: "tool", rationale: "", toolName: "lint" },
    { index: 1, inputs: {}, kind: "tool", rationale: "", toolName: "git_status" },
  ],
};

function succeeded(stepIndex: number, toolName: string): ExecutionResult {
  return {
    exitStatus: { code: 0, kind: "code" },
    stderr: "",
    stdout: "ok",
    stepIndex,
    success: true,
    toolName,
  };
}

const emptyAttempt = {
  diagnostics: [],
  executionResults: [],
  goal: "check repo state",
  simulationResults: [],
};

describe("reflection narratives", () => {
  test("summarizes a failed exit with the last line of stderr", () => {
    const narrative = buildNarrative({
      ...emptyAttempt,
      attempt: 2,
      executionResults: [
        {
          exitStatus: { code: 1, kind: "code" },
          stderr: "checking\n2 problems\n",
          stdout: "",
          stepIndex: 0,
          success: false,
          toolName: "lint",
        },
        succeeded(1, "git_status"),
      ],
      outcome: "executed",
      plan: twoStepPlan,
    });

    expect(narrative).toBe(
      "Attempt 2: executed 2 of 2 tool steps; 1 succeeded.\n- step 0 (lint) failed with exit code 1: 2 problems"
    );
  });

  test("names the fault and the steps that were not reached", () => {
    const narrative = buildNarrative({
      ...emptyAttempt,
      attempt: 1,
      executionResults: [
        {
          exitStatus: null,
          fault: "tool could not be invoked: spawn ENOENT",
          stderr: "",
          stdout: "",
          stepIndex: 0,
          success: false,
          toolName: "lint",
        },
      ],
      outcome: "executed",
      plan: twoStepPlan,
    });

    expect(narrative).toBe(
      [
        "Attempt 1: executed 1 of 2 tool steps; 0 succeeded.",
        "- step 0 (lint) could not run: tool could not be invoked: spawn ENOENT",
        "- step 1 (git_status) was not reached",
      ].join("\n")
    );
  });

  test("notes full success and simulation warnings", () => {
    const narrative = buildNarrative({
      ...emptyAttempt,
      attempt: 1,
      executionResults: [succeeded(0, "lint"), succeeded(1, "git_status")],
      outcome: "executed",
      plan: twoStepPlan,
      simulationResults: [
        {
          predictedEffect: "rewrites files",
          riskFlag: true,
          riskReason: 'tool "lint" declares destructive effects',
          stepIndex: 0,
          toolName: "lint",
        },
      ],
    });

    expect(narrative).toBe(
      [
        "Attempt 1: executed 2 of 2 tool steps; 2 succeeded.",
        "All tool steps succeeded.",
        "Simulation warnings:",
        '- step 0 (lint): tool "lint" declares destructive effects',
      ].join("\n")
    );
  });

  test("lists every diagnostic of a rejected plan", () => {
    const narrative = buildNarrative({
      ...emptyAttempt,
      attempt: 1,
      diagnostics: [{ kind: "UnknownTool", message: 'unknown tool "delete_everything"', stepIndex: 0 }],
      outcome: "rejected",
    });

    expect(narrative).toBe(
      'Attempt 1: plan rejected before execution, reason: step 0: unknown tool "delete_everything" [UnknownTool].'
    );
  });

  test("explains an unparseable reply", () => {
    const narrative = buildNarrative({
      ...emptyAttempt,
      attempt: 3,
      outcome: "unparseable",
      parseFailure: { detail: "reply contained no JSON object", reason: "missing_json_payload" },
    });

    expect(narrative).toBe(
      "Attempt 3: planner response could not be parsed, reason: reply contained no JSON object (missing_json_payload)."
    );
  });

  test("lists predictions for a dry run", () => {
    const narrative = buildNarrative({
      ...emptyAttempt,
      attempt: 1,
      outcome: "simulated",
      plan: { ...twoStepPlan, steps: twoStepPlan.steps.slice(1) },
      simulationResults: [
        { predictedEffect: "read-only: lists changes", riskFlag: false, stepIndex: 1, toolName: "git_status" },
      ],
    });

    expect(narrative).toBe(
      "Attempt 1: dry run; 1 tool steps simulated, none executed.\n- step 1 (git_status): read-only: lists changes"
    );
  });

  test("appends the feedback to the run log", () => {
    const runLog = new RunLog();
    const feedback = reflect({ ...emptyAttempt, attempt: 1, outcome: "rejected" }, runLog);

    expect(runLog.latest()).toEqual(feedback);
    expect(feedback.goal).toBe("check repo state");
  });
});
