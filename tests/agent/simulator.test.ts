import { describe, expect, test } from "vitest";

import type { Plan, ToolStep } from "../../src/types/plan";

import { simulatePlan, simulateStep } from "../../src/agent/simulator";
import { createRegistry } from "../../src/tools";
import { createFakeTool, createGitStatusFake } from "../helpers/fake-tools";

function toolStep(index: number, toolName: string, inputs: Record<string, string> = {}): ToolStep {
  return { index, inputs, kind: "tool", rationale: "", toolName };
}

describe("plan simulation", () => {
  test("uses the tool's own prediction", () => {
    const registry = createRegistry([createGitStatusFake()]);

    expect(simulateStep(toolStep(0, "git_status"), registry)).toEqual({
      predictedEffect: "read-only: lists branch and working tree changes",
      riskFlag: false,
      stepIndex: 0,
      toolName: "git_status",
    });
  });

  test("falls back to the declared effect for an empty prediction", () => {
    const registry = createRegistry([
      createFakeTool(
        { effect: "mutating", name: "touch", outputSchema: "nothing" },
        { predict: () => "   " }
      ),
    ]);

    expect(simulateStep(toolStep(3, "touch"), registry).predictedEffect).toBe(
      "mutating effect via touch; output: nothing"
    );
  });

  test("flags destructive tools", () => {
    const registry = createRegistry([createFakeTool({ effect: "destructive", name: "wipe" })]);

    expect(simulateStep(toolStep(0, "wipe"), registry)).toEqual({
      predictedEffect: "runs wipe",
      riskFlag: true,
      riskReason: 'tool "wipe" declares destructive effects',
      stepIndex: 0,
      toolName: "wipe",
    });
  });

  test("flags a prediction that throws and keeps the declared effect", () => {
    const registry = createRegistry([
      createFakeTool(
        { effect: "read_only", name: "peek" },
        {
          predict: () => {
            throw new Error("no model");
          },
        }
      ),
    ]);

    expect(simulateStep(toolStep(1, "peek"), registry)).toEqual({
      predictedEffect: "read-only effect via peek",
      riskFlag: true,
      riskReason: "simulation failed: no model",
      stepIndex: 1,
      toolName: "peek",
    });
  });

  test("flags an unregistered tool", () => {
    const result = simulateStep(toolStep(0, "ghost"), createRegistry([]));

    expect(result.riskFlag).toBe(true);
    expect(result.riskReason).toBe('tool "ghost" is not registered');
  });

  test("simulates tool steps only", () => {
    const plan: Plan = {
      attempt: 1,
      source: "planner",
      steps: [{ index: 0, kind: "info", text: "look first" }, toolStep(1, "git_status")],
    };

    const results = simulatePlan(plan, createRegistry([createGitStatusFake()]));

    expect(results.map((result) => result.stepIndex)).toEqual([1]);
  });
});
