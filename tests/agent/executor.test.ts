import { describe, expect, test } from "vitest";

import type { Plan, PlanStep, ToolStep } from "../../src/types/plan";
import type { ToolOutcome } from "../../src/types/tool";

import { deriveSuccess, executePlan, truncateOutput } from "../../src/agent/executor";
import { createRegistry } from "../../src/tools";
import { createFakeTool, createGitStatusFake } from "../helpers/fake-tools";

const baseOptions = {
  outputLimitChars: 1000,
  toolTimeoutMs: 1000,
};

function toolStep(index: number, toolName: string, inputs: Record<string, string> = {}): ToolStep {
  return { index, inputs, kind: "tool", rationale: "", toolName };
}

function planOf(...steps: PlanStep[]): Plan {
  return { attempt: 1, source: "planner", steps };
}

function createFailingTool() {
  return createFakeTool(
    { name: "lint" },
    {
      run: async () => ({
        exitStatus: { code: 1, kind: "code" },
        stderr: "2 problems",
        stdout: "",
      }),
    }
  );
}

describe("plan execution", () => {
  test("derives success from a zero exit code only", () => {
    expect(deriveSuccess({ code: 0, kind: "code" })).toBe(true);
    expect(deriveSuccess({ code: 1, kind: "code" })).toBe(false);
    expect(deriveSuccess({ kind: "signal", signal: "SIGKILL" })).toBe(false);
    expect(deriveSuccess(null)).toBe(false);
    expect(deriveSuccess({ code: 0, kind: "code" }, true)).toBe(false);
  });

  test("runs tool steps in order and records info steps as successful", async () => {
    const gitStatus = createGitStatusFake();
    const report = await executePlan(
      planOf({ index: 0, kind: "info", text: "check" }, toolStep(1, "git_status")),
      createRegistry([gitStatus]),
      baseOptions
    );

    expect(report.halted).toBeUndefined();
    expect(report.results).toEqual([
      { exitStatus: { code: 0, kind: "code" }, stderr: "", stdout: "", stepIndex: 0, success: true },
      {
        exitStatus: { code: 0, kind: "code" },
        stderr: "",
        stdout: "## main\n",
        stepIndex: 1,
        success: true,
        toolName: "git_status",
      },
    ]);
    expect(gitStatus.calls).toEqual([{}]);
  });

  test("continues after a non-zero exit", async () => {
    const report = await executePlan(
      planOf(toolStep(0, "lint"), toolStep(1, "git_status")),
      createRegistry([createFailingTool(), createGitStatusFake()]),
      baseOptions
    );

    expect(report.results.map((result) => result.success)).toEqual([false, true]);
    expect(report.results[0]?.exitStatus).toEqual({ code: 1, kind: "code" });
  });

  test("counts a zero exit with stderr output as success", async () => {
    const noisy = createFakeTool(
      { name: "noisy" },
      {
        run: async () => ({ exitStatus: { code: 0, kind: "code" }, stderr: "warning", stdout: "" }),
      }
    );

    const report = await executePlan(planOf(toolStep(0, "noisy")), createRegistry([noisy]), baseOptions);

    expect(report.results[0]?.success).toBe(true);
    expect(report.results[0]?.stderr).toBe("warning");
  });

  test("halts the attempt when a tool throws", async () => {
    const gitStatus = createGitStatusFake();
    const broken = createFakeTool(
      { name: "broken" },
      {
        run: async () => {
          throw new Error("spawn ENOENT");
        },
      }
    );

    const report = await executePlan(
      planOf(toolStep(0, "broken"), toolStep(1, "git_status")),
      createRegistry([broken, gitStatus]),
      baseOptions
    );

    expect(report.halted).toEqual({ reason: "tool could not be invoked: spawn ENOENT", stepIndex: 0 });
    expect(report.results).toHaveLength(1);
    expect(report.results[0]?.exitStatus).toBeNull();
    expect(gitStatus.calls).toEqual([]);
  });

  test("halts on a step the approver declines", async () => {
    const gitStatus = createGitStatusFake();
    const report = await executePlan(planOf(toolStep(0, "git_status")), createRegistry([gitStatus]), {
      ...baseOptions,
      approveStep: async () => false,
    });

    expect(report.halted).toEqual({ reason: "step declined by approver", stepIndex: 0 });
    expect(gitStatus.calls).toEqual([]);
  });

  test("does not start a step after the deadline", async () => {
    const gitStatus = createGitStatusFake();
    const report = await executePlan(planOf(toolStep(0, "git_status")), createRegistry([gitStatus]), {
      ...baseOptions,
      deadline: 100,
      now: () => 100,
    });

    expect(report.results[0]?.fault).toBe("attempt deadline exceeded before the step started");
    expect(gitStatus.calls).toEqual([]);
  });

  test("abandons a tool that outlives the deadline", async () => {
    let observedAbort = false;
    const slow = createFakeTool(
      { name: "slow" },
      {
        run: (_inputs, context) =>
          new Promise<ToolOutcome>(() => {
            context?.abortSignal?.addEventListener("abort", () => {
              observedAbort = true;
            });
          }),
      }
    );

    const startedAt = Date.now();
    const report = await executePlan(planOf(toolStep(0, "slow")), createRegistry([slow]), {
      ...baseOptions,
      deadline: startedAt + 20,
    });

    expect(report.halted?.reason).toBe("attempt deadline exceeded while the tool was running");
    expect(observedAbort).toBe(true);
  });

  test("marks a step with a blocking diagnostic as failed even on exit code 0", async () => {
    const report = await executePlan(planOf(toolStep(0, "git_status")), createRegistry([createGitStatusFake()]), {
      ...baseOptions,
      diagnostics: [{ kind: "PlaceholderDetected", message: "placeholder", stepIndex: 0 }],
    });

    expect(report.results[0]?.success).toBe(false);
  });

  test("truncates long output", async () => {
    const chatty = createFakeTool(
      { name: "chatty" },
      {
        run: async () => ({ exitStatus: { code: 0, kind: "code" }, stderr: "", stdout: "abcdefghij" }),
      }
    );

    const report = await executePlan(planOf(toolStep(0, "chatty")), createRegistry([chatty]), {
      ...baseOptions,
      outputLimitChars: 4,
    });

    expect(report.results[0]?.stdout).toBe("abcd\n...[truncated 6 chars]");
    expect(truncateOutput("abc", 4)).toBe("abc");
  });

  test("does not split a surrogate pair when truncating", () => {
    expect(truncateOutput("ab\u{1F600}cd", 3)).toBe("ab\n...[truncated 4 chars]");
  });
});
