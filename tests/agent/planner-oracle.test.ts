import { describe, expect, test } from "vitest";

import type { PlanRequest } from "../../src/agent/oracle";
import type { LlmRequest } from "../../src/llm/types";
import type { Feedback } from "../../src/types/plan";

import { createLlmPlanOracle } from "../../src/agent/planner";
import { buildPlannerMessages } from "../../src/prompts/planner";
import { LlmError } from "../../src/utils/errors";

function createRequest(overrides?: Partial<PlanRequest>): PlanRequest {
  return {
    attempt: 1,
    goal: "check repo state",
    mode: "plan",
    runLog: [],
    tools: [
      {
        description: "Shows the working tree status.",
        effect: "read_only",
        name: "git_status",
        requiredInputs: [],
        tags: [],
      },
    ],
    ...overrides,
  };
}

const rejectedFeedback: Feedback = {
  attempt: 1,
  diagnostics: [],
  executionResults: [],
  goal: "check repo state",
  narrativeSummary: "Attempt 1: plan rejected before execution, reason: step 0: unknown tool \"x\" [UnknownTool].",
  outcome: "rejected",
  simulationResults: [],
};

describe("llm plan oracle", () => {
  test("asks for schema output and returns the reply text", async () => {
    const seen: LlmRequest[] = [];
    const oracle = createLlmPlanOracle({
      chat: async (request) => {
        seen.push(request);
        return { content: '{"plan": []}' };
      },
    });

    const reply = await oracle.propose(createRequest());

    expect(reply).toEqual({ kind: "text", text: '{"plan": []}' });
    expect(seen[0]?.callKind).toBe("planner");
    expect(seen[0]?.responseFormat?.name).toBe("plan_payload");
  });

  test("falls back to prompt-only output when the schema is unsupported", async () => {
    const seen: LlmRequest[] = [];
    const oracle = createLlmPlanOracle({
      chat: async (request) => {
        seen.push(request);
        if (request.responseFormat) {
          throw new LlmError("LLM API error: response_format is not supported", undefined, {
            errorClass: "response_format_unsupported",
          });
        }
        return { content: '{"plan": []}' };
      },
    });

    expect(await oracle.propose(createRequest())).toEqual({ kind: "text", text: '{"plan": []}' });
    expect(await oracle.propose(createRequest({ attempt: 2, mode: "replan" }))).toEqual({
      kind: "text",
      text: '{"plan": []}',
    });
    expect(seen.map((request) => request.responseFormat === undefined)).toEqual([false, true, true]);
  });

  test("prompt-only mode never sends a schema", async () => {
    const seen: LlmRequest[] = [];
    const oracle = createLlmPlanOracle(
      {
        chat: async (request) => {
          seen.push(request);
          return { content: "{}" };
        },
      },
      { outputMode: "prompt_only" }
    );

    await oracle.propose(createRequest());

    expect(seen[0]?.responseFormat).toBeUndefined();
  });

  test("turns other provider errors into a failure reply", async () => {
    const oracle = createLlmPlanOracle({
      chat: async () => {
        throw new LlmError("LLM API error: Too many requests", undefined, { errorClass: "rate_limit" });
      },
    });

    expect(await oracle.propose(createRequest())).toEqual({
      detail: "planner call failed: LLM API error: Too many requests",
      kind: "failure",
    });
  });
});

describe("planner prompt", () => {
  test("lists tools in the system message", () => {
    const [system] = buildPlannerMessages(createRequest());

    expect(system?.role).toBe("system");
    expect(system?.content).toContain("- git_status [read_only]: Shows the working tree status.\n  Required inputs: none");
  });

  test("includes earlier feedback when replanning", () => {
    const [, user] = buildPlannerMessages(
      createRequest({ attempt: 2, mode: "replan", runLog: [rejectedFeedback] })
    );

    expect(user?.content).toBe(
      [
        "GOAL: check repo state",
        "",
        "PREVIOUS ATTEMPTS:",
        rejectedFeedback.narrativeSummary,
        "",
        "Produce a revised plan for attempt 2 that addresses the previous feedback.",
      ].join("\n")
    );
  });
});
