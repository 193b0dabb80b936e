import type { Feedback, Goal } from "../types/plan";
import type { AbortSignalLike, ToolSpec } from "../types/tool";

export type PlanningMode = "plan" | "replan";

export interface PlanRequest {
  abortSignal?: AbortSignalLike;
  attempt: number;
  goal: Goal;
  mode: PlanningMode;
  runLog: readonly Feedback[];
  tools: readonly ToolSpec[];
}

export type OracleReply =
  | {
      detail: string;
      kind: "failure";
    }
  | {
      kind: "text";
      text: string;
    };

export interface PlanOracle {
  propose: (request: PlanRequest) => Promise<OracleReply>;
}

export type ScriptedOracle = PlanOracle & {
  requests: PlanRequest[];
};

export function createScriptedOracle(replies: ReadonlyArray<OracleReply | string>): ScriptedOracle {
  const requests: PlanRequest[] = [];
  let cursor = 0;

  return {
    propose: async (request) => {
      requests.push(request);
      const reply = replies[cursor];
      cursor += 1;
      if (reply === undefined) {
        return {
          detail: "no scripted reply left",
          kind: "failure",
        };
      }
      return typeof reply === "string" ? { kind: "text", text: reply } : reply;
    },
    requests,
  };
}
