import type { LlmClient } from "../llm/client";
import type { LlmRequest } from "../llm/types";
import type { OracleReply, PlanOracle, PlanRequest } from "./oracle";

import { buildPlannerMessages } from "../prompts/planner";
import { describeError, LlmError } from "../utils/errors";
import { log } from "../utils/logger";
import { PLAN_PAYLOAD_JSON_SCHEMA } from "./planner/schema";

export type PlannerChatClient = Pick<LlmClient, "chat">;

export type PlannerOutputMode = "auto" | "prompt_only" | "schema_strict";

type LlmPlanOracleOptions = {
  outputMode?: PlannerOutputMode;
};

function buildRequest(request: PlanRequest, withSchema: boolean): LlmRequest {
  return {
    callKind: request.mode === "plan" ? "planner" : "replanner",
    messages: buildPlannerMessages(request),
    ...(withSchema
      ? {
          responseFormat: {
            name: "plan_payload",
            schema: PLAN_PAYLOAD_JSON_SCHEMA,
            strict: false,
            type: "json_schema" as const,
          },
        }
      : {}),
  };
}

export function createLlmPlanOracle(
  client: PlannerChatClient,
  options?: LlmPlanOracleOptions
): PlanOracle {
  const outputMode = options?.outputMode ?? "auto";
  let schemaSupported = outputMode !== "prompt_only";

  const propose = async (request: PlanRequest): Promise<OracleReply> => {
    try {
      const response = await client.chat(buildRequest(request, schemaSupported), {
        abortSignal: request.abortSignal,
      });
      if (response.usage) {
        log(`Planner usage: ${response.usage.totalTokens} tokens`);
      }
      return { kind: "text", text: response.content };
    } catch (error) {
      const fallBackToPrompt =
        outputMode === "auto" &&
        schemaSupported &&
        error instanceof LlmError &&
        error.errorClass === "response_format_unsupported";
      if (fallBackToPrompt) {
        log("Planner model rejected the JSON schema response format; retrying with prompt-only output");
        schemaSupported = false;
        return propose(request);
      }

      return {
        detail: `planner call failed: ${describeError(error)}`,
        kind: "failure",
      };
    }
  };

  return { propose };
}
