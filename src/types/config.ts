import { getEnv, type Environment } from "../config/env";

export type LifecycleOptions = {
  attemptDeadlineMs: number;
  dryRun: boolean;
  maxAttempts: number;
  maxConsecutiveParseFailures: number;
  toolOutputLimitChars: number;
  toolTimeoutMs: number;
};

export type AgentConfig = LifecycleOptions & {
  llmApiKey?: string;
  llmModel: string;
  requireStepApproval: boolean;
  verbose: boolean;
};

export const DEFAULT_LIFECYCLE_OPTIONS: LifecycleOptions = {
  attemptDeadlineMs: 120_000,
  dryRun: false,
  maxAttempts: 3,
  maxConsecutiveParseFailures: 2,
  toolOutputLimitChars: 8000,
  toolTimeoutMs: 60_000,
};

export function toAgentConfig(env: Environment): AgentConfig {
  return {
    attemptDeadlineMs: env.PLANLOOP_ATTEMPT_DEADLINE_MS,
    dryRun: env.PLANLOOP_DRY_RUN,
    llmApiKey: env.OPENROUTER_API_KEY,
    llmModel: env.OPENROUTER_MODEL,
    maxAttempts: env.PLANLOOP_MAX_ATTEMPTS,
    maxConsecutiveParseFailures: env.PLANLOOP_MAX_CONSECUTIVE_PARSE_FAILURES,
    requireStepApproval: env.PLANLOOP_REQUIRE_STEP_APPROVAL,
    toolOutputLimitChars: env.PLANLOOP_TOOL_OUTPUT_LIMIT_CHARS,
    toolTimeoutMs: env.PLANLOOP_TOOL_TIMEOUT_MS,
    verbose: env.PLANLOOP_VERBOSE,
  };
}

export function getAgentConfig(): AgentConfig {
  return toAgentConfig(getEnv());
}
