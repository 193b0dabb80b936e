import type { Tool, ToolExecutionContext, ToolInputs, ToolOutcome } from "../types/tool";

import { ToolExecutionError } from "../utils/errors";
import { logToolCall } from "../utils/logger";
import { runSpawnedCommand } from "./shell/process-lifecycle";
import { toToolOutcome } from "./shell";

const GIT_STATUS_TIMEOUT_MS = 15_000;

async function gitStatus(inputs: ToolInputs, context?: ToolExecutionContext): Promise<ToolOutcome> {
  logToolCall("git_status", {});

  try {
    const result = await runSpawnedCommand({
      abortSignal: context?.abortSignal,
      args: ["status", "--porcelain", "--branch"],
      executable: "git",
      timeoutMs: context?.timeoutMs ?? GIT_STATUS_TIMEOUT_MS,
      workingDirectory: inputs.cwd,
    });
    return toToolOutcome(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ToolExecutionError(`Failed to get git status: ${message}`, error);
  }
}

export const gitStatusTool: Tool = {
  execute: gitStatus,
  predict: () => "read-only: lists branch and working tree changes; no files are modified",
  spec: {
    description: "Shows the current git branch and working tree status.",
    effect: "read_only",
    inputHint: "No inputs required. Optional 'cwd' selects the repository.",
    name: "git_status",
    outputSchema: "porcelain status lines, one per changed path, preceded by a branch header",
    requiredInputs: [],
    tags: ["git", "inspection"],
  },
};
