import type { Tool, ToolExecutionContext, ToolInputs, ToolOutcome } from "../types/tool";

import { exitStatusFromProcess } from "../types/tool";
import { ToolExecutionError } from "../utils/errors";
import { logToolCall } from "../utils/logger";
import { runSpawnedShellCommand, type SpawnedCommandResult } from "./shell/process-lifecycle";

const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

export function toToolOutcome(result: SpawnedCommandResult): ToolOutcome {
  const lifecycleNote = result.timedOut
    ? "\n[command timed out]"
    : result.aborted
      ? "\n[command aborted]"
      : "";

  return {
    exitStatus: exitStatusFromProcess(result.exitCode, result.signal),
    stderr: `${result.stderr}${lifecycleNote}`,
    stdout: result.stdout,
  };
}

async function runCommand(inputs: ToolInputs, context?: ToolExecutionContext): Promise<ToolOutcome> {
  const command = inputs.command ?? "";
  logToolCall("run_command", { command, cwd: inputs.cwd });

  try {
    const result = await runSpawnedShellCommand({
      abortSignal: context?.abortSignal,
      command,
      timeoutMs: context?.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      workingDirectory: inputs.cwd,
    });
    return toToolOutcome(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ToolExecutionError(`Failed to start command: ${message}`, error);
  }
}

export const runCommandTool: Tool = {
  execute: runCommand,
  predict: (inputs) => `runs shell command \`${inputs.command ?? ""}\`; may modify files or external state`,
  spec: {
    description: "Runs a shell command and returns its stdout and stderr.",
    effect: "mutating",
    inputHint: "Shell command to run, e.g. 'npm test'. Optional 'cwd' sets the working directory.",
    name: "run_command",
    outputSchema: "raw stdout and stderr text of the command",
    requiredInputs: ["command"],
    tags: ["command", "execution", "shell"],
  },
};
