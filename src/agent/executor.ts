import type { ToolRegistry } from "../tools/registry";
import type { Diagnostic, ExecutionResult, InfoStep, Plan, ToolStep } from "../types/plan";
import type { ExitStatus } from "../types/tool";

import { describeError } from "../utils/errors";
import { logAttempt, logToolResult } from "../utils/logger";
import { remainingUntil, runWithDeadline } from "./deadline";
import { isBlockingDiagnostic } from "./validator";

export type ExecutionRegistry = Pick<ToolRegistry, "getTool">;

export type StepApprover = (step: ToolStep) => Promise<boolean>;

export interface ExecuteOptions {
  approveStep?: StepApprover;
  deadline?: number;
  diagnostics?: readonly Diagnostic[];
  now?: () => number;
  onStepResult?: (result: ExecutionResult) => void;
  onStepStart?: (step: ToolStep) => void;
  outputLimitChars: number;
  toolTimeoutMs: number;
}

export interface ExecutionReport {
  halted?: {
    reason: string;
    stepIndex: number;
  };
  results: ExecutionResult[];
}

export function deriveSuccess(exitStatus: ExitStatus | null, overridden = false): boolean {
  if (overridden || !exitStatus) {
    return false;
  }
  return exitStatus.kind === "code" && exitStatus.code === 0;
}

export function truncateOutput(output: string, limit: number): string {
  if (output.length <= limit) {
    return output;
  }

  // Keep surrogate pairs whole.
  const lastCode = output.charCodeAt(limit - 1);
  const cut = lastCode >= 0xd800 && lastCode <= 0xdbff ? limit - 1 : limit;
  return `${output.slice(0, cut)}\n...[truncated ${String(output.length - cut)} chars]`;
}

function recordInfoStep(step: InfoStep): ExecutionResult {
  const exitStatus: ExitStatus = { code: 0, kind: "code" };
  return {
    exitStatus,
    stderr: "",
    stdout: "",
    stepIndex: step.index,
    success: deriveSuccess(exitStatus),
  };
}

function recordFault(step: ToolStep, fault: string): ExecutionResult {
  return {
    exitStatus: null,
    fault,
    stderr: "",
    stdout: "",
    stepIndex: step.index,
    success: false,
    toolName: step.toolName,
  };
}

async function runToolStep(
  step: ToolStep,
  registry: ExecutionRegistry,
  options: ExecuteOptions,
  remainingMs: number
): Promise<ExecutionResult> {
  const tool = registry.getTool(step.toolName);
  if (!tool) {
    return recordFault(step, `tool "${step.toolName}" is not registered`);
  }

  const settled = await runWithDeadline(
    (abortSignal) =>
      tool.execute(step.inputs, {
        abortSignal,
        timeoutMs: Math.max(1, Math.min(options.toolTimeoutMs, remainingMs)),
      }),
    remainingMs
  );

  if (settled.kind === "deadline") {
    return recordFault(step, "attempt deadline exceeded while the tool was running");
  }

  if (settled.kind === "error") {
    return recordFault(step, `tool could not be invoked: ${describeError(settled.error)}`);
  }

  const overridden = (options.diagnostics ?? []).some(
    (diagnostic) => diagnostic.stepIndex === step.index && isBlockingDiagnostic(diagnostic)
  );
  const { exitStatus, stderr, stdout } = settled.value;
  return {
    exitStatus,
    stderr: truncateOutput(stderr, options.outputLimitChars),
    stdout: truncateOutput(stdout, options.outputLimitChars),
    stepIndex: step.index,
    success: deriveSuccess(exitStatus, overridden),
    toolName: step.toolName,
  };
}

export async function executePlan(
  plan: Plan,
  registry: ExecutionRegistry,
  options: ExecuteOptions
): Promise<ExecutionReport> {
  const now = options.now ?? Date.now;
  const results: ExecutionResult[] = [];

  for (const step of plan.steps) {
    if (step.kind === "info") {
      results.push(recordInfoStep(step));
      continue;
    }

    const remainingMs = remainingUntil(options.deadline, now);

    let result: ExecutionResult;
    if (remainingMs <= 0) {
      result = recordFault(step, "attempt deadline exceeded before the step started");
    } else if (options.approveStep && !(await options.approveStep(step))) {
      result = recordFault(step, "step declined by approver");
    } else {
      logAttempt(plan.attempt, `Executing step ${step.index}: ${step.toolName}`);
      options.onStepStart?.(step);
      result = await runToolStep(step, registry, options, remainingMs);
    }

    logToolResult(result);
    options.onStepResult?.(result);
    results.push(result);

    if (result.fault) {
      return {
        halted: {
          reason: result.fault,
          stepIndex: step.index,
        },
        results,
      };
    }
  }

  return { results };
}
