import { Command, InvalidArgumentError } from "commander";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { StepApprover } from "../agent/executor";
import type { AgentConfig } from "../types/config";

import { runLifecycle } from "../agent/lifecycle";
import { createLlmPlanOracle } from "../agent/planner";
import { RunLog } from "../agent/run-log";
import { LlmClient } from "../llm/client";
import { createDefaultRegistry } from "../tools";
import { getAgentConfig } from "../types/config";
import { describeError } from "../utils/errors";
import { initializeLogger, logError } from "../utils/logger";
import { createConsoleObserver, formatLifecycleResult } from "./report";

type CliOptions = {
  confirm?: boolean;
  deadlineMs?: number;
  dryRun?: boolean;
  maxAttempts?: number;
  verbose?: boolean;
};

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function applyRuntimeOptions(config: AgentConfig, options: CliOptions): AgentConfig {
  return {
    ...config,
    ...(options.deadlineMs !== undefined ? { attemptDeadlineMs: options.deadlineMs } : {}),
    ...(options.dryRun ? { dryRun: true } : {}),
    ...(options.maxAttempts !== undefined ? { maxAttempts: options.maxAttempts } : {}),
    ...(options.confirm ? { requireStepApproval: true } : {}),
    ...(options.verbose ? { verbose: true } : {}),
  };
}

export function isApproval(answer: string): boolean {
  return /^y(?:es)?$/iu.test(answer.trim());
}

function createPromptApprover(): { approveStep: StepApprover; close: () => void } {
  const rl = createInterface({ input, output });
  return {
    approveStep: async (step) => {
      const inputs = JSON.stringify(step.inputs);
      const answer = await rl.question(`Run step ${step.index} (${step.toolName} ${inputs})? [y/N] `);
      return isApproval(answer);
    },
    close: () => {
      rl.close();
    },
  };
}

function reportFatal(error: unknown): never {
  logError(`❌ Fatal error: ${describeError(error)}`, error);
  process.exit(1);
}

async function runGoal(goal: string, options: CliOptions): Promise<number> {
  const config = applyRuntimeOptions(getAgentConfig(), options);
  initializeLogger(config);

  const registry = createDefaultRegistry();
  const planner = createLlmPlanOracle(new LlmClient(config));
  const approver = config.requireStepApproval ? createPromptApprover() : undefined;

  console.log(`\n🔨 planloop: ${goal}`);
  try {
    const runLog = new RunLog();
    const result = await runLifecycle({
      approveStep: approver?.approveStep,
      goal,
      observer: createConsoleObserver(),
      options: config,
      planner,
      registry,
      runLog,
    });
    await runLog.flush();

    console.log(`\n${formatLifecycleResult(result)}\n`);
    return result.status === "failed" ? 1 : 0;
  } finally {
    approver?.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("planloop")
    .description("Plan, validate, simulate and execute tool plans toward a goal")
    .version("0.1.0");

  program
    .argument("<goal>", "Goal for the planner to work toward")
    .option("--max-attempts <n>", "Maximum plan attempts", parsePositiveInteger)
    .option("--deadline-ms <ms>", "Deadline for each attempt in milliseconds", parsePositiveInteger)
    .option("--dry-run", "Simulate the first executable plan without running any tool")
    .option("--confirm", "Ask before running each tool step")
    .option("-v, --verbose", "Verbose output")
    .action(async (goal: string, options: CliOptions) => {
      try {
        process.exit(await runGoal(goal, options));
      } catch (error) {
        reportFatal(error);
      }
    });

  program
    .command("tools")
    .description("List the registered tools")
    .action(() => {
      console.log(createDefaultRegistry().describe());
    });

  return program;
}

export function runCli(): void {
  buildProgram()
    .parseAsync()
    .catch((error: unknown) => {
      reportFatal(error);
    });
}
