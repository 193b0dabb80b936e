import type { ToolRegistry } from "../tools/registry";
import type { LifecycleOptions } from "../types/config";
import type { Diagnostic, ExecutionResult, Feedback, Goal, Plan, SimulationResult } from "../types/plan";
import type { StepApprover } from "./executor";
import type { LifecycleObserver } from "./observer";
import type { PlanningMode, PlanOracle } from "./oracle";
import type { PlanExtractionResult } from "./planner/parser";
import type { ReflectionInput } from "./reflector";
import type { LifecycleFailureReason, LifecycleState, TerminalState } from "./state";

import { DEFAULT_LIFECYCLE_OPTIONS } from "../types/config";
import { describeError } from "../utils/errors";
import { log, logAttempt } from "../utils/logger";
import { remainingUntil, runWithDeadline } from "./deadline";
import { executePlan } from "./executor";
import { extractPlanPayload } from "./planner/parser";
import { reflect } from "./reflector";
import { RunLog } from "./run-log";
import { simulatePlan } from "./simulator";
import { assertTransition, decide } from "./state";
import { hasBlockingDiagnostics, validatePlan } from "./validator";

export interface LifecycleInput {
  approveStep?: StepApprover;
  goal: Goal;
  now?: () => number;
  observer?: LifecycleObserver;
  options?: Partial<LifecycleOptions>;
  planner: PlanOracle;
  registry: ToolRegistry;
  replanner?: PlanOracle;
  runLog?: RunLog;
}

export interface LifecycleResult {
  attempts: number;
  failureReason?: LifecycleFailureReason;
  finalFeedback?: Feedback;
  runLog: RunLog;
  status: TerminalState;
  transitions: LifecycleState[];
}

type AttemptContext = {
  attempt: number;
  deadline: number;
  mode: PlanningMode;
};

class LifecycleRun {
  private readonly now: () => number;
  private readonly options: LifecycleOptions;
  private readonly runLog: RunLog;
  private state: LifecycleState = "planning";
  private readonly transitions: LifecycleState[] = ["planning"];

  constructor(private readonly input: LifecycleInput) {
    this.now = input.now ?? Date.now;
    this.options = { ...DEFAULT_LIFECYCLE_OPTIONS, ...input.options };
    this.runLog = input.runLog ?? new RunLog();
  }

  async run(): Promise<LifecycleResult> {
    let consecutiveParseFailures = 0;

    for (let attempt = 1; ; attempt += 1) {
      const mode: PlanningMode = attempt === 1 ? "plan" : "replan";
      const context: AttemptContext = {
        attempt,
        deadline: this.now() + this.options.attemptDeadlineMs,
        mode,
      };
      this.input.observer?.onAttemptStart?.({
        attempt,
        maxAttempts: this.options.maxAttempts,
        mode,
      });
      logAttempt(attempt, `Requesting ${mode === "plan" ? "a plan" : "a revised plan"}`);

      const extraction = await this.requestPlan(context);
      if (extraction.success) {
        consecutiveParseFailures = 0;
      } else {
        consecutiveParseFailures += 1;
      }

      const reflection = extraction.success
        ? await this.runPlan(context, extraction.payload.plan)
        : this.unparseable(context, extraction);

      const feedback = reflect(reflection, this.runLog);
      this.input.observer?.onFeedback?.(feedback);
      this.moveTo("deciding", attempt);

      const decision = decide({
        attempt,
        consecutiveParseFailures,
        diagnostics: reflection.diagnostics,
        executionResults: reflection.executionResults,
        maxAttempts: this.options.maxAttempts,
        maxConsecutiveParseFailures: this.options.maxConsecutiveParseFailures,
        outcome: reflection.outcome,
        plan: reflection.plan,
      });

      if (decision.next === "replan") {
        this.moveTo("planning", attempt);
        continue;
      }

      this.moveTo(decision.next, attempt);
      log(`Lifecycle finished after ${attempt} attempt(s): ${decision.next}`);
      return {
        attempts: attempt,
        ...(decision.next === "failed" ? { failureReason: decision.reason } : {}),
        finalFeedback: feedback,
        runLog: this.runLog,
        status: decision.next,
        transitions: [...this.transitions],
      };
    }
  }

  private moveTo(next: LifecycleState, attempt: number): void {
    const from = this.state;
    this.state = assertTransition(from, next);
    this.transitions.push(next);
    this.input.observer?.onTransition?.({ attempt, from, to: next });
  }

  private async requestPlan(context: AttemptContext): Promise<PlanExtractionResult> {
    const oracle = context.mode === "replan" && this.input.replanner
      ? this.input.replanner
      : this.input.planner;

    const settled = await runWithDeadline(
      (abortSignal) =>
        oracle.propose({
          abortSignal,
          attempt: context.attempt,
          goal: this.input.goal,
          mode: context.mode,
          runLog: this.runLog.snapshot(),
          tools: this.input.registry.all(),
        }),
      remainingUntil(context.deadline, this.now)
    );

    if (settled.kind === "deadline") {
      return {
        detail: "attempt deadline exceeded while waiting for the planner",
        reason: "deadline_exceeded",
        success: false,
      };
    }

    if (settled.kind === "error") {
      return {
        detail: `planner failed: ${describeError(settled.error)}`,
        reason: "oracle_error",
        success: false,
      };
    }

    const reply = settled.value;
    if (reply.kind === "failure") {
      return {
        detail: reply.detail,
        reason: "oracle_error",
        success: false,
      };
    }

    return extractPlanPayload(reply.text);
  }

  private unparseable(
    context: AttemptContext,
    extraction: Extract<PlanExtractionResult, { success: false }>
  ): ReflectionInput {
    logAttempt(context.attempt, `Planner reply unusable: ${extraction.detail}`);
    this.moveTo("reflecting", context.attempt);
    return {
      attempt: context.attempt,
      diagnostics: [],
      executionResults: [],
      goal: this.input.goal,
      outcome: "unparseable",
      parseFailure: {
        detail: extraction.detail,
        reason: extraction.reason,
      },
      simulationResults: [],
    };
  }

  private async runPlan(context: AttemptContext, rawSteps: unknown[]): Promise<ReflectionInput> {
    const { attempt } = context;
    this.moveTo("validating", attempt);

    const { diagnostics, plan } = validatePlan({ plan: rawSteps }, this.input.registry, {
      attempt,
      source: context.mode === "plan" ? "planner" : "replanner",
    });
    this.input.observer?.onDiagnostics?.({ attempt, diagnostics });

    if (hasBlockingDiagnostics(diagnostics)) {
      logAttempt(attempt, `Plan rejected with ${diagnostics.length} diagnostic(s)`);
      this.moveTo("reflecting", attempt);
      return this.reflection(context, plan, "rejected", diagnostics, [], []);
    }

    this.moveTo("simulating", attempt);
    const simulationResults = simulatePlan(plan, this.input.registry);
    this.input.observer?.onSimulation?.({ attempt, results: simulationResults });

    if (this.options.dryRun) {
      this.moveTo("reflecting", attempt);
      return this.reflection(context, plan, "simulated", diagnostics, simulationResults, []);
    }

    this.moveTo("executing", attempt);
    const report = await executePlan(plan, this.input.registry, {
      approveStep: this.input.approveStep,
      deadline: context.deadline,
      diagnostics,
      now: this.now,
      onStepResult: (result) => {
        this.input.observer?.onStepResult?.({ attempt, result });
      },
      onStepStart: (step) => {
        this.input.observer?.onStepStart?.({ attempt, step });
      },
      outputLimitChars: this.options.toolOutputLimitChars,
      toolTimeoutMs: this.options.toolTimeoutMs,
    });
    if (report.halted) {
      logAttempt(attempt, `Execution halted at step ${report.halted.stepIndex}: ${report.halted.reason}`);
    }

    this.moveTo("reflecting", attempt);
    return this.reflection(context, plan, "executed", diagnostics, simulationResults, report.results);
  }

  private reflection(
    context: AttemptContext,
    plan: Plan,
    outcome: ReflectionInput["outcome"],
    diagnostics: readonly Diagnostic[],
    simulationResults: readonly SimulationResult[],
    executionResults: readonly ExecutionResult[]
  ): ReflectionInput {
    return {
      attempt: context.attempt,
      diagnostics,
      executionResults,
      goal: this.input.goal,
      outcome,
      plan,
      simulationResults,
    };
  }
}

export async function runLifecycle(input: LifecycleInput): Promise<LifecycleResult> {
  return new LifecycleRun(input).run();
}
