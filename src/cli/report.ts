import type { LifecycleResult } from "../agent/lifecycle";
import type { LifecycleObserver } from "../agent/observer";

const STATUS_ICONS: Record<LifecycleResult["status"], string> = {
  dry_run: "📝",
  failed: "❌",
  succeeded: "✅",
};

export function describeOutcome(result: LifecycleResult): string {
  if (result.status === "succeeded") {
    return `Goal reached after ${result.attempts} attempt(s)`;
  }

  if (result.status === "dry_run") {
    return `Dry run finished after ${result.attempts} attempt(s); no tool was executed`;
  }

  return result.failureReason === "planner_unparseable"
    ? `Gave up after ${result.attempts} attempt(s): the planner kept returning unusable replies`
    : `Gave up after ${result.attempts} attempt(s): attempt limit reached`;
}

export function formatLifecycleResult(result: LifecycleResult): string {
  const lines = [`${STATUS_ICONS[result.status]} ${describeOutcome(result)}`];
  if (result.finalFeedback) {
    lines.push("", result.finalFeedback.narrativeSummary);
  }
  lines.push("", `States: ${result.transitions.join(" -> ")}`);
  return lines.join("\n");
}

export function createConsoleObserver(): LifecycleObserver {
  return {
    onAttemptStart: (event) => {
      console.log(
        `\n🧭 Attempt ${event.attempt}/${event.maxAttempts} (${event.mode === "plan" ? "planning" : "replanning"})`
      );
    },
    onDiagnostics: (event) => {
      for (const diagnostic of event.diagnostics) {
        console.log(`  ⚠️  step ${diagnostic.stepIndex}: ${diagnostic.message} [${diagnostic.kind}]`);
      }
    },
    onFeedback: (feedback) => {
      console.log(`\n${feedback.narrativeSummary}`);
    },
    onSimulation: (event) => {
      for (const result of event.results) {
        const marker = result.riskFlag ? "⚠️ " : "•";
        console.log(`  ${marker} step ${result.stepIndex} (${result.toolName ?? "?"}): ${result.predictedEffect}`);
      }
    },
    onStepResult: (event) => {
      const { result } = event;
      const icon = result.success ? "✓" : "✗";
      console.log(`  ${icon} step ${result.stepIndex}${result.fault ? `: ${result.fault}` : ""}`);
    },
    onStepStart: (event) => {
      console.log(`  ▶ step ${event.step.index}: ${event.step.toolName}`);
    },
  };
}
