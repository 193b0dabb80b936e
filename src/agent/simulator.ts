import type { ToolRegistry } from "../tools/registry";
import type { Plan, SimulationResult, ToolStep } from "../types/plan";
import type { ToolSpec } from "../types/tool";

import { describeError } from "../utils/errors";
import { log } from "../utils/logger";

export type SimulationRegistry = Pick<ToolRegistry, "getTool" | "lookup">;

const EFFECT_LABELS: Record<ToolSpec["effect"], string> = {
  destructive: "destructive",
  mutating: "mutating",
  read_only: "read-only",
};

export function describeDeclaredEffect(spec: ToolSpec): string {
  const output = spec.outputSchema ? `; output: ${spec.outputSchema}` : "";
  return `${EFFECT_LABELS[spec.effect]} effect via ${spec.name}${output}`;
}

export function simulateStep(step: ToolStep, registry: SimulationRegistry): SimulationResult {
  const spec = registry.lookup(step.toolName);
  const tool = registry.getTool(step.toolName);
  if (!spec || !tool) {
    return {
      predictedEffect: "no prediction available",
      riskFlag: true,
      riskReason: `tool "${step.toolName}" is not registered`,
      stepIndex: step.index,
      toolName: step.toolName,
    };
  }

  const declaredEffect = describeDeclaredEffect(spec);
  let prediction: string;
  try {
    prediction = tool.predict(step.inputs).trim();
  } catch (error) {
    return {
      predictedEffect: declaredEffect,
      riskFlag: true,
      riskReason: `simulation failed: ${describeError(error)}`,
      stepIndex: step.index,
      toolName: step.toolName,
    };
  }

  const result: SimulationResult = {
    predictedEffect: prediction || declaredEffect,
    riskFlag: false,
    stepIndex: step.index,
    toolName: step.toolName,
  };

  if (spec.effect === "destructive") {
    result.riskFlag = true;
    result.riskReason = `tool "${spec.name}" declares destructive effects`;
  }

  return result;
}

export function simulatePlan(plan: Plan, registry: SimulationRegistry): SimulationResult[] {
  const results: SimulationResult[] = [];
  for (const step of plan.steps) {
    if (step.kind !== "tool") {
      continue;
    }

    const result = simulateStep(step, registry);
    if (result.riskFlag) {
      log(`Simulation flagged step ${step.index} (${step.toolName}): ${result.riskReason ?? "unknown risk"}`);
    }
    results.push(result);
  }
  return results;
}
