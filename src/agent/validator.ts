import type { ToolRegistry } from "../tools/registry";
import type { Diagnostic, DiagnosticKind, Plan, PlanStep, ToolStep } from "../types/plan";

import { logDiagnostic } from "../utils/logger";
import { findPlaceholders } from "./placeholders";
import {
  normalizeInputValue,
  rawInfoStepSchema,
  rawStepEnvelopeSchema,
  rawToolStepSchema,
  type RawPlanPayload,
} from "./planner/schema";

export type ToolSpecLookup = Pick<ToolRegistry, "lookup">;

export interface ValidationOutcome {
  diagnostics: Diagnostic[];
  plan: Plan;
}

export type PlanProvenance = Pick<Plan, "attempt" | "source">;

const BLOCKING_DIAGNOSTIC_KINDS: ReadonlySet<DiagnosticKind> = new Set([
  "MalformedStep",
  "MissingInput",
  "PlaceholderDetected",
  "UnknownTool",
]);

const STRUCTURAL_DIAGNOSTIC_KINDS: ReadonlySet<DiagnosticKind> = new Set([
  "MalformedStep",
  "MissingInput",
  "UnknownTool",
]);

type StepParseResult =
  | {
      ok: false;
      reason: string;
    }
  | {
      ok: true;
      step: PlanStep;
    };

function describeRawType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

function parseToolStep(rawStep: unknown, index: number): StepParseResult {
  const parsed = rawToolStepSchema.safeParse(rawStep);
  if (!parsed.success) {
    return { ok: false, reason: "tool step fields have the wrong shape" };
  }

  const toolName = (parsed.data.tool ?? parsed.data.name ?? "").trim();
  if (!toolName) {
    return { ok: false, reason: "tool step has no \"tool\" name" };
  }

  const inputs: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data.inputs ?? {})) {
    const normalized = normalizeInputValue(value);
    if (normalized === undefined) {
      return {
        ok: false,
        reason: `input "${key}" must be a string, got ${describeRawType(value)}`,
      };
    }
    inputs[key] = normalized;
  }

  return {
    ok: true,
    step: {
      index,
      inputs,
      kind: "tool",
      rationale: parsed.data.rationale?.trim() ?? "",
      toolName,
    },
  };
}

function parseInfoStep(rawStep: unknown, index: number): StepParseResult {
  const parsed = rawInfoStepSchema.safeParse(rawStep);
  const text = parsed.success ? (parsed.data.text ?? parsed.data.message) : undefined;
  if (text === undefined) {
    return { ok: false, reason: "info step has no \"text\"" };
  }

  return {
    ok: true,
    step: {
      index,
      kind: "info",
      text,
    },
  };
}

export function parseStep(rawStep: unknown, index: number): StepParseResult {
  const envelope = rawStepEnvelopeSchema.safeParse(rawStep);
  if (!envelope.success) {
    const rawType = describeRawType(rawStep);
    return {
      ok: false,
      reason: rawType === "object"
        ? "step has no string \"type\" field"
        : `step must be an object, got ${rawType}`,
    };
  }

  switch (envelope.data.type) {
    case "info":
      return parseInfoStep(rawStep, index);
    case "tool":
      return parseToolStep(rawStep, index);
    default:
      return {
        ok: false,
        reason: `unknown step type "${envelope.data.type}"; expected "tool" or "info"`,
      };
  }
}

function checkToolStep(step: ToolStep, registry: ToolSpecLookup): Diagnostic[] {
  const spec = registry.lookup(step.toolName);
  const diagnostics: Diagnostic[] = [];
  if (!spec) {
    diagnostics.push({
      kind: "UnknownTool",
      message: `unknown tool "${step.toolName}"`,
      stepIndex: step.index,
    });
  }

  for (const key of spec?.requiredInputs ?? []) {
    const value = step.inputs[key];
    if (value === undefined || value.trim().length === 0) {
      diagnostics.push({
        kind: "MissingInput",
        message: `tool "${step.toolName}" requires input "${key}"`,
        stepIndex: step.index,
      });
    }
  }

  for (const [key, value] of Object.entries(step.inputs)) {
    const placeholders = findPlaceholders(value);
    if (placeholders.length === 0) {
      continue;
    }

    const tokens = Array.from(new Set(placeholders.map((placeholder) => placeholder.token)));
    diagnostics.push({
      kind: "PlaceholderDetected",
      message: `input "${key}" of tool "${step.toolName}" contains unresolved placeholder ${tokens.join(", ")}`,
      stepIndex: step.index,
    });
  }

  return diagnostics;
}

export function checkStep(step: PlanStep, registry: ToolSpecLookup): Diagnostic[] {
  return step.kind === "tool" ? checkToolStep(step, registry) : [];
}

export function validatePlan(
  payload: RawPlanPayload,
  registry: ToolSpecLookup,
  provenance: PlanProvenance
): ValidationOutcome {
  const steps: PlanStep[] = [];
  const diagnostics: Diagnostic[] = [];

  payload.plan.forEach((rawStep, index) => {
    const parsed = parseStep(rawStep, index);
    if (!parsed.ok) {
      diagnostics.push({
        kind: "MalformedStep",
        message: parsed.reason,
        stepIndex: index,
      });
      return;
    }

    steps.push(parsed.step);
    diagnostics.push(...checkStep(parsed.step, registry));
  });

  diagnostics.forEach(logDiagnostic);

  return {
    diagnostics,
    plan: {
      attempt: provenance.attempt,
      source: provenance.source,
      steps,
    },
  };
}

export function revalidatePlan(plan: Plan, registry: ToolSpecLookup): Diagnostic[] {
  return plan.steps.flatMap((step) => checkStep(step, registry));
}

export function isBlockingDiagnostic(diagnostic: Diagnostic): boolean {
  return BLOCKING_DIAGNOSTIC_KINDS.has(diagnostic.kind);
}

export function hasBlockingDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(isBlockingDiagnostic);
}

export function isExecutable(diagnostics: readonly Diagnostic[]): boolean {
  return !diagnostics.some((diagnostic) => STRUCTURAL_DIAGNOSTIC_KINDS.has(diagnostic.kind));
}
