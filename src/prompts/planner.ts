import type { PlanRequest } from "../agent/oracle";
import type { LlmMessage } from "../llm/types";
import type { ToolSpec } from "../types/tool";

const MAX_FEEDBACK_ENTRIES = 5;

function renderTools(tools: readonly ToolSpec[]): string {
  if (tools.length === 0) {
    return "(no tools registered)";
  }

  return tools
    .map((tool) => {
      const inputs = tool.requiredInputs.length > 0 ? tool.requiredInputs.join(", ") : "none";
      const hint = tool.inputHint ? `\n  Hint: ${tool.inputHint}` : "";
      return `- ${tool.name} [${tool.effect}]: ${tool.description}\n  Required inputs: ${inputs}${hint}`;
    })
    .join("\n");
}

function renderFeedback(request: PlanRequest): string {
  const recent = request.runLog.slice(-MAX_FEEDBACK_ENTRIES);
  if (recent.length === 0) {
    return "";
  }

  return `\n\nPREVIOUS ATTEMPTS:\n${recent.map((entry) => entry.narrativeSummary).join("\n\n")}`;
}

export function buildPlannerSystemPrompt(tools: readonly ToolSpec[]): string {
  return `Reply with a single JSON object of this shape and nothing else:
{"plan": [{"type": "tool", "tool": "<name>", "inputs": {"key": "value"}, "rationale": "why"}, {"type": "info", "text": "note"}]}

Rules:
- "tool" steps must name a tool from the list below and supply every required input as a concrete string.
- Inputs must not contain unresolved template tokens such as angle-bracket names or $output[...] references.
- Return {"plan": []} when the goal is already achieved.

AVAILABLE TOOLS:
${renderTools(tools)}`;
}

export function buildPlannerMessages(request: PlanRequest): LlmMessage[] {
  const instruction = request.mode === "plan"
    ? "Produce a plan for the goal."
    : `Produce a revised plan for attempt ${request.attempt} that addresses the previous feedback.`;

  return [
    { content: buildPlannerSystemPrompt(request.tools), role: "system" },
    {
      content: `GOAL: ${request.goal}${renderFeedback(request)}\n\n${instruction}`,
      role: "user",
    },
  ];
}
