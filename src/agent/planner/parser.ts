import { rawPlanPayloadSchema, type RawPlanPayload } from "./schema";

export type PlanParseFailureReason =
  | "deadline_exceeded"
  | "empty_response"
  | "invalid_json"
  | "missing_json_payload"
  | "missing_plan_list"
  | "oracle_error";

export type PlanExtractionResult =
  | {
      fragment: string;
      payload: RawPlanPayload;
      success: true;
    }
  | {
      detail: string;
      reason: PlanParseFailureReason;
      success: false;
    };

const REASONING_TRACE_TAGS = ["analysis", "reasoning", "scratchpad", "think", "thinking"];
const MAX_FRAGMENT_CANDIDATES = 64;

export function stripReasoningTraces(content: string): string {
  let stripped = content;
  for (const tag of REASONING_TRACE_TAGS) {
    const closedBlock = new RegExp(`<${tag}>[\\s\\S]*?</${tag}>`, "giu");
    stripped = stripped.replace(closedBlock, "");
    // Stray or unterminated tags are dropped; the text around them is kept.
    stripped = stripped.replace(new RegExp(`</?${tag}>`, "giu"), "");
  }
  return stripped;
}

type TextSpan = {
  end: number;
  start: number;
};

export type PayloadCandidate = {
  start: number;
  text: string;
};

function findReasoningSpans(content: string): TextSpan[] {
  const spans: TextSpan[] = [];
  for (const tag of REASONING_TRACE_TAGS) {
    const closedBlock = new RegExp(`<${tag}>[\\s\\S]*?</${tag}>`, "giu");
    for (const match of content.matchAll(closedBlock)) {
      const start = match.index ?? 0;
      spans.push({ end: start + match[0].length, start });
    }
  }
  return spans;
}

function isInsideSpan(offset: number, spans: readonly TextSpan[]): boolean {
  return spans.some((span) => offset >= span.start && offset < span.end);
}

function extractFencedBlocks(content: string): PayloadCandidate[] {
  const blocks: PayloadCandidate[] = [];
  const fencePattern = /```[a-zA-Z0-9_-]*[ \t]*\r?\n?([\s\S]*?)```/gu;
  for (const match of content.matchAll(fencePattern)) {
    const body = match[1]?.trim();
    if (body) {
      blocks.push({ start: match.index ?? 0, text: body });
    }
  }
  return blocks;
}

function findBalancedObjectEnd(content: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < content.length; index += 1) {
    const character = content[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (character === "\\") {
        escaped = true;
      } else if (character === "\"") {
        inString = false;
      }
      continue;
    }

    if (character === "\"") {
      inString = true;
    } else if (character === "{") {
      depth += 1;
    } else if (character === "}") {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
}

export function* iterateObjectFragments(content: string): Generator<PayloadCandidate> {
  let emitted = 0;
  let cursor = content.indexOf("{");
  while (cursor !== -1 && emitted < MAX_FRAGMENT_CANDIDATES) {
    const end = findBalancedObjectEnd(content, cursor);
    if (end !== -1) {
      emitted += 1;
      yield { start: cursor, text: content.slice(cursor, end + 1) };
    }
    cursor = content.indexOf("{", cursor + 1);
  }
}

function tryParseJson(candidate: string): { ok: false } | { ok: true; value: unknown } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

// Candidates are located in the raw reply so that string values inside the
// payload are never edited. Fenced blocks and fragments that begin inside a
// closed reasoning block are drafts and are skipped.
export function extractPlanPayload(content: string): PlanExtractionResult {
  if (!stripReasoningTraces(content).trim()) {
    return {
      detail: "planner reply was empty",
      reason: "empty_response",
      success: false,
    };
  }

  const reasoningSpans = findReasoningSpans(content);
  const outsideReasoning = (candidate: PayloadCandidate): boolean =>
    !isInsideSpan(candidate.start, reasoningSpans);
  let sawJson = false;
  let sawObjectFragment = false;

  const inspect = (candidate: string): null | PlanExtractionResult => {
    const parsed = tryParseJson(candidate);
    if (!parsed.ok) {
      return null;
    }
    sawJson = true;

    const payload = rawPlanPayloadSchema.safeParse(parsed.value);
    if (!payload.success) {
      return null;
    }

    return {
      fragment: candidate,
      payload: payload.data,
      success: true,
    };
  };

  const candidates = [
    content.trim(),
    ...extractFencedBlocks(content)
      .filter(outsideReasoning)
      .map((block) => block.text),
  ];
  for (const candidate of candidates) {
    const result = inspect(candidate);
    if (result) {
      return result;
    }
  }

  for (const fragment of iterateObjectFragments(content)) {
    if (!outsideReasoning(fragment)) {
      continue;
    }
    sawObjectFragment = true;
    const result = inspect(fragment.text);
    if (result) {
      return result;
    }
  }

  if (sawJson) {
    return {
      detail: "reply contained JSON but no object with a \"plan\" list",
      reason: "missing_plan_list",
      success: false,
    };
  }

  if (sawObjectFragment) {
    return {
      detail: "reply contained braces but no well-formed JSON object",
      reason: "invalid_json",
      success: false,
    };
  }

  return {
    detail: "reply contained no JSON object",
    reason: "missing_json_payload",
    success: false,
  };
}
