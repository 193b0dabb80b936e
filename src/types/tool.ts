import { z } from "zod";

export const TOOL_EFFECTS = ["destructive", "mutating", "read_only"] as const;

export type ToolEffect = (typeof TOOL_EFFECTS)[number];

export const toolSpecSchema = z.object({
  description: z.string().default(""),
  effect: z.enum(TOOL_EFFECTS).default("mutating"),
  inputHint: z.string().optional(),
  name: z.string().regex(/^[a-z][a-z0-9_]*$/u, "tool names are lowercase snake_case"),
  outputSchema: z.string().optional(),
  requiredInputs: z.array(z.string().min(1)).default([]),
  tags: z.array(z.string()).default([]),
});

export type ToolSpec = z.infer<typeof toolSpecSchema>;
export type ToolSpecInput = z.input<typeof toolSpecSchema>;

export type ExitStatus =
  | {
      code: number;
      kind: "code";
    }
  | {
      kind: "signal";
      signal: string;
    };

export interface ToolOutcome {
  exitStatus: ExitStatus;
  stderr: string;
  stdout: string;
}

export type AbortSignalLike = {
  aborted: boolean;
  addEventListener: (
    type: "abort",
    listener: () => void,
    options?: {
      once?: boolean;
    }
  ) => void;
  removeEventListener: (type: "abort", listener: () => void) => void;
};

export type ToolExecutionContext = {
  abortSignal?: AbortSignalLike;
  timeoutMs?: number;
};

export type ToolInputs = Readonly<Record<string, string>>;

export interface Tool {
  execute: (inputs: ToolInputs, context?: ToolExecutionContext) => Promise<ToolOutcome>;
  predict: (inputs: ToolInputs) => string;
  spec: ToolSpecInput;
}

export function exitStatusFromProcess(exitCode: null | number, signal: null | string): ExitStatus {
  if (exitCode !== null) {
    return { code: exitCode, kind: "code" };
  }

  return { kind: "signal", signal: signal ?? "unknown" };
}

export function describeExitStatus(status: ExitStatus): string {
  return status.kind === "code" ? `exit code ${String(status.code)}` : `signal ${status.signal}`;
}
