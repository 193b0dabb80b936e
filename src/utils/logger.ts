import type { Diagnostic } from "../types/plan";

let verbose = false;

export function initializeLogger(config: { verbose: boolean }): void {
  verbose = config.verbose;
}

function shouldLog(): boolean {
  return verbose;
}

export function log(message: string): void {
  if (shouldLog()) {
    console.log(`[LOG] ${message}`);
  }
}

export function logError(message: string, error?: unknown): void {
  console.error(`[ERROR] ${message}`);
  if (error instanceof Error && shouldLog()) {
    console.error(error.stack);
  }
}

export function logAttempt(attempt: number, message: string): void {
  if (shouldLog()) {
    console.log(`[ATTEMPT ${attempt}] ${message}`);
  }
}

export function logDiagnostic(diagnostic: Diagnostic): void {
  if (shouldLog()) {
    console.log(`[DIAGNOSTIC] ${diagnostic.kind} @${diagnostic.stepIndex}: ${diagnostic.message}`);
  }
}

export function logToolCall(name: string, inputs: unknown): void {
  if (shouldLog()) {
    console.log(`[TOOL] ${name}`, inputs);
  }
}

export function logToolResult(result: { stdout: string; success: boolean }): void {
  if (shouldLog()) {
    const status = result.success ? "✓" : "✗";
    console.log(`[TOOL RESULT] ${status} ${result.stdout.slice(0, 100)}`);
  }
}
