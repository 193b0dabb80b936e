import type { LlmProviderErrorClass } from "../llm/compat";

export class AgentError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = "AgentError";
  }
}

export class DuplicateToolError extends AgentError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`, "DUPLICATE_TOOL");
    this.name = "DuplicateToolError";
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "TOOL_EXECUTION_ERROR", cause);
    this.name = "ToolExecutionError";
  }
}

export class RunLogError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "RUN_LOG_ERROR", cause);
    this.name = "RunLogError";
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export class LlmError extends AgentError {
  public readonly errorClass?: LlmProviderErrorClass;
  public readonly statusCode?: number;
  public readonly providerCode?: string;
  public readonly providerMessage?: string;
  public readonly responseBody?: string;

  constructor(
    message: string,
    cause?: unknown,
    details?: {
      errorClass?: LlmProviderErrorClass;
      statusCode?: number;
      providerCode?: string;
      providerMessage?: string;
      responseBody?: string;
    }
  ) {
    super(message, "LLM_ERROR", cause);
    this.name = "LlmError";
    this.errorClass = details?.errorClass;
    this.statusCode = details?.statusCode;
    this.providerCode = details?.providerCode;
    this.providerMessage = details?.providerMessage;
    this.responseBody = details?.responseBody;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
