import { z } from "zod";

import type { AbortSignalLike } from "../types/tool";
import type { LlmRequest, LlmResponse, LlmUsage } from "./types";

import { LlmError } from "../utils/errors";
import { log } from "../utils/logger";
import { classifyProviderError } from "./compat";

export type LlmClientConfig = {
  llmApiKey?: string;
  llmModel: string;
};

type ChatOptions = {
  abortSignal?: AbortSignalLike;
};

const openRouterUsageSchema = z.looseObject({
  completion_tokens: z.number().optional(),
  prompt_tokens: z.number().optional(),
  total_tokens: z.number().optional(),
});

const openRouterChatResponseSchema = z.looseObject({
  choices: z
    .array(z.looseObject({ message: z.looseObject({ content: z.string().nullish() }).optional() }))
    .optional(),
  error: z
    .looseObject({
      code: z.union([z.number(), z.string()]).optional(),
      message: z.string().optional(),
    })
    .optional(),
  usage: openRouterUsageSchema.optional(),
});

type OpenRouterUsage = z.infer<typeof openRouterUsageSchema>;
type OpenRouterChatResponse = z.infer<typeof openRouterChatResponseSchema>;

function parseResponseBody(value: unknown): OpenRouterChatResponse | undefined {
  const parsed = openRouterChatResponseSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function parseNonNegativeInteger(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return undefined;
  }

  const parsed = Math.trunc(value);
  return parsed < 0 ? undefined : parsed;
}

function parseUsage(usage: OpenRouterUsage | undefined): LlmUsage | undefined {
  if (!usage) {
    return undefined;
  }

  const inputTokens = parseNonNegativeInteger(usage.prompt_tokens) ?? 0;
  const outputTokens = parseNonNegativeInteger(usage.completion_tokens) ?? 0;
  const totalTokens = parseNonNegativeInteger(usage.total_tokens) ?? inputTokens + outputTokens;
  if (totalTokens === 0) {
    return undefined;
  }

  return {
    inputTokens,
    outputTokens,
    totalTokens,
  };
}

function normalizeProviderCode(code: unknown): string | undefined {
  if (typeof code !== "number" && typeof code !== "string") {
    return undefined;
  }

  const normalized = String(code).trim();
  return normalized.length > 0 ? normalized : undefined;
}

function parseProviderError(rawBody: string): { providerCode?: string; providerMessage?: string } {
  const fallbackMessage = rawBody.trim() || undefined;
  try {
    const parsed = parseResponseBody(JSON.parse(rawBody));
    return {
      providerCode: normalizeProviderCode(parsed?.error?.code),
      providerMessage: parsed?.error?.message?.trim() || fallbackMessage,
    };
  } catch {
    return {
      providerMessage: fallbackMessage,
    };
  }
}

function buildChatRequestBody(model: string, request: LlmRequest): Record<string, unknown> {
  const responseFormat = request.responseFormat
    ? {
        json_schema: {
          name: request.responseFormat.name,
          schema: request.responseFormat.schema,
          strict: request.responseFormat.strict,
        },
        type: "json_schema",
      }
    : undefined;

  return {
    messages: request.messages,
    model,
    ...(responseFormat ? { response_format: responseFormat } : {}),
  };
}

export class LlmClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(config: LlmClientConfig) {
    if (!config.llmApiKey) {
      throw new LlmError("OPENROUTER_API_KEY is required to call the planner model");
    }
    this.apiKey = config.llmApiKey;
    this.baseUrl = "https://openrouter.ai/api/v1";
    this.model = config.llmModel;
  }

  async chat(request: LlmRequest, options?: ChatOptions): Promise<LlmResponse> {
    log(`Calling LLM (${request.callKind ?? "unspecified"}) with model: ${this.model}`);

    const controller = new AbortController();
    const forwardAbort = (): void => {
      controller.abort();
    };
    options?.abortSignal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        body: JSON.stringify(buildChatRequestBody(this.model, request)),
        headers: this.getRequestHeaders(),
        method: "POST",
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        const parsedError = parseProviderError(errorText);
        throw new LlmError(
          `LLM API request failed: ${response.status} ${response.statusText}. ${parsedError.providerMessage ?? "Unknown provider error"}`,
          undefined,
          {
            errorClass: classifyProviderError({ ...parsedError, statusCode: response.status }),
            providerCode: parsedError.providerCode,
            providerMessage: parsedError.providerMessage,
            responseBody: errorText.trim() || undefined,
            statusCode: response.status,
          }
        );
      }

      const data = parseResponseBody(await response.json());
      if (!data) {
        throw new LlmError("LLM response body has an unexpected shape");
      }

      if (data.error) {
        const providerCode = normalizeProviderCode(data.error.code);
        const providerMessage = data.error.message ?? "Unknown error";
        throw new LlmError(`LLM API error: ${providerMessage}`, undefined, {
          errorClass: classifyProviderError({ providerCode, providerMessage }),
          providerCode,
          providerMessage,
        });
      }

      const content = data.choices?.[0]?.message?.content;
      if (!content) {
        throw new LlmError("LLM response missing content");
      }

      return {
        content,
        usage: parseUsage(data.usage),
      };
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      throw new LlmError(`Failed to call LLM: ${error instanceof Error ? error.message : "Unknown error"}`, error);
    } finally {
      options?.abortSignal?.removeEventListener("abort", forwardAbort);
    }
  }

  private getRequestHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
      "X-Title": "planloop",
    };
  }
}
