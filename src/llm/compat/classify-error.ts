export type LlmProviderErrorClass =
  | "authentication"
  | "other"
  | "rate_limit"
  | "response_format_unsupported";

export function isResponseFormatUnsupported(input: {
  providerCode?: string;
  providerMessage?: string;
}): boolean {
  const haystack = `${input.providerCode ?? ""} ${input.providerMessage ?? ""}`.toLowerCase();
  if (!haystack.trim()) {
    return false;
  }

  return (
    (haystack.includes("response_format") || haystack.includes("json_schema")) &&
    (haystack.includes("unsupported") ||
      haystack.includes("not supported") ||
      haystack.includes("invalid"))
  );
}

export function classifyProviderError(input: {
  providerCode?: string;
  providerMessage?: string;
  statusCode?: number;
}): LlmProviderErrorClass {
  if (isResponseFormatUnsupported(input)) {
    return "response_format_unsupported";
  }

  if (input.statusCode === 429 || input.providerCode === "429") {
    return "rate_limit";
  }

  if (input.statusCode === 401 || input.statusCode === 403) {
    return "authentication";
  }

  const haystack = `${input.providerCode ?? ""} ${input.providerMessage ?? ""}`.toLowerCase();
  if (
    haystack.includes("rate limit") ||
    haystack.includes("too many requests") ||
    haystack.includes("quota exceeded")
  ) {
    return "rate_limit";
  }

  if (haystack.includes("invalid api key") || haystack.includes("no auth credentials")) {
    return "authentication";
  }

  return "other";
}
