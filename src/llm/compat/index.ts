export {
  classifyProviderError,
  isResponseFormatUnsupported,
  type LlmProviderErrorClass,
} from "./classify-error";
