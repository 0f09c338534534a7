import type { ChatCompletionApi, ProviderEndpoint } from "../../core/api/chat-completion.js";
import { ConfigurationError } from "../../core/errors.js";
import { OpenAIAdapter, OpenAICompatibleAdapter } from "./openai.js";

const openaiCompatible = new OpenAICompatibleAdapter();
const openai = new OpenAIAdapter();

export function resolveChatCompletionApi(endpoint: ProviderEndpoint): ChatCompletionApi {
  if (endpoint.provider === "openai-compatible") {
    return openaiCompatible.create(endpoint);
  }

  if (endpoint.provider === "openai") {
    return openai.create(endpoint);
  }

  throw new ConfigurationError(
    `Unsupported provider: ${(endpoint as { provider?: string }).provider ?? "<unknown>"}`,
  );
}
