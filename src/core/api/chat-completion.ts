import type { ChatCompletionResponse, ChatMessage } from "../../types/chat.js";

export type ProviderType = "openai-compatible" | "openai";

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface ChatCompletionApi {
  complete(request: CompletionRequest): Promise<ChatCompletionResponse>;
}

export interface ProviderEndpoint {
  provider: ProviderType;
  baseUrl: string;
  apiKey?: string;
  debugEnabled?: boolean;
}

export interface ChatCompletionAdapter {
  readonly provider: ProviderType;
  create(endpoint: ProviderEndpoint): ChatCompletionApi;
}
