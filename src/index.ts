export { loadConfig, DEFAULT_MODEL_NAME, DEFAULT_OPENAI_BASE_URL } from "./config/env.js";
export type { AppConfig } from "./config/env.js";
export { DEFAULT_SYSTEM_PROMPT } from "./config/system-prompt.js";
export type {
  ChatCompletionApi,
  CompletionRequest,
  ProviderEndpoint,
  ProviderType,
} from "./core/api/chat-completion.js";
export { ConfigurationError, ProviderError } from "./core/errors.js";
export { resolveChatCompletionApi } from "./adapter/api/index.js";
export {
  ConversationCompleter,
  toCompleterConfig,
  withSystemPrompt,
} from "./runtime/conversation-completer.js";
export type { CompleterConfig } from "./runtime/conversation-completer.js";
export { createCompleter, runTurn } from "./runtime/chat-service.js";
export type { ChatMessage, ChatRole, ChatSession, Conversation } from "./types/chat.js";
