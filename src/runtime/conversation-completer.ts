import type { AppConfig } from "../config/env.js";
import type { ChatCompletionApi } from "../core/api/chat-completion.js";
import { ProviderError } from "../core/errors.js";
import type { ChatMessage, Conversation } from "../types/chat.js";

/**
 * 파일 목적:
 * - 대화 이력 앞에 system prompt를 보장하고 provider에 위임해 assistant 턴을 덧붙인다.
 *
 * 주요 의존성:
 * - core/api/chat-completion: provider capability
 *
 * 역의존성:
 * - src/runtime/chat-service.ts
 */

export interface CompleterConfig {
  readonly systemPrompt: string;
  readonly model: string;
}

export function toCompleterConfig(config: Pick<AppConfig, "systemPrompt" | "model">): CompleterConfig {
  return Object.freeze({ systemPrompt: config.systemPrompt, model: config.model });
}

export function withSystemPrompt(conversation: Conversation, systemPrompt: string): ChatMessage[] {
  if (conversation.length > 0 && conversation[0].role === "system") {
    return [...conversation];
  }
  return [{ role: "system", content: systemPrompt }, ...conversation];
}

export class ConversationCompleter {
  constructor(
    private readonly config: CompleterConfig,
    private readonly provider: ChatCompletionApi,
  ) {}

  async complete(conversation: Conversation): Promise<ChatMessage[]> {
    const messages = withSystemPrompt(conversation, this.config.systemPrompt);

    let content: string;
    try {
      const reply = await this.provider.complete({ model: this.config.model, messages: [...messages] });
      content = reply.content;
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    if (typeof content !== "string") {
      throw new ProviderError("LLM response did not contain assistant content");
    }

    // Empty replies are kept as-is.
    return [...messages, { role: "assistant", content: content.trim() }];
  }
}
