import { resolveChatCompletionApi } from "../adapter/api/index.js";
import type { AppConfig } from "../config/env.js";
import type { ChatSession } from "../types/chat.js";
import { ConversationCompleter, toCompleterConfig } from "./conversation-completer.js";
import { saveSession } from "./session-store.js";

/**
 * 파일 목적:
 * - 단일 chat turn 실행 경로를 제공한다.
 *
 * 주요 의존성:
 * - conversation-completer: system prompt 보장 + provider 호출
 * - session-store: 턴 전후 세션 저장
 *
 * 역의존성:
 * - src/cli/chat.ts, src/cli/chat-turn.ts
 */

export function createCompleter(config: AppConfig): ConversationCompleter {
  const provider = resolveChatCompletionApi({
    provider: config.provider,
    baseUrl: config.openaiBaseUrl,
    apiKey: config.openaiApiKey,
    debugEnabled: config.debugLlmRequests,
  });
  return new ConversationCompleter(toCompleterConfig(config), provider);
}

export async function runTurn(
  completer: ConversationCompleter,
  sessionDir: string,
  session: ChatSession,
  userMessage: string,
): Promise<string> {
  session.messages.push({ role: "user", content: userMessage });
  await saveSession(sessionDir, session);

  const messages = await completer.complete(session.messages);
  session.messages = messages;
  await saveSession(sessionDir, session);

  return messages[messages.length - 1].content;
}
