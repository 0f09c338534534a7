import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChatCompletionApi } from "../core/api/chat-completion.js";
import { ProviderError } from "../core/errors.js";
import type { ChatSession } from "../types/chat.js";
import { runTurn } from "./chat-service.js";
import { ConversationCompleter } from "./conversation-completer.js";
import { loadOrCreateSession, resetSession } from "./session-store.js";

let sessionDir: string;

beforeEach(async () => {
  sessionDir = await mkdtemp(path.join(os.tmpdir(), "recipe-chat-"));
});

afterEach(async () => {
  await rm(sessionDir, { recursive: true, force: true });
});

async function readSaved(id: string): Promise<ChatSession> {
  return JSON.parse(await readFile(path.join(sessionDir, `${id}.json`), "utf-8")) as ChatSession;
}

describe("session store", () => {
  it("creates a session seeded with the system prompt", async () => {
    const session = await loadOrCreateSession(sessionDir, "s1", "Recipe prompt");

    expect(session.id).toBe("s1");
    expect(session.messages).toEqual([{ role: "system", content: "Recipe prompt" }]);
    expect((await readSaved("s1")).messages).toEqual(session.messages);
  });

  it("loads an existing session instead of recreating it", async () => {
    const first = await loadOrCreateSession(sessionDir, "s1", "Recipe prompt");
    first.messages.push({ role: "user", content: "Hi" });
    await writeFile(path.join(sessionDir, "s1.json"), JSON.stringify(first), "utf-8");

    const loaded = await loadOrCreateSession(sessionDir, "s1", "Other prompt");

    expect(loaded.messages).toEqual([
      { role: "system", content: "Recipe prompt" },
      { role: "user", content: "Hi" },
    ]);
  });

  it("fails on a corrupt session file", async () => {
    await writeFile(path.join(sessionDir, "broken.json"), "{not json", "utf-8");

    await expect(loadOrCreateSession(sessionDir, "broken")).rejects.toBeInstanceOf(SyntaxError);
  });

  it("resets a session back to the system prompt", async () => {
    const session = await resetSession(sessionDir, "s1", "Recipe prompt");

    expect(session.messages).toEqual([{ role: "system", content: "Recipe prompt" }]);
    expect((await readSaved("s1")).messages).toEqual([{ role: "system", content: "Recipe prompt" }]);
  });
});

describe("runTurn", () => {
  it("appends the user turn and the trimmed reply, then persists both", async () => {
    const complete = vi.fn<ChatCompletionApi["complete"]>(async () => ({ content: " Omelette \n", raw: null }));
    const completer = new ConversationCompleter({ systemPrompt: "Default prompt", model: "test-model" }, { complete });
    const session = await loadOrCreateSession(sessionDir, "s1", "Recipe prompt");

    const answer = await runTurn(completer, sessionDir, session, "What can I make with eggs?");

    expect(answer).toBe("Omelette");
    expect(complete).toHaveBeenCalledWith({
      model: "test-model",
      messages: [
        { role: "system", content: "Recipe prompt" },
        { role: "user", content: "What can I make with eggs?" },
      ],
    });
    const expected = [
      { role: "system", content: "Recipe prompt" },
      { role: "user", content: "What can I make with eggs?" },
      { role: "assistant", content: "Omelette" },
    ];
    expect(session.messages).toEqual(expected);
    expect((await readSaved("s1")).messages).toEqual(expected);
  });

  it("keeps the user turn persisted when the provider fails", async () => {
    const complete = vi.fn<ChatCompletionApi["complete"]>(async () => {
      throw new ProviderError("LLM request failed (401): invalid api key", { status: 401 });
    });
    const completer = new ConversationCompleter({ systemPrompt: "Default prompt", model: "test-model" }, { complete });
    const session = await loadOrCreateSession(sessionDir, "s1");

    await expect(runTurn(completer, sessionDir, session, "Hi")).rejects.toThrow(
      "LLM request failed (401): invalid api key",
    );

    expect(session.messages).toEqual([{ role: "user", content: "Hi" }]);
    expect((await readSaved("s1")).messages).toEqual([{ role: "user", content: "Hi" }]);
  });
});
