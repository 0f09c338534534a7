import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ChatMessage, ChatSession } from "../types/chat.js";

function nowIso(): string {
  return new Date().toISOString();
}

function sessionFile(sessionDir: string, sessionId: string): string {
  return path.join(sessionDir, `${sessionId}.json`);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === "ENOENT";
}

function createSession(sessionId: string, systemPrompt?: string): ChatSession {
  const messages: ChatMessage[] = systemPrompt ? [{ role: "system", content: systemPrompt }] : [];
  return {
    id: sessionId,
    createdAt: nowIso(),
    updatedAt: nowIso(),
    messages,
  };
}

export async function loadOrCreateSession(
  sessionDir: string,
  sessionId: string,
  systemPrompt?: string,
): Promise<ChatSession> {
  await mkdir(sessionDir, { recursive: true });
  const file = sessionFile(sessionDir, sessionId);

  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
    const session = createSession(sessionId, systemPrompt);
    await saveSession(sessionDir, session);
    return session;
  }

  return JSON.parse(raw) as ChatSession;
}

export async function saveSession(sessionDir: string, session: ChatSession): Promise<void> {
  await mkdir(sessionDir, { recursive: true });
  session.updatedAt = nowIso();
  const file = sessionFile(sessionDir, session.id);
  await writeFile(file, JSON.stringify(session, null, 2), "utf-8");
}

export async function resetSession(
  sessionDir: string,
  sessionId: string,
  systemPrompt?: string,
): Promise<ChatSession> {
  const session = createSession(sessionId, systemPrompt);
  await saveSession(sessionDir, session);
  return session;
}
