import { config as loadDotenv } from "dotenv";
import type { ProviderType } from "../core/api/chat-completion.js";
import { DEFAULT_SYSTEM_PROMPT } from "./system-prompt.js";

loadDotenv();

export const DEFAULT_MODEL_NAME = "gpt-4o-mini";
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

type Env = Record<string, string | undefined>;

function getStringEnv(env: Env, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

function getBooleanEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

function getProviderEnv(env: Env, name: string): ProviderType {
  return getStringEnv(env, name) === "openai-compatible" ? "openai-compatible" : "openai";
}

export interface AppConfig {
  model: string;
  systemPrompt: string;
  provider: ProviderType;
  openaiBaseUrl: string;
  openaiApiKey?: string;
  sessionDir: string;
  debugLlmRequests: boolean;
}

export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  return Object.freeze({
    model: getStringEnv(env, "MODEL_NAME") ?? DEFAULT_MODEL_NAME,
    systemPrompt: getStringEnv(env, "SYSTEM_PROMPT") ?? DEFAULT_SYSTEM_PROMPT,
    provider: getProviderEnv(env, "LLM_PROVIDER"),
    openaiBaseUrl: getStringEnv(env, "OPENAI_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL,
    openaiApiKey: getStringEnv(env, "OPENAI_API_KEY"),
    sessionDir: getStringEnv(env, "SESSION_DIR") ?? "./data/sessions",
    debugLlmRequests: getBooleanEnv(env, "DEBUG_LLM_REQUESTS", false),
  });
}
