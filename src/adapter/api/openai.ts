import type {
  ChatCompletionAdapter,
  ChatCompletionApi,
  CompletionRequest,
  ProviderEndpoint,
} from "../../core/api/chat-completion.js";
import { ConfigurationError, ProviderError } from "../../core/errors.js";
import type { ChatCompletionResponse } from "../../types/chat.js";

interface OpenAICompatibleChoice {
  message?: {
    role?: string;
    content?: unknown;
  };
}

interface OpenAICompatibleResponse {
  choices?: OpenAICompatibleChoice[];
}

interface OpenAIErrorBody {
  error?: {
    code?: unknown;
  };
}

const MODEL_REJECTION_CODES = new Set(["model_not_found", "invalid_model"]);

function toEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/$/, "")}/chat/completions`;
}

function toOneLine(value: string, maxLen = 220): string {
  const compact = value.replace(/\s+/g, " ").trim();
  if (compact.length <= maxLen) {
    return compact;
  }
  return `${compact.slice(0, maxLen)}...`;
}

function debugLogRequest(endpoint: ProviderEndpoint, request: CompletionRequest): void {
  if (endpoint.debugEnabled !== true) {
    return;
  }

  const roleSeq = request.messages.map((m) => m.role).join(">");
  const preview = request.messages
    .slice(0, 3)
    .map((m, i) => `${i}:${m.role}:${toOneLine(m.content, 80)}`)
    .join(" | ");

  process.stderr.write(
    [
      "[llm-debug]",
      `provider=${endpoint.provider}`,
      `model=${request.model}`,
      `messages=${request.messages.length}`,
      `roleSeq=${roleSeq}`,
      `preview=${preview}`,
    ].join(" ") + "\n",
  );
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readErrorCode(body: unknown): string | undefined {
  if (!isObject(body)) {
    return undefined;
  }
  const code = (body as OpenAIErrorBody).error?.code;
  return typeof code === "string" ? code : undefined;
}

function toRequestError(status: number, body: string): ProviderError {
  const message = `LLM request failed (${status}): ${body}`;
  const code = readErrorCode(parseJson(body));
  if (status === 404 || (code !== undefined && MODEL_REJECTION_CODES.has(code))) {
    return new ConfigurationError(message, { status });
  }
  return new ProviderError(message, { status });
}

function extractContent(data: unknown): string | undefined {
  if (!isObject(data)) {
    return undefined;
  }
  const content = (data as OpenAICompatibleResponse).choices?.[0]?.message?.content;
  return typeof content === "string" ? content : undefined;
}

class OpenAIChatCompletionApi implements ChatCompletionApi {
  constructor(private readonly endpoint: ProviderEndpoint) {}

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    debugLogRequest(this.endpoint, request);

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.endpoint.apiKey) {
      headers.authorization = `Bearer ${this.endpoint.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(toEndpoint(this.endpoint.baseUrl), {
        method: "POST",
        headers,
        body: JSON.stringify({ model: request.model, messages: request.messages }),
      });
    } catch (error) {
      throw new ProviderError(`LLM request failed: ${(error as Error).message}`, { cause: error });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw toRequestError(response.status, errorBody);
    }

    const data = parseJson(await response.text());
    const content = extractContent(data);

    if (content === undefined) {
      throw new ProviderError("LLM response did not contain assistant content", {
        status: response.status,
      });
    }

    return { content, raw: data };
  }
}

export class OpenAICompatibleAdapter implements ChatCompletionAdapter {
  readonly provider = "openai-compatible" as const;

  create(endpoint: ProviderEndpoint): ChatCompletionApi {
    return new OpenAIChatCompletionApi(endpoint);
  }
}

export class OpenAIAdapter implements ChatCompletionAdapter {
  readonly provider = "openai" as const;

  create(endpoint: ProviderEndpoint): ChatCompletionApi {
    return new OpenAIChatCompletionApi(endpoint);
  }
}
