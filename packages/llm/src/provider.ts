import { readEnv } from "../../core/src/observability/runtime-env.ts";

export type LlmProviderRequest = {
  systemPrompt: string;
  userPrompt: string;
  timeoutMs: number;
  maxOutputTokens?: number;
  signal?: AbortSignal;
};

export type LlmProviderResponse = {
  text: string;
  model: string;
  provider: "anthropic";
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
};

export interface LlmProvider {
  generateText(request: LlmProviderRequest): Promise<LlmProviderResponse>;
}

export class LlmProviderError extends Error {
  readonly transient: boolean;
  readonly status: number | null;

  constructor(message: string, options: { transient: boolean; status?: number | null }) {
    super(message);
    this.name = "LlmProviderError";
    this.transient = options.transient;
    this.status = options.status ?? null;
  }
}

const ANTHROPIC_ENDPOINT = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_API_VERSION = "2023-06-01";
export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-haiku-latest";
export const DEFAULT_MAX_OUTPUT_TOKENS = 1200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export function extractAnthropicText(value: unknown): string {
  if (!isRecord(value)) {
    throw new LlmProviderError("Anthropic response must be an object.", {
      transient: false,
    });
  }

  const content = value.content;
  if (!Array.isArray(content)) {
    throw new LlmProviderError("Anthropic response is missing content array.", {
      transient: false,
    });
  }

  let text: unknown = null;
  for (const entry of content) {
    if (isRecord(entry) && entry.type === "text") {
      text = entry.text;
      break;
    }
  }

  if (typeof text !== "string" || text.trim().length === 0) {
    throw new LlmProviderError("Anthropic response does not include text content.", {
      transient: false,
    });
  }

  return text;
}

export function extractAnthropicUsage(value: unknown): { input_tokens: number; output_tokens: number } {
  if (!isRecord(value) || !isRecord(value.usage)) {
    return { input_tokens: 0, output_tokens: 0 };
  }

  const inputTokens = Number(value.usage.input_tokens ?? 0);
  const outputTokens = Number(value.usage.output_tokens ?? 0);

  return {
    input_tokens: Number.isFinite(inputTokens) && inputTokens > 0
      ? Math.floor(inputTokens)
      : 0,
    output_tokens: Number.isFinite(outputTokens) && outputTokens > 0
      ? Math.floor(outputTokens)
      : 0,
  };
}

export function createAnthropicProvider(params?: {
  apiKey?: string | null;
  model?: string | null;
  maxOutputTokens?: number;
  fetchImpl?: typeof fetch;
}): LlmProvider {
  const apiKey = params?.apiKey ?? readEnv("ANTHROPIC_API_KEY");
  const model = params?.model ?? readEnv("LLM_MODEL") ?? ANTHROPIC_DEFAULT_MODEL;
  const defaultMaxTokens = params?.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  const fetchImpl = params?.fetchImpl ?? fetch;

  return {
    async generateText(request: LlmProviderRequest): Promise<LlmProviderResponse> {
      if (!apiKey) {
        throw new LlmProviderError("ANTHROPIC_API_KEY is not configured.", {
          transient: false,
        });
      }

      let response: Response;
      try {
        response = await fetchImpl(ANTHROPIC_ENDPOINT, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            "x-api-key": apiKey,
            "anthropic-version": ANTHROPIC_API_VERSION,
          },
          body: JSON.stringify({
            model,
            max_tokens: request.maxOutputTokens ?? defaultMaxTokens,
            temperature: 0,
            system: request.systemPrompt,
            messages: [
              {
                role: "user",
                content: [
                  {
                    type: "text",
                    text: request.userPrompt,
                  },
                ],
              },
            ],
          }),
          signal: request.signal,
        });
      } catch (error) {
        const isAbort = error instanceof Error && error.name === "AbortError";
        throw new LlmProviderError(
          isAbort ? "LLM provider call timed out." : "LLM provider network failure.",
          { transient: true },
        );
      }

      const rawText = await response.text();
      if (!response.ok) {
        throw new LlmProviderError("LLM provider returned non-OK status.", {
          transient: isTransientStatus(response.status),
          status: response.status,
        });
      }

      let parsedBody: unknown;
      try {
        parsedBody = JSON.parse(rawText);
      } catch {
        throw new LlmProviderError("LLM provider returned non-JSON payload.", {
          transient: false,
          status: response.status,
        });
      }

      return {
        text: extractAnthropicText(parsedBody),
        model,
        provider: "anthropic",
        usage: extractAnthropicUsage(parsedBody),
      };
    },
  };
}

let cachedProvider: LlmProvider | null = null;

export function getDefaultLlmProvider(): LlmProvider {
  if (!cachedProvider) {
    cachedProvider = createAnthropicProvider();
  }
  return cachedProvider;
}

export function __resetDefaultLlmProviderForTests(): void {
  cachedProvider = null;
}
