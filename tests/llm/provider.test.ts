import { afterEach, describe, expect, it, vi } from "vitest";

import {
  __resetDefaultLlmProviderForTests,
  createAnthropicProvider,
  getDefaultLlmProvider,
  extractAnthropicText,
  extractAnthropicUsage,
  isTransientStatus,
  LlmProviderError,
} from "../../packages/llm/src/provider.ts";

function anthropicResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

async function captureProviderError(promise: Promise<unknown>): Promise<LlmProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof LlmProviderError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the provider call to fail");
}

const request = { systemPrompt: "system", userPrompt: "user", timeoutMs: 1000 };

describe("anthropic provider", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("posts a messages request and returns text and usage", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      anthropicResponse({
        content: [{ type: "tool_use" }, { type: "text", text: "{\"ok\":true}" }],
        usage: { input_tokens: 12.7, output_tokens: 3 },
      })
    );
    const provider = createAnthropicProvider({ apiKey: "test-secret", model: "test-model", fetchImpl });

    const response = await provider.generateText({ ...request, maxOutputTokens: 256 });

    expect(response).toEqual({
      text: "{\"ok\":true}",
      model: "test-model",
      provider: "anthropic",
      usage: { input_tokens: 12, output_tokens: 3 },
    });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ "x-api-key": "test-secret", "anthropic-version": "2023-06-01" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      max_tokens: 256,
      temperature: 0,
      system: "system",
      messages: [{ role: "user", content: [{ type: "text", text: "user" }] }],
    });
  });

  it("fails permanently without an API key", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
    const fetchImpl = vi.fn<typeof fetch>();

    const error = await captureProviderError(createAnthropicProvider({ fetchImpl }).generateText(request));

    expect(error.message).toBe("ANTHROPIC_API_KEY is not configured.");
    expect(error.transient).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("classifies HTTP failures by status", async () => {
    const rateLimited = await captureProviderError(
      createAnthropicProvider({
        apiKey: "test-secret",
        fetchImpl: async () => anthropicResponse({ error: "slow down" }, 429),
      }).generateText(request),
    );
    const rejected = await captureProviderError(
      createAnthropicProvider({
        apiKey: "test-secret",
        fetchImpl: async () => anthropicResponse({ error: "bad" }, 400),
      }).generateText(request),
    );

    expect([rateLimited.transient, rateLimited.status]).toEqual([true, 429]);
    expect([rejected.transient, rejected.status]).toEqual([false, 400]);
  });

  it("reports network failures and timeouts as transient", async () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";
    const timedOut = await captureProviderError(
      createAnthropicProvider({
        apiKey: "test-secret",
        fetchImpl: async () => {
          throw abort;
        },
      }).generateText(request),
    );
    const offline = await captureProviderError(
      createAnthropicProvider({
        apiKey: "test-secret",
        fetchImpl: async () => {
          throw new TypeError("fetch failed");
        },
      }).generateText(request),
    );

    expect([timedOut.message, timedOut.transient]).toEqual(["LLM provider call timed out.", true]);
    expect([offline.message, offline.transient]).toEqual(["LLM provider network failure.", true]);
  });

  it("rejects a body that is not JSON", async () => {
    const error = await captureProviderError(
      createAnthropicProvider({
        apiKey: "test-secret",
        fetchImpl: async () => new Response("<html>", { status: 200 }),
      }).generateText(request),
    );

    expect(error.message).toBe("LLM provider returned non-JSON payload.");
  });
});

describe("anthropic response helpers", () => {
  it("treats timeouts, conflicts, rate limits and server errors as transient", () => {
    expect([408, 409, 429, 500, 503, 400, 401, 404].map(isTransientStatus)).toEqual([
      true,
      true,
      true,
      true,
      true,
      false,
      false,
      false,
    ]);
  });

  it("requires a text block", () => {
    expect(() => extractAnthropicText({ content: [] })).toThrowError(
      "Anthropic response does not include text content.",
    );
    expect(() => extractAnthropicText({})).toThrowError("Anthropic response is missing content array.");
    expect(() => extractAnthropicText([])).toThrowError("Anthropic response must be an object.");
  });

  it("defaults missing or invalid usage to zero", () => {
    expect(extractAnthropicUsage({})).toEqual({ input_tokens: 0, output_tokens: 0 });
    expect(extractAnthropicUsage({ usage: { input_tokens: -4, output_tokens: "7" } })).toEqual({
      input_tokens: 0,
      output_tokens: 7,
    });
  });

  it("caches the default provider until reset", () => {
    __resetDefaultLlmProviderForTests();
    const first = getDefaultLlmProvider();

    expect(getDefaultLlmProvider()).toBe(first);
    __resetDefaultLlmProviderForTests();
    expect(getDefaultLlmProvider()).not.toBe(first);
  });
});
