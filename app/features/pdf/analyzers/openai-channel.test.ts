import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { AnalyzerConfig } from "@/app/lib/config";
import { ANALYSIS_SYSTEM_PROMPT } from "./analysis-prompt";
import { OpenAIExchangeChannel } from "./openai-channel";

const { create, clientOptions } = vi.hoisted(() => ({
  create: vi.fn(),
  clientOptions: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create } };

    constructor(options: unknown) {
      clientOptions(options);
    }
  },
}));

const openAIConfig: AnalyzerConfig = {
  useOpenRouter: false,
  apiKey: "test-secret",
  baseURL: undefined,
  model: "gpt-5-nano",
  timeoutMs: 1000,
  maxTokens: 500,
};

const openRouterConfig: AnalyzerConfig = {
  ...openAIConfig,
  useOpenRouter: true,
  baseURL: "https://openrouter.ai/api/v1",
  model: "test/model",
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  create.mockReset();
  clientOptions.mockReset();
});

describe("OpenAIExchangeChannel", () => {
  it("requires an API key", () => {
    expect(() => new OpenAIExchangeChannel({ ...openAIConfig, apiKey: undefined })).toThrow(
      "OPENAI_SECRET_KEY is required for the openai analyzer"
    );
    expect(() => new OpenAIExchangeChannel({ ...openRouterConfig, apiKey: undefined })).toThrow(
      "OPENROUTER_API_KEY is required when USE_OPENROUTER=true"
    );
  });

  it("creates the client with the configured endpoint", () => {
    new OpenAIExchangeChannel(openRouterConfig);
    expect(clientOptions).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: "https://openrouter.ai/api/v1",
    });
  });

  it("sends the prompt and returns the reply text", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{"structure": []}' } }] });
    const signal = new AbortController().signal;

    const reply = await new OpenAIExchangeChannel(openAIConfig).exchange("Classify", signal);

    expect(reply).toBe('{"structure": []}');
    expect(create).toHaveBeenCalledWith(
      {
        model: "gpt-5-nano",
        messages: [
          { role: "system", content: ANALYSIS_SYSTEM_PROMPT },
          { role: "user", content: "Classify" },
        ],
        max_completion_tokens: 500,
      },
      { signal }
    );
  });

  it("uses max_tokens with OpenRouter", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: "{}" } }] });

    await new OpenAIExchangeChannel(openRouterConfig).exchange("Classify", new AbortController().signal);

    expect(create.mock.calls[0][0]).toEqual({
      model: "test/model",
      messages: [
        { role: "system", content: ANALYSIS_SYSTEM_PROMPT },
        { role: "user", content: "Classify" },
      ],
      max_tokens: 500,
    });
  });

  it("returns null when the completion has no content", async () => {
    create.mockResolvedValue({ choices: [] });
    expect(await new OpenAIExchangeChannel(openAIConfig).exchange("Classify", new AbortController().signal)).toBeNull();
  });
});
