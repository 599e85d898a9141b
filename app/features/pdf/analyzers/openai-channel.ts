import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

import type { AnalyzerConfig } from "@/app/lib/config";
import { ANALYSIS_SYSTEM_PROMPT } from "./analysis-prompt";
import type { ExchangeChannel } from "./types";

/**
 * Exchange channel backed by a chat completion (OpenAI, or OpenRouter when
 * USE_OPENROUTER=true). The model's reply is returned as-is and parsed like
 * any pasted reply.
 */
export class OpenAIExchangeChannel implements ExchangeChannel {
  private readonly client: OpenAI;

  constructor(private readonly config: AnalyzerConfig) {
    if (!config.apiKey) {
      throw new Error(
        config.useOpenRouter
          ? "OPENROUTER_API_KEY is required when USE_OPENROUTER=true"
          : "OPENAI_SECRET_KEY is required for the openai analyzer"
      );
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  async exchange(prompt: string, signal: AbortSignal): Promise<string | null> {
    const provider = this.config.useOpenRouter ? "OpenRouter" : "OpenAI";
    console.log(`[openai-channel] Using ${provider} with model:`, this.config.model);

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: [
        { role: "system", content: ANALYSIS_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
    };
    // OpenRouter still expects max_tokens; OpenAI reasoning models reject it
    if (this.config.useOpenRouter) {
      body.max_tokens = this.config.maxTokens;
    } else {
      body.max_completion_tokens = this.config.maxTokens;
    }

    const completion = await this.client.chat.completions.create(body, {
      signal,
    });

    return completion.choices[0]?.message?.content ?? null;
  }
}
