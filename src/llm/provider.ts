import OpenAI from "openai";
import type { MemoryConfig, SummaryLlmParams } from "../config.js";
import { withRetry } from "./retry.js";

// ── LLM Provider — OpenAI-compatible chat completions ────
// OpenRouter by default; any OpenAI-compatible base URL works.

export interface ChatResult {
  completionText: string;
  role: string;
}

export interface LlmProvider {
  chat(
    prompt: string,
    systemContext: string,
    params?: SummaryLlmParams,
  ): Promise<ChatResult>;
}

export class OpenAIChatProvider implements LlmProvider {
  private readonly client: OpenAI;

  constructor(
    private readonly options: MemoryConfig["llm"],
    client?: OpenAI,
  ) {
    this.client =
      client ??
      new OpenAI({
        baseURL: options.baseUrl,
        apiKey: options.apiKey,
        defaultHeaders: { "X-Title": "long-memory" },
      });
  }

  async chat(
    prompt: string,
    systemContext: string,
    params: SummaryLlmParams = {},
  ): Promise<ChatResult> {
    const { model, ...rest } = params;
    // Raw post: extra model parameters go into the body as configured
    const body: Record<string, unknown> = {
      ...rest,
      model: model ?? this.options.model,
      messages: [
        { role: "system", content: systemContext },
        { role: "user", content: prompt },
      ],
    };
    const response = await withRetry(
      () =>
        this.client.post<Record<string, unknown>, OpenAI.Chat.ChatCompletion>(
          "/chat/completions",
          { body },
        ),
      { label: "summary" },
    );

    const message = response.choices[0]?.message;
    return {
      completionText: message?.content ?? "",
      role: message?.role ?? "assistant",
    };
  }
}
