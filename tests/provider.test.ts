import { describe, it, expect, vi } from "vitest";
import OpenAI from "openai";
import { OpenAIChatProvider } from "../src/llm/provider.js";
import { testConfig } from "./helpers/fakes.js";

const completion = {
  id: "cmpl-1",
  object: "chat.completion",
  created: 0,
  model: "test-model",
  choices: [
    {
      index: 0,
      finish_reason: "stop",
      logprobs: null,
      message: { role: "assistant", content: "the summary", refusal: null },
    },
  ],
};

function providerWithSpy() {
  const client = new OpenAI({ apiKey: "test-secret", baseURL: "http://localhost:1" });
  const post = vi.spyOn(client, "post").mockResolvedValue(completion);
  const config = testConfig({
    SUMMARY_LLM_PARAMS: '{"temperature":0.1,"response_format":{"type":"json_object"}}',
  });
  return { provider: new OpenAIChatProvider(config.llm, client), post, config };
}

describe("OpenAIChatProvider", () => {
  it("forwards configured model parameters verbatim", async () => {
    const { provider, post, config } = providerWithSpy();

    const result = await provider.chat("user: hi", "Summarize", config.summaryLlmParams);

    expect(result).toEqual({ completionText: "the summary", role: "assistant" });
    expect(post).toHaveBeenCalledWith("/chat/completions", {
      body: {
        temperature: 0.1,
        response_format: { type: "json_object" },
        model: config.llm.model,
        messages: [
          { role: "system", content: "Summarize" },
          { role: "user", content: "user: hi" },
        ],
      },
    });
  });

  it("lets the params override the configured model", async () => {
    const { provider, post } = providerWithSpy();
    await provider.chat("p", "s", { model: "other/model" });
    expect(post).toHaveBeenCalledWith(
      "/chat/completions",
      expect.objectContaining({ body: expect.objectContaining({ model: "other/model" }) }),
    );
  });
});
