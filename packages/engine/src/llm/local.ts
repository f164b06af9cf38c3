import type { LLMClient, LLMRequest, LLMResponse } from "./index.js";
import { readChatCompletion } from "./chat.js";

/**
 * Adapter for a self-hosted, OpenAI-compatible inference server such as
 * vLLM. Structured output goes through vLLM's `guided_json` extension,
 * which constrains decoding to the schema instead of asking nicely.
 */
export class LocalClient implements LLMClient {
  private baseUrl: string;
  private defaultModel: string;

  constructor(baseUrl?: string) {
    this.baseUrl =
      baseUrl ||
      process.env.LOCAL_LLM_URL ||
      "http://127.0.0.1:8000/v1/chat/completions";
    this.defaultModel =
      process.env.LOCAL_LLM_MODEL || "meta-llama/Meta-Llama-3-70B-Instruct";
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.defaultModel;

    const body: Record<string, unknown> = {
      model,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt },
      ],
      max_tokens: request.maxTokens || 300,
      temperature: request.temperature ?? 0,
    };

    if (request.schema) {
      body.guided_json = request.schema;
    }

    const response = await fetch(this.baseUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

    return readChatCompletion(response, "Local LLM", model);
  }
}
