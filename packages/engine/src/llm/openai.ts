import type { LLMClient, LLMRequest, LLMResponse } from "./index.js";
import { readChatCompletion } from "./chat.js";

export class OpenAIClient implements LLMClient {
  private apiKey: string;
  private baseUrl: string;

  constructor() {
    this.apiKey = process.env.OPENAI_API_KEY || "";
    this.baseUrl = "https://api.openai.com/v1/chat/completions";
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    if (!this.apiKey) {
      throw new Error("OPENAI_API_KEY is not set");
    }

    const model = request.model || "gpt-4o-mini";

    const body: Record<string, unknown> = {
      model,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt },
      ],
      max_tokens: request.maxTokens || 300,
      temperature: request.temperature ?? 0,
    };

    // Structured outputs: strict mode requires every field to be required
    // and no extra keys, which createResponseSchema already guarantees
    if (request.schema) {
      body.response_format = {
        type: "json_schema",
        json_schema: {
          name: request.schema.title,
          schema: request.schema,
          strict: true,
        },
      };
    }

    const response = await fetch(this.baseUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    return readChatCompletion(response, "OpenAI", model);
  }
}
