import { z } from "zod";
import type { LLMClient, LLMRequest, LLMResponse } from "./index.js";

const MessagesResponseSchema = z.object({
  model: z.string().optional(),
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }))
    .default([]),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * Anthropic Claude API adapter.
 *
 * Uses raw fetch() against the Messages API rather than the official SDK.
 *
 * Key Anthropic API specifics:
 * - System prompt is a top-level field, NOT a message role
 * - Requires "anthropic-version" header for API versioning
 * - Response body nests text inside a content[] array of typed blocks
 * - There is no schema-constrained decoding, so a requested schema is
 *   spelled out in the system prompt and the reply is validated afterwards
 */
export class AnthropicClient implements LLMClient {
  private apiKey: string;
  private baseUrl: string;

  constructor() {
    this.apiKey = process.env.ANTHROPIC_API_KEY || "";
    this.baseUrl = "https://api.anthropic.com/v1/messages";
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    if (!this.apiKey) {
      throw new Error("ANTHROPIC_API_KEY is not set");
    }

    const model = request.model || "claude-3-5-haiku-20241022";

    const system = request.schema
      ? `${request.systemPrompt}

The JSON object must validate against this JSON schema:
${JSON.stringify(request.schema)}`
      : request.systemPrompt;

    const response = await fetch(this.baseUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model,
        system,
        messages: [{ role: "user", content: request.userPrompt }],
        max_tokens: request.maxTokens || 300,
        temperature: request.temperature ?? 0,
      }),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(
        `Anthropic API error ${response.status}: ${errorBody}`
      );
    }

    const data = MessagesResponseSchema.parse(await response.json());

    const textBlock = data.content.find((block) => block.type === "text");

    return {
      content: textBlock?.text ?? "",
      model: data.model ?? model,
      tokensUsed:
        (data.usage?.input_tokens ?? 0) + (data.usage?.output_tokens ?? 0),
    };
  }
}
