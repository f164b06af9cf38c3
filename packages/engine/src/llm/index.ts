import type { JudgmentSchema } from "../types.js";
import { OpenAIClient } from "./openai.js";
import { AnthropicClient } from "./anthropic.js";
import { LocalClient } from "./local.js";
import { MockLLMClient } from "./mock.js";

export interface LLMRequest {
  systemPrompt: string;
  userPrompt: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** When present, the backend is asked to return JSON matching it */
  schema?: JudgmentSchema;
}

export interface LLMResponse {
  content: string;
  model: string;
  tokensUsed: number;
}

export interface LLMClient {
  call(request: LLMRequest): Promise<LLMResponse>;
}

export type LLMProvider = "openai" | "anthropic" | "local" | "mock";

export { OpenAIClient, AnthropicClient, LocalClient, MockLLMClient };

export function createLLMClient(provider: LLMProvider): LLMClient {
  switch (provider) {
    case "openai":
      return new OpenAIClient();
    case "anthropic":
      return new AnthropicClient();
    case "local":
      return new LocalClient();
    case "mock":
      return new MockLLMClient();
  }
}
