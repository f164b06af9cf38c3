import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LLMProvider } from "./llm/index.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

/**
 * Environment variables recognised by the CLI. Everything has a default
 * except the API keys, which the LLM adapters read themselves.
 */
const EnvSchema = z.object({
  USE_MOCKS: booleanFlag.default("false"),
  LLM_PROVIDER: z.enum(["openai", "anthropic", "local", "mock"]).optional(),
  JUDGE_MODEL: z.string().min(1).optional(),
  SCORER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  SCORER_MAX_TOKENS: z.coerce.number().int().positive().default(300),
  SCORER_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  SCORER_ECHO: booleanFlag.default("false"),
});

export interface ScorerSettings {
  provider: LLMProvider;
  model?: string;
  temperature: number;
  maxTokens: number;
  batchSize: number;
  echo: boolean;
}

export function loadScorerConfig(
  env: Record<string, string | undefined> = process.env
): ScorerSettings {
  // Treat empty strings from .env templates as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const parsed = result.data;
  return {
    provider: parsed.USE_MOCKS ? "mock" : parsed.LLM_PROVIDER ?? "openai",
    model: parsed.JUDGE_MODEL,
    temperature: parsed.SCORER_TEMPERATURE,
    maxTokens: parsed.SCORER_MAX_TOKENS,
    batchSize: parsed.SCORER_BATCH_SIZE,
    echo: parsed.SCORER_ECHO,
  };
}
