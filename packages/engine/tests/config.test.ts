import { describe, it, expect } from "vitest";
import { loadScorerConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadScorerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadScorerConfig({})).toEqual({
      provider: "openai",
      model: undefined,
      temperature: 0,
      maxTokens: 300,
      batchSize: 10,
      echo: false,
    });
  });

  it("reads every setting from the environment", () => {
    expect(
      loadScorerConfig({
        LLM_PROVIDER: "local",
        JUDGE_MODEL: "llama-3-70b",
        SCORER_TEMPERATURE: "0.5",
        SCORER_MAX_TOKENS: "64",
        SCORER_BATCH_SIZE: "1",
        SCORER_ECHO: "true",
      })
    ).toEqual({
      provider: "local",
      model: "llama-3-70b",
      temperature: 0.5,
      maxTokens: 64,
      batchSize: 1,
      echo: true,
    });
  });

  it("switches to the mock judge with USE_MOCKS", () => {
    expect(loadScorerConfig({ USE_MOCKS: "true", LLM_PROVIDER: "anthropic" }).provider).toBe(
      "mock"
    );
  });

  it("treats empty values as unset", () => {
    expect(loadScorerConfig({ JUDGE_MODEL: "", SCORER_BATCH_SIZE: "" }).batchSize).toBe(10);
  });

  it("lists every invalid setting", () => {
    try {
      loadScorerConfig({ SCORER_BATCH_SIZE: "0", LLM_PROVIDER: "cohere" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map((issue) => issue.split(":")[0]).sort()).toEqual([
        "LLM_PROVIDER",
        "SCORER_BATCH_SIZE",
      ]);
    }
  });
});
