export * from "./types.js";
export * from "./errors.js";
export { loadScorerConfig } from "./config.js";
export type { ScorerSettings } from "./config.js";
export { VocabularyDecoder } from "./decoder/index.js";
export {
  createLLMClient,
  OpenAIClient,
  AnthropicClient,
  LocalClient,
  MockLLMClient,
} from "./llm/index.js";
export type { LLMClient, LLMProvider, LLMRequest, LLMResponse } from "./llm/index.js";
export { RecallScorer } from "./recall/index.js";
export type { RecallScorerConfig } from "./recall/index.js";
export { Sample, assembleBatches, prepareSamples } from "./recall/samples.js";
export type { Batch } from "./recall/samples.js";
export { buildRecallPrompt, formatExamples } from "./recall/prompts.js";
export { createResponseSchema, createJudgmentValidator } from "./recall/schema.js";
export {
  processBatches,
  queryBatch,
  parseSingleJudgment,
  parseStructuredJudgment,
} from "./recall/query.js";
export { runScoring } from "./pipeline/index.js";
export type { FeatureScore, FeatureFailure, RunConfig, RunResult } from "./pipeline/index.js";
