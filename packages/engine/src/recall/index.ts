import type {
  Decoder,
  ProgressCallback,
  Scorer,
  ScoreRecord,
  ScoringRequest,
} from "../types.js";
import type { LLMClient } from "../llm/index.js";
import { assembleBatches } from "./samples.js";
import { processBatches } from "./query.js";

/**
 * Configuration for the recall scorer, fixed for the scorer's lifetime.
 */
export interface RecallScorerConfig {
  /** Backend the judge prompts are sent to (shared by all batches) */
  client: LLMClient;

  /** Turns raw token sequences into the text shown to the judge */
  decoder: Decoder;

  temperature?: number;
  maxTokens?: number;

  /** Samples per judge request; 1 forces single-example prompts */
  batchSize?: number;

  /** Model override passed through to the client */
  model?: string;

  /** Report every prompt and raw reply through onProgress("echo", …) */
  echo?: boolean;

  onProgress?: ProgressCallback;
}

/**
 * Scores an explanation by asking a judge model, for each held-out
 * example, whether the feature would fire on it.
 *
 * 1. Assemble samples: random examples (quantile -1, ground truth false),
 *    then every activating quantile group (quantile i + 1, ground truth true)
 * 2. Split them into batches of `batchSize`
 * 3. Query every batch concurrently and join
 * 4. Return one plain record per sample, in assembly order
 *
 * Recall-style metrics are computed by the caller from `ground_truth`
 * and `predicted`.
 */
export class RecallScorer implements Scorer {
  readonly name = "recall";

  private client: LLMClient;
  private decoder: Decoder;
  private temperature: number;
  private maxTokens: number;
  private batchSize: number;
  private model?: string;
  private echo: boolean;
  private onProgress?: ProgressCallback;

  constructor(config: RecallScorerConfig) {
    const batchSize = config.batchSize ?? 10;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    this.client = config.client;
    this.decoder = config.decoder;
    this.temperature = config.temperature ?? 0;
    this.maxTokens = config.maxTokens ?? 300;
    this.batchSize = batchSize;
    this.model = config.model;
    this.echo = config.echo ?? false;
    this.onProgress = config.onProgress;
  }

  async score(request: ScoringRequest): Promise<ScoreRecord[]> {
    const batches = assembleBatches(
      request.activatingExamples,
      request.randomExamples,
      this.batchSize,
      this.decoder
    );

    if (batches.length === 0) {
      return [];
    }

    this.onProgress?.(
      "recall",
      `Querying ${batches.length} batch(es) of up to ${this.batchSize} samples...`
    );

    const records = await processBatches(batches, request.explanation, {
      client: this.client,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      model: this.model,
      echo: this.echo,
      onProgress: this.onProgress,
    });

    const unjudged = records.filter((r) => r.predicted === null).length;
    this.onProgress?.(
      "recall",
      `Scored ${records.length - unjudged}/${records.length} samples.`
    );

    return records;
  }
}
