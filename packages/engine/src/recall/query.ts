import type { ParsedJudgment, ProgressCallback, ScoreRecord } from "../types.js";
import type { LLMClient } from "../llm/index.js";
import { MalformedResponseError } from "../errors.js";
import type { Batch } from "./samples.js";
import { buildRecallPrompt } from "./prompts.js";
import { createJudgmentValidator, createResponseSchema } from "./schema.js";

export interface QueryOptions {
  client: LLMClient;
  maxTokens: number;
  temperature: number;
  model?: string;
  echo?: boolean;
  onProgress?: ProgressCallback;
}

/**
 * Reads a batched answer: a JSON object with one 0/1 (or boolean) field
 * per example position.
 */
export function parseStructuredJudgment(
  content: string,
  n: number
): ParsedJudgment {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new MalformedResponseError("response is not valid JSON", content);
  }

  const result = createJudgmentValidator(n).safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues
      .map((issue) => issue.path.join(".") || "(root)")
      .join(", ");
    throw new MalformedResponseError(`invalid or missing fields: ${fields}`, content);
  }

  const predictions: boolean[] = [];
  for (let i = 0; i < n; i++) {
    const indicator = result.data[`example_${i}`];
    predictions.push(indicator === 1 || indicator === true);
  }
  return { kind: "structured", predictions };
}

/**
 * Reads a single-example answer from the last character of the reply.
 * Trailing whitespace is ignored; anything other than 0 or 1 there is
 * treated as unreadable rather than as a negative.
 */
export function parseSingleJudgment(content: string): ParsedJudgment {
  const last = content.trimEnd().slice(-1);
  if (last !== "0" && last !== "1") {
    throw new MalformedResponseError(
      `expected the reply to end in 0 or 1, found ${last ? `"${last}"` : "an empty reply"}`,
      content
    );
  }
  return { kind: "single", predicted: last === "1" };
}

/**
 * Sends one batch to the judge and writes each sample's prediction.
 *
 * Batches of two or more go out with a response schema and are parsed as
 * JSON; a batch of one is asked for a plain answer. Samples are only
 * written after the whole reply has parsed, so a malformed reply leaves
 * every sample of the batch unjudged.
 */
export async function queryBatch(
  batch: Batch,
  explanation: string,
  options: QueryOptions
): Promise<Batch> {
  const prompt = buildRecallPrompt(batch, explanation);

  if (options.echo) {
    options.onProgress?.("echo", `${prompt.systemPrompt}\n\n${prompt.userPrompt}`);
  }

  const response = await options.client.call({
    systemPrompt: prompt.systemPrompt,
    userPrompt: prompt.userPrompt,
    model: options.model,
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    schema: prompt.batched ? createResponseSchema(batch.length) : undefined,
  });

  if (options.echo) {
    options.onProgress?.("echo", `Response (${response.model}): ${response.content}`);
  }

  const judgment = prompt.batched
    ? parseStructuredJudgment(response.content, batch.length)
    : parseSingleJudgment(response.content);

  applyJudgment(batch, judgment);
  return batch;
}

export function applyJudgment(batch: Batch, judgment: ParsedJudgment): void {
  switch (judgment.kind) {
    case "structured":
      batch.forEach((sample, i) => {
        const predicted = judgment.predictions[i];
        if (predicted === undefined) {
          throw new MalformedResponseError(
            `no prediction for example_${i}`,
            JSON.stringify(judgment.predictions)
          );
        }
        sample.setPredicted(predicted);
      });
      return;
    case "single": {
      const [sample] = batch;
      if (sample) {
        sample.setPredicted(judgment.predicted);
      }
      return;
    }
  }
}

/**
 * Queries every batch at once and waits for all of them.
 *
 * A malformed reply only affects its own batch: those samples come back
 * with `predicted: null` and the parse error. Any other failure (HTTP
 * errors, missing keys) rejects the whole call. Records are returned in
 * assembly order whatever order the replies arrive in.
 */
export async function processBatches(
  batches: Batch[],
  explanation: string,
  options: QueryOptions
): Promise<ScoreRecord[]> {
  const results = await Promise.all(
    batches.map(async (batch, index) => {
      try {
        await queryBatch(batch, explanation, options);
        return batch.map((sample) => sample.toRecord());
      } catch (error) {
        if (!(error instanceof MalformedResponseError)) {
          throw error;
        }
        options.onProgress?.(
          "malformed",
          `Batch ${index} (${batch.length} samples): ${error.message}`
        );
        return batch.map((sample) => sample.toRecord(error.message));
      }
    })
  );

  return results.flat();
}
