import type { Decoder, Quantile, RawExample, ScoreRecord } from "../types.js";
import { RANDOM_QUANTILE } from "../types.js";
import { SampleStateError } from "../errors.js";

/**
 * One held-out text shown to the judge.
 *
 * Ground truth is fixed by the quantile at construction. The prediction
 * slot starts empty and accepts exactly one write, made by the query
 * dispatcher once the judge's answer for the containing batch is parsed.
 */
export class Sample {
  readonly text: string;
  readonly quantile: Quantile;
  readonly groundTruth: boolean;
  private judgment: boolean | undefined;

  constructor(text: string, quantile: Quantile) {
    this.text = text;
    this.quantile = quantile;
    this.groundTruth = quantile !== RANDOM_QUANTILE;
  }

  get predicted(): boolean | undefined {
    return this.judgment;
  }

  setPredicted(value: boolean): void {
    if (this.judgment !== undefined) {
      throw new SampleStateError(
        `Sample already judged (quantile ${this.quantile}): ${this.text.slice(0, 80)}`
      );
    }
    this.judgment = value;
  }

  toRecord(error?: string): ScoreRecord {
    const record: ScoreRecord = {
      text: this.text,
      quantile: this.quantile,
      ground_truth: this.groundTruth,
      predicted: this.judgment ?? null,
    };
    if (error !== undefined) {
      record.error = error;
    }
    return record;
  }
}

export type Batch = Sample[];

export function prepareSamples(
  examples: readonly RawExample[],
  quantile: Quantile,
  decoder: Decoder
): Sample[] {
  return examples.map(
    (example) => new Sample(decoder.decode(example.tokens), quantile)
  );
}

/**
 * Turns the two example pools into batches of at most `batchSize`.
 *
 * Random examples come first (quantile -1), then each activating group
 * in order, group i getting quantile i + 1. Concatenating the returned
 * batches gives back exactly that order.
 */
export function assembleBatches(
  activatingExamples: readonly RawExample[][],
  randomExamples: readonly RawExample[],
  batchSize: number,
  decoder: Decoder
): Batch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const samples = prepareSamples(randomExamples, RANDOM_QUANTILE, decoder);
  activatingExamples.forEach((group, i) => {
    samples.push(...prepareSamples(group, i + 1, decoder));
  });

  const batches: Batch[] = [];
  for (let i = 0; i < samples.length; i += batchSize) {
    batches.push(samples.slice(i, i + batchSize));
  }
  return batches;
}
