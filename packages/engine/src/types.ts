import { z } from "zod";

// ── Raw inputs ───────────────────────────────────────────────────

export interface RawExample {
  tokens: number[];
}

export interface Decoder {
  decode(tokens: readonly number[]): string;
}

/**
 * Everything the scorer needs for one feature. Activating examples are
 * grouped by quantile bucket, lowest bucket first.
 */
export interface ScoringRequest {
  explanation: string;
  activatingExamples: RawExample[][];
  randomExamples: RawExample[];
}

// ── Scored output ────────────────────────────────────────────────

/** -1 marks a random (non-activating) example; 1..K an activation quantile. */
export type Quantile = number;

export const RANDOM_QUANTILE: Quantile = -1;

export interface ScoreRecord {
  text: string;
  quantile: Quantile;
  ground_truth: boolean;
  predicted: boolean | null; // null when the judge's answer could not be parsed
  error?: string;
}

// ── Judge output ─────────────────────────────────────────────────

export type ParsedJudgment =
  | { kind: "structured"; predictions: boolean[] }
  | { kind: "single"; predicted: boolean };

export interface BinaryFieldSchema {
  type: "integer";
  enum: [0, 1];
}

export interface JudgmentSchema {
  title: string;
  type: "object";
  properties: Record<string, BinaryFieldSchema>;
  required: string[];
  additionalProperties: false;
}

// ── Scorer contract ──────────────────────────────────────────────

export type ProgressCallback = (stage: string, detail: string) => void;

export interface Scorer {
  readonly name: string;
  score(request: ScoringRequest): Promise<ScoreRecord[]>;
}

// ── Zod Schemas (runtime validation of job files) ────────────────

export const RawExampleSchema = z.object({
  tokens: z.array(z.number().int().nonnegative()),
});

export const ScoringRequestSchema = z.object({
  explanation: z.string(),
  activatingExamples: z.array(z.array(RawExampleSchema)),
  randomExamples: z.array(RawExampleSchema),
});

export const ScoringJobSchema = z.object({
  // also used as the output file name
  feature: z.string().regex(/^[\w.-]+$/, "use letters, digits, _ . or -").refine(
    (name) => name !== "." && name !== "..",
    "not a file name"
  ),
  request: ScoringRequestSchema,
});

export const ScoringJobFileSchema = z.array(ScoringJobSchema);

export type ScoringJob = z.infer<typeof ScoringJobSchema>;
