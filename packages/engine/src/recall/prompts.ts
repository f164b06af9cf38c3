import type { Sample } from "./samples.js";

export interface RecallPrompt {
  systemPrompt: string;
  userPrompt: string;
  batched: boolean;
}

/**
 * Renders each sample as `Example {i}: {text}`, where i is the sample's
 * position inside this batch. The response schema for the same batch
 * numbers its fields with the same positions.
 */
export function formatExamples(batch: readonly Sample[]): string {
  return batch
    .map((sample, i) => `Example ${i}: ${sample.text}`)
    .join("\n");
}

/**
 * Single-example variant. The judge may reason first, but the answer
 * is read from the last character of the reply, so the instructions
 * insist on a bare 1 or 0 at the very end.
 */
export function buildSingleSystemPrompt(): string {
  return `You are an impartial evaluator of explanations for neurons in a language model. Each neuron looks for some particular thing in a short document. You will be given an explanation of what the neuron looks for, and one text example.

YOUR TASK:
Decide whether the neuron would activate on the example, based only on the explanation.

RESPONSE RULES:
- You may think briefly about the example first.
- The LAST character of your response must be the answer: 1 if the neuron activates on the example, 0 if it does not.
- Do not put any punctuation, whitespace or other text after the final 1 or 0.`;
}

/**
 * Batched variant. The backend is also handed a JSON schema with one
 * `example_{i}` field per rendered example.
 */
export function buildBatchedSystemPrompt(): string {
  return `You are an impartial evaluator of explanations for neurons in a language model. Each neuron looks for some particular thing in a short document. You will be given an explanation of what the neuron looks for, and a numbered list of text examples.

YOUR TASK:
For every example, decide independently whether the neuron would activate on it, based only on the explanation.

OUTPUT FORMAT:
Respond with a single JSON object with one key per example:
{
  "example_0": <1 if the neuron activates on Example 0, otherwise 0>,
  "example_1": <1 or 0>,
  ...
}

IMPORTANT: Use the example indices exactly as they are written in the list. Every example must have a key. Return ONLY valid JSON. No markdown, no explanation, no preamble.`;
}

export function buildRecallUserPrompt(
  explanation: string,
  examples: string
): string {
  return `NEURON EXPLANATION:
${explanation}

EXAMPLES:
${examples}`;
}

export function buildRecallPrompt(
  batch: readonly Sample[],
  explanation: string
): RecallPrompt {
  const batched = batch.length > 1;

  return {
    systemPrompt: batched
      ? buildBatchedSystemPrompt()
      : buildSingleSystemPrompt(),
    userPrompt: buildRecallUserPrompt(explanation, formatExamples(batch)),
    batched,
  };
}
