import { z } from "zod";
import type { JudgmentSchema } from "../types.js";

export function exampleField(index: number): string {
  return `example_${index}`;
}

function assertBatchedSize(n: number): void {
  if (!Number.isInteger(n) || n < 2) {
    throw new RangeError(
      `A structured judgment needs at least 2 examples, got ${n}`
    );
  }
}

/**
 * JSON schema the backend is asked to follow for a batch of `n` examples:
 * one required 0/1 field per position, named like the prompt numbers them.
 */
export function createResponseSchema(n: number): JudgmentSchema {
  assertBatchedSize(n);

  const properties: JudgmentSchema["properties"] = {};
  const required: string[] = [];
  for (let i = 0; i < n; i++) {
    const field = exampleField(i);
    properties[field] = { type: "integer", enum: [0, 1] };
    required.push(field);
  }

  return {
    title: `RecallJudgment${n}`,
    type: "object",
    properties,
    required,
    additionalProperties: false,
  };
}

// Local servers sometimes emit true/false even when asked for integers
export const BinaryIndicatorSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.boolean(),
]);

export function createJudgmentValidator(n: number) {
  assertBatchedSize(n);

  const shape: Record<string, typeof BinaryIndicatorSchema> = {};
  for (let i = 0; i < n; i++) {
    shape[exampleField(i)] = BinaryIndicatorSchema;
  }
  return z.object(shape);
}
