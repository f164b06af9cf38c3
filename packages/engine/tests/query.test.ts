import { describe, it, expect } from "vitest";
import {
  parseSingleJudgment,
  parseStructuredJudgment,
  processBatches,
  queryBatch,
} from "../src/recall/query.js";
import { Sample, assembleBatches } from "../src/recall/samples.js";
import { MockLLMClient } from "../src/llm/mock.js";
import { MalformedResponseError } from "../src/errors.js";
import type { QueryOptions } from "../src/recall/query.js";
import { examples, wordDecoder } from "./helpers.js";

/**
 * Tests for the query dispatcher: both answer formats, the malformed
 * reply path, backend failures and order-preserving joins.
 */

function options(client: MockLLMClient, extra: Partial<QueryOptions> = {}): QueryOptions {
  return { client, maxTokens: 300, temperature: 0, ...extra };
}

describe("parseStructuredJudgment", () => {
  it("maps 1 and true to positive predictions", () => {
    expect(
      parseStructuredJudgment('{"example_0":0,"example_1":1,"example_2":true}', 3)
    ).toEqual({ kind: "structured", predictions: [false, true, true] });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseStructuredJudgment("yes, all of them", 2)).toThrow(
      "Malformed judge response: response is not valid JSON"
    );
  });

  it("names the missing field", () => {
    expect(() => parseStructuredJudgment('{"example_0":1,"example_2":0}', 3)).toThrow(
      "Malformed judge response: invalid or missing fields: example_1"
    );
  });
});

describe("parseSingleJudgment", () => {
  it("reads the last character", () => {
    expect(parseSingleJudgment("The neuron fires here: 1")).toEqual({
      kind: "single",
      predicted: true,
    });
    expect(parseSingleJudgment("0")).toEqual({ kind: "single", predicted: false });
  });

  it("ignores trailing whitespace", () => {
    expect(parseSingleJudgment("Answer: 1\n  ")).toEqual({ kind: "single", predicted: true });
  });

  it("rejects replies that do not end in 0 or 1", () => {
    expect(() => parseSingleJudgment("Answer: 1.")).toThrow(
      'Malformed judge response: expected the reply to end in 0 or 1, found "."'
    );
    expect(() => parseSingleJudgment("   ")).toThrow(
      "Malformed judge response: expected the reply to end in 0 or 1, found an empty reply"
    );
  });
});

describe("queryBatch", () => {
  it("sends a single example as free text and reads the trailing 1", async () => {
    const client = new MockLLMClient({ respond: () => "It matches the explanation. 1" });
    const batch = [new Sample("Paris is lovely", 1)];

    await queryBatch(batch, "capital cities", options(client, { model: "judge-x" }));

    expect(batch[0]?.predicted).toBe(true);
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.schema).toBeUndefined();
    expect(client.requests[0]?.model).toBe("judge-x");
    expect(client.requests[0]?.maxTokens).toBe(300);
    expect(client.requests[0]?.temperature).toBe(0);
  });

  it("sends a batch with a schema and maps fields by position", async () => {
    const client = new MockLLMClient({
      respond: () => JSON.stringify({ example_0: 0, example_1: 1, example_2: 1 }),
    });
    const batch = [new Sample("a", -1), new Sample("b", 1), new Sample("c", 2)];

    await queryBatch(batch, "anything", options(client));

    expect(batch.map((s) => s.predicted)).toEqual([false, true, true]);
    expect(client.requests[0]?.schema?.required).toEqual([
      "example_0",
      "example_1",
      "example_2",
    ]);
  });

  it("leaves the whole batch unjudged when a field is missing", async () => {
    const client = new MockLLMClient({
      respond: () => JSON.stringify({ example_0: 1, example_2: 1 }),
    });
    const batch = [new Sample("a", -1), new Sample("b", 1), new Sample("c", 2)];

    await expect(queryBatch(batch, "e", options(client))).rejects.toBeInstanceOf(
      MalformedResponseError
    );
    expect(batch.map((s) => s.predicted)).toEqual([undefined, undefined, undefined]);
  });

  it("reports prompts and replies when echo is on", async () => {
    const stages: string[] = [];
    const client = new MockLLMClient({ respond: () => "0" });

    await queryBatch([new Sample("a", -1)], "e", options(client, {
      echo: true,
      onProgress: (stage) => stages.push(stage),
    }));

    expect(stages).toEqual(["echo", "echo"]);
  });
});

describe("processBatches", () => {
  it("flattens results in assembly order whatever order replies arrive", async () => {
    // Earlier batches answer later
    const client = new MockLLMClient({
      latencyMs: (_request, callIndex) => 30 - callIndex * 10,
    });
    const batches = assembleBatches([examples(10, 11, 12)], examples(1, 2), 2, wordDecoder);
    const expected = batches.flat().map((s) => s.text);

    const records = await processBatches(batches, "w10 w11 w12", options(client));

    expect(records.map((r) => r.text)).toEqual(expected);
    expect(client.requests).toHaveLength(3);
  });

  it("returns, per batch boundary, exactly what each batch was judged", async () => {
    const answers = [
      '{"example_0":1,"example_1":0}',
      '{"example_0":0,"example_1":1}',
      "final answer 1",
    ];
    const client = new MockLLMClient({
      respond: (request) => {
        // route by content so the answer follows the batch, not the call order
        if (request.userPrompt.includes("Example 0: w1\n")) return answers[0] ?? "";
        if (request.userPrompt.includes("Example 0: w10\n")) return answers[1] ?? "";
        return answers[2] ?? "";
      },
      latencyMs: (_request, callIndex) => (callIndex === 0 ? 20 : 0),
    });
    const batches = assembleBatches([examples(10, 11, 12)], examples(1, 2), 2, wordDecoder);

    const records = await processBatches(batches, "e", options(client));

    expect(records.slice(0, 2).map((r) => r.predicted)).toEqual([true, false]);
    expect(records.slice(2, 4).map((r) => r.predicted)).toEqual([false, true]);
    expect(records.slice(4).map((r) => r.predicted)).toEqual([true]);
    expect(records.map((r) => r.quantile)).toEqual([-1, -1, 1, 1, 1]);
  });

  it("marks only the malformed batch as unjudged", async () => {
    const malformed: string[] = [];
    const client = new MockLLMClient({
      respond: (request) =>
        request.userPrompt.includes("Example 0: w1\n")
          ? '{"example_0":1}'
          : '{"example_0":1,"example_1":1}',
    });
    const batches = assembleBatches([examples(10, 11)], examples(1, 2), 2, wordDecoder);

    const records = await processBatches(batches, "e", options(client, {
      onProgress: (stage, detail) => {
        if (stage === "malformed") malformed.push(detail);
      },
    }));

    expect(records[0]).toEqual({
      text: "w1",
      quantile: -1,
      ground_truth: false,
      predicted: null,
      error: "Malformed judge response: invalid or missing fields: example_1",
    });
    expect(records[1]?.predicted).toBeNull();
    expect(records.slice(2).map((r) => r.predicted)).toEqual([true, true]);
    expect(records[2]?.error).toBeUndefined();
    expect(malformed).toEqual([
      "Batch 0 (2 samples): Malformed judge response: invalid or missing fields: example_1",
    ]);
  });

  it("fails the whole call when the backend fails", async () => {
    const client = new MockLLMClient({
      respond: (_request, callIndex) => {
        if (callIndex === 1) {
          throw new Error("OpenAI API error 503: overloaded");
        }
        return '{"example_0":1,"example_1":1}';
      },
    });
    const batches = assembleBatches([examples(10, 11)], examples(1, 2), 2, wordDecoder);

    await expect(processBatches(batches, "e", options(client))).rejects.toThrow(
      "OpenAI API error 503: overloaded"
    );
  });

  it("makes no requests for an empty batch list", async () => {
    const client = new MockLLMClient();
    expect(await processBatches([], "e", options(client))).toEqual([]);
    expect(client.requests).toHaveLength(0);
  });
});
