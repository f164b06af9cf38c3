import type { LLMClient, LLMRequest, LLMResponse } from "./index.js";

/**
 * Mock LLM client for development, demos and tests.
 *
 * By default it plays a crude keyword judge: an example "activates" when
 * it contains any word of four or more letters from the explanation.
 * Batched requests (those carrying a schema) get a JSON object back,
 * single-example requests get a sentence ending in 1 or 0, so both
 * parsing paths of the dispatcher are exercised without an API key.
 *
 * Tests can replace the judge with a `respond` function and add
 * per-request latency to shuffle completion order.
 */

export interface MockLLMOptions {
  respond?: (request: LLMRequest, callIndex: number) => string;
  latencyMs?: number | ((request: LLMRequest, callIndex: number) => number);
}

/**
 * Splits the EXAMPLES section on the `Example {i}: ` markers, expecting
 * them in order 0, 1, 2, … so that an example whose text spans several
 * lines (or itself contains "Example 3: ") stays in one piece.
 */
export function extractExamples(userPrompt: string): string[] {
  const at = userPrompt.indexOf("EXAMPLES:\n");
  const section = at === -1 ? userPrompt : userPrompt.slice(at + "EXAMPLES:\n".length);

  const examples: string[] = [];
  let start = section.startsWith("Example 0: ") ? "Example 0: ".length : -1;
  while (start !== -1) {
    const marker = `\nExample ${examples.length + 1}: `;
    const next = section.indexOf(marker, start);
    if (next === -1) {
      examples.push(section.slice(start));
      start = -1;
    } else {
      examples.push(section.slice(start, next));
      start = next + marker.length;
    }
  }
  return examples;
}

export function extractExplanation(userPrompt: string): string {
  const match = /NEURON EXPLANATION:\n([\s\S]*?)\n\nEXAMPLES:/.exec(userPrompt);
  return match?.[1] ?? "";
}

function keywordJudge(request: LLMRequest): string {
  const keywords = extractExplanation(request.userPrompt)
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length >= 4);

  const verdicts = extractExamples(request.userPrompt).map((text) => {
    const lower = text.toLowerCase();
    return keywords.some((word) => lower.includes(word)) ? 1 : 0;
  });

  if (request.schema) {
    return JSON.stringify(
      Object.fromEntries(verdicts.map((v, i) => [`example_${i}`, v]))
    );
  }
  return `Based on the explanation, my answer is ${verdicts[0] ?? 0}`;
}

export class MockLLMClient implements LLMClient {
  readonly requests: LLMRequest[] = [];
  private options: MockLLMOptions;

  constructor(options: MockLLMOptions = {}) {
    this.options = options;
  }

  async call(request: LLMRequest): Promise<LLMResponse> {
    const callIndex = this.requests.length;
    this.requests.push(request);

    const { latencyMs = 0, respond } = this.options;
    const delay =
      typeof latencyMs === "function"
        ? latencyMs(request, callIndex)
        : latencyMs;
    if (delay > 0) {
      await new Promise((r) => setTimeout(r, delay));
    }

    const content = respond
      ? respond(request, callIndex)
      : keywordJudge(request);

    return {
      content,
      model: "mock-model",
      tokensUsed: 0,
    };
  }
}
