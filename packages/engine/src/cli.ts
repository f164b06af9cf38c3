#!/usr/bin/env node

/**
 * CLI entry point for the explanation scorer.
 *
 * Usage:
 *   USE_MOCKS=true npx tsx src/cli.ts jobs.json --vocab vocab.json
 *   LLM_PROVIDER=local npx tsx src/cli.ts jobs.json --vocab vocab.json --out scores/
 *
 * jobs.json holds an array of { feature, request } objects where each
 * request carries the explanation and the token ids of its activating
 * (grouped by quantile) and random examples. vocab.json is the tokenizer
 * vocabulary as a JSON array of strings, indexed by token id.
 *
 * With --out, one <feature>.json file of score records is written per
 * feature; otherwise a one-line summary per feature is printed.
 */

import "dotenv/config";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { loadScorerConfig } from "./config.js";
import { VocabularyDecoder } from "./decoder/index.js";
import { createLLMClient } from "./llm/index.js";
import { runScoring } from "./pipeline/index.js";
import { RecallScorer } from "./recall/index.js";
import { ScoringJobFileSchema } from "./types.js";
import type { ScoreRecord } from "./types.js";

// ── Parse CLI arguments ──────────────────────────────────────────

function readFlag(args: string[], name: string): string | undefined {
  const at = args.indexOf(name);
  return at === -1 ? undefined : args[at + 1];
}

const args = process.argv.slice(2);
const jobsPath = args[0];
const vocabPath = readFlag(args, "--vocab");
const outDir = readFlag(args, "--out");

function summarize(records: ScoreRecord[]): string {
  const judged = records.filter((r) => r.predicted !== null);
  const hits = judged.filter((r) => r.ground_truth && r.predicted).length;
  const falseAlarms = judged.filter((r) => !r.ground_truth && r.predicted).length;
  return `${judged.length}/${records.length} judged, ${hits} activating detected, ${falseAlarms} false alarms`;
}

async function main(): Promise<number> {
  if (!jobsPath || jobsPath.startsWith("--") || !vocabPath) {
    console.error("Usage: explain-score <jobs.json> --vocab <vocab.json> [--out <dir>]");
    return 1;
  }

  const settings = loadScorerConfig();
  const jobs = ScoringJobFileSchema.parse(
    JSON.parse(await readFile(jobsPath, "utf8"))
  );
  const vocabulary = z
    .array(z.string())
    .parse(JSON.parse(await readFile(vocabPath, "utf8")));

  console.log("=".repeat(70));
  console.log("  EXPLANATION SCORER — recall");
  console.log("=".repeat(70));
  console.log(`Provider: ${settings.provider}${settings.model ? ` (${settings.model})` : ""}`);
  console.log(`Batch size: ${settings.batchSize} | Temperature: ${settings.temperature}`);

  const icons: Record<string, string> = {
    start: "[START]",
    recall: "[RECALL]",
    echo: "[ECHO]",
    malformed: "[MALFORMED]",
    feature: "[FEATURE]",
    error: "[ERROR]",
    complete: "[COMPLETE]",
  };
  const onProgress = (stage: string, detail: string) => {
    const icon = icons[stage] ?? "[...]";
    const line = `${icon} ${detail}`;
    if (stage === "error" || stage === "malformed") {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  const scorer = new RecallScorer({
    client: createLLMClient(settings.provider),
    decoder: new VocabularyDecoder(vocabulary),
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    batchSize: settings.batchSize,
    model: settings.model,
    echo: settings.echo,
    onProgress,
  });

  const { scores, failures } = await runScoring(jobs, { scorer, onProgress });

  if (outDir) {
    await mkdir(outDir, { recursive: true });
  }
  for (const score of scores) {
    if (outDir) {
      const file = path.join(outDir, `${score.feature}.json`);
      await writeFile(file, JSON.stringify(score.records, null, 2));
      console.log(`  wrote ${file}`);
    } else {
      console.log(`  ${score.feature}: ${summarize(score.records)}`);
    }
  }

  if (failures.length > 0) {
    console.error(`\n${failures.length} feature(s) skipped:`);
    for (const failure of failures) {
      console.error(`  ${failure.feature}: ${failure.error}`);
    }
  }

  return scores.length > 0 || jobs.length === 0 ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("\nScoring failed:", error);
    process.exit(1);
  });
