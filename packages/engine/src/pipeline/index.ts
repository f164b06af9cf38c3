import type {
  ProgressCallback,
  Scorer,
  ScoreRecord,
  ScoringJob,
} from "../types.js";

/**
 * Configuration for a scoring run over many features.
 */
export interface RunConfig {
  scorer: Scorer;

  /**
   * Optional progress callback, called once per feature and for every
   * failure. The runner itself never prints; the CLI decides how.
   */
  onProgress?: ProgressCallback;
}

export interface FeatureScore {
  feature: string;
  records: ScoreRecord[];
  durationMs: number;
}

export interface FeatureFailure {
  feature: string;
  error: string;
}

export interface RunResult {
  scores: FeatureScore[];
  failures: FeatureFailure[];
}

/**
 * Scores every job concurrently.
 *
 * A feature whose scoring throws (backend down, bad key, undecodable
 * tokens) is reported under the "error" stage and left out of `scores`;
 * the other features still finish. Scores come back in job order.
 */
export async function runScoring(
  jobs: ScoringJob[],
  config: RunConfig
): Promise<RunResult> {
  config.onProgress?.(
    "start",
    `Scoring ${jobs.length} feature(s) with the ${config.scorer.name} scorer...`
  );

  const settled = await Promise.allSettled(
    jobs.map(async (job): Promise<FeatureScore> => {
      const start = Date.now();
      const records = await config.scorer.score(job.request);
      return { feature: job.feature, records, durationMs: Date.now() - start };
    })
  );

  const scores: FeatureScore[] = [];
  const failures: FeatureFailure[] = [];

  settled.forEach((outcome, i) => {
    const feature = jobs[i]?.feature ?? `#${i}`;
    if (outcome.status === "fulfilled") {
      scores.push(outcome.value);
      config.onProgress?.(
        "feature",
        `${feature}: ${outcome.value.records.length} samples in ${outcome.value.durationMs}ms`
      );
    } else {
      const reason: unknown = outcome.reason;
      const error = reason instanceof Error ? reason.message : String(reason);
      failures.push({ feature, error });
      config.onProgress?.("error", `${feature}: ${error}`);
    }
  });

  config.onProgress?.(
    "complete",
    `${scores.length} scored, ${failures.length} failed`
  );

  return { scores, failures };
}
