import { describe, it, expect } from "vitest";
import { ScoringJobSchema } from "../src/types.js";

/**
 * Feature names double as output file names, so the job schema only
 * accepts names that stay inside the output directory.
 */

function jobNamed(feature: string) {
  return {
    feature,
    request: { explanation: "e", activatingExamples: [], randomExamples: [] },
  };
}

describe("ScoringJobSchema", () => {
  it("accepts plain feature names", () => {
    for (const name of ["layer0_feature7", "resid.6-1024", "f"]) {
      expect(ScoringJobSchema.safeParse(jobNamed(name)).success).toBe(true);
    }
  });

  it("rejects names that are paths or empty", () => {
    for (const name of ["layer0/feature7", "../x", "..", ".", "a\\b", ""]) {
      expect(ScoringJobSchema.safeParse(jobNamed(name)).success).toBe(false);
    }
  });
});
