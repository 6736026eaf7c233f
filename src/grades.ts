import type { GradeBand } from "./types.ts";

// Bands in ascending order. Each bin is [lower, upper): lower bound included,
// upper bound excluded. The last upper bound is 101 so that 100 is a Distinction.
const BINS: ReadonlyArray<{ band: GradeBand; lower: number; upper: number }> = [
  { band: "Fail", lower: 0, upper: 35 },
  { band: "Third Class", lower: 35, upper: 50 },
  { band: "Second Class", lower: 50, upper: 60 },
  { band: "First Class", lower: 60, upper: 75 },
  { band: "Distinction", lower: 75, upper: 101 },
];

// Band labels from lowest to highest; reports list their counts in this order
export const GRADE_BANDS: readonly GradeBand[] = BINS.map((bin) => bin.band);

/**
 * Map a marks value to its grade band.
 *
 * Total: anything that does not land in a bin (negative, above 100, NaN,
 * not a number at all) is a Fail.
 */
export function classify(marks: number): GradeBand {
  if (!Number.isFinite(marks)) return "Fail";
  const bin = BINS.find((candidate) => marks >= candidate.lower && marks < candidate.upper);
  return bin ? bin.band : "Fail";
}
