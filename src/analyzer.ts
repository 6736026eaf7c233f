// Import only the types we need (not the entire types.ts file)
import type { GradeBand, RosterReport, StudentRecord } from "./types.ts";
import { EmptyRosterError } from "./errors.ts";
import { classify } from "./grades.ts";

/**
 * Calculate the average (mean) of an array of numbers
 * Example: average([90, 40]) = 65
 */
function average(values: number[]): number {
  // Edge case: empty array would cause division by zero
  if (values.length === 0) return 0;

  const sum = values.reduce((acc, value) => acc + value, 0);

  // Math.round(...* 100) / 100 rounds to 2 decimal places
  // Example: 85.666666 becomes 85.67
  return Math.round((sum / values.length) * 100) / 100;
}

/**
 * Count how many records fall into each grade band.
 * Every band gets a key, so a band nobody landed in reads 0.
 */
export function countGrades(records: readonly StudentRecord[]): Record<GradeBand, number> {
  const counts: Record<GradeBand, number> = {
    "Fail": 0,
    "Third Class": 0,
    "Second Class": 0,
    "First Class": 0,
    "Distinction": 0,
  };
  for (const record of records) {
    counts[classify(record.marks)] += 1;
  }
  return counts;
}

/**
 * Summarize the whole roster: size, average, extremes, grade distribution
 * and the student(s) with the highest marks.
 *
 * Throws EmptyRosterError when there is nothing to summarize.
 */
export function buildReport(records: readonly StudentRecord[]): RosterReport {
  if (records.length === 0) {
    throw new EmptyRosterError();
  }

  const marks = records.map((record) => record.marks);
  const max = Math.max(...marks);
  const min = Math.min(...marks);

  // Ties are all top performers; list them by roll number
  const topPerformers = records
    .filter((record) => record.marks === max)
    .map((record) => ({ ...record }))
    .sort((a, b) => a.rollNo - b.rollNo);

  return {
    total: records.length,
    mean: average(marks),
    max,
    min,
    gradeCounts: countGrades(records),
    topPerformers,
  };
}
