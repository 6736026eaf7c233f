// This file defines the "shape" of all data structures used throughout the app
// Every other module imports its types from here

// GradeBand is a "string literal union type"
// A marks value always maps to exactly one of these labels (see grades.ts)
export type GradeBand =
  | "Fail"
  | "Third Class"
  | "Second Class"
  | "First Class"
  | "Distinction";

// StudentRecord is the core data structure for a single row of the roster
export interface StudentRecord {
  rollNo: number;   // Unique, non-negative integer, e.g., 12
  name: string;     // Non-empty, already trimmed, e.g., "Alice Moreno"
  marks: number;    // Integer between 0 and 100 (inclusive)
}

// Fields an operator is allowed to change after a record exists
// The roll number is the identity of a record, so it is never updatable
export type UpdatableField = "name" | "marks";

// RosterReport is CALCULATED from the roster (see analyzer.ts)
// Nothing in here is ever written back to the spreadsheet
export interface RosterReport {
  total: number;                           // Number of students
  mean: number;                            // Average marks, rounded to 2 decimals
  max: number;                             // Highest marks
  min: number;                             // Lowest marks
  gradeCounts: Record<GradeBand, number>;  // Every band is present, zero included
  topPerformers: StudentRecord[];          // All records scoring `max` (ties included)
}

// LogLevel controls what gets logged to the console
export type LogLevel = "debug" | "info" | "warn" | "error";
// debug = everything (very verbose)
// info = normal operations (loads, saves)
// warn = concerning but not fatal (save failures, skipped rows)
// error = failures that need attention

// AppConfig holds all application configuration
// Loaded from environment variables at startup (see config.ts)
export interface AppConfig {
  rosterFile: string;   // Path to the workbook, e.g., "students.xlsx"
  rosterSheet: string;  // Sheet holding the roster, e.g., "Roster"
  logLevel: LogLevel;   // Controls verbosity of logs
}
