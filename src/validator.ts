// Import types we need for validation
import type { StudentRecord } from "./types.ts";

// ValidationResult is a generic type that represents either success or failure
// This is a "discriminated union" - check the 'ok' field to know which case
export type ValidationResult<T> =
  | { ok: true; value: T }            // Success: contains validated data
  | { ok: false; errors: string[] };  // Failure: contains error messages

export const MIN_MARKS = 0;
export const MAX_MARKS = 100;

// Type guard to check if a value is a plain object (not array, not null)
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" &&
         value !== null &&
         !Array.isArray(value);
}

// Type guard to check if value is a non-empty string (whitespace does not count)
function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

// Whole numbers a double holds exactly: 42 passes; 42.5, NaN, Infinity and
// anything past Number.MAX_SAFE_INTEGER do not
function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

// A cell nobody filled in: missing, null or only whitespace
function isBlankCell(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

// Spreadsheet cells come back as numbers, but a hand-edited sheet can hold "12"
function coerceInteger(value: unknown): unknown {
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return Number(value.trim());
  }
  return value;
}

/**
 * Validate a student name. Returns the trimmed name.
 */
export function validateName(value: unknown): ValidationResult<string> {
  if (!isNonEmptyString(value)) {
    return { ok: false, errors: ["name must be a non-empty string"] };
  }
  return { ok: true, value: value.trim() };
}

/**
 * Validate a roll number: a whole number, zero or greater, small enough to be
 * stored exactly (two distinct roll numbers must never compare equal).
 * Uniqueness is the roster's business (see roster.ts), not checked here.
 */
export function validateRollNo(value: unknown): ValidationResult<number> {
  if (!isInteger(value) || value < 0) {
    return { ok: false, errors: ["roll_no must be a non-negative whole number"] };
  }
  return { ok: true, value };
}

/**
 * Validate a marks value: a whole number between 0 and 100 inclusive.
 */
export function validateMarks(value: unknown): ValidationResult<number> {
  if (!isInteger(value) || value < MIN_MARKS || value > MAX_MARKS) {
    return {
      ok: false,
      errors: [`marks must be a whole number between ${MIN_MARKS} and ${MAX_MARKS}`],
    };
  }
  return { ok: true, value };
}

/**
 * Validate all three fields of a record at once, collecting every problem.
 * Used by the roster for `add` and by storage for each loaded row.
 */
export function validateStudent(fields: {
  rollNo: unknown;
  name: unknown;
  marks: unknown;
}): ValidationResult<StudentRecord> {
  const rollNo = validateRollNo(fields.rollNo);
  const name = validateName(fields.name);
  const marks = validateMarks(fields.marks);

  if (rollNo.ok && name.ok && marks.ok) {
    return { ok: true, value: { rollNo: rollNo.value, name: name.value, marks: marks.value } };
  }

  // Gather the errors of whichever fields failed, in column order
  const errors: string[] = [];
  for (const result of [rollNo, name, marks]) {
    if (!result.ok) errors.push(...result.errors);
  }
  return { ok: false, errors };
}

/**
 * Validate the rows read from the roster sheet.
 *
 * Fully blank rows are skipped silently. Other bad rows are dropped and
 * described in `errors`; a roll number that was already seen is also dropped
 * (first occurrence wins) so the loaded roster never holds duplicates. Row numbers in messages are the sheet's own row
 * numbers: the header is row 1, so the first data row is row 2.
 */
export function validateRows(rows: unknown[]): { valid: StudentRecord[]; errors: string[] } {
  const errors: string[] = [];
  const valid: StudentRecord[] = [];
  const seen = new Set<number>();

  rows.forEach((row, index) => {
    const sheetRow = index + 2;

    if (!isRecord(row)) {
      errors.push(`row ${sheetRow}: must be an object`);
      return;
    }

    // Empty lines left in a hand-edited sheet are not worth a warning
    if (isBlankCell(row.roll_no) && isBlankCell(row.name) && isBlankCell(row.marks)) {
      return;
    }

    const result = validateStudent({
      rollNo: coerceInteger(row.roll_no),
      name: typeof row.name === "number" ? String(row.name) : row.name,
      marks: coerceInteger(row.marks),
    });

    if (!result.ok) {
      result.errors.forEach((error) => errors.push(`row ${sheetRow}: ${error}`));
      return;
    }

    if (seen.has(result.value.rollNo)) {
      errors.push(`row ${sheetRow}: duplicate roll_no ${result.value.rollNo} skipped`);
      return;
    }

    seen.add(result.value.rollNo);
    valid.push(result.value);
  });

  return { valid, errors };
}

/**
 * Parse operator input as a whole number, optionally bounded.
 *
 * Pure: the caller owns the retry loop (see shell.ts). The error strings are
 * written to be shown to the operator as-is.
 */
export function parseInteger(
  text: string,
  bounds: { min?: number; max?: number } = {},
): ValidationResult<number> {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { ok: false, errors: ["Invalid input. Please enter a whole number."] };
  }

  const value = Number(trimmed);
  // Past 2^53 distinct inputs collapse onto the same number
  if (!Number.isSafeInteger(value)) {
    return {
      ok: false,
      errors: [value > 0
        ? `Value cannot exceed ${Number.MAX_SAFE_INTEGER}.`
        : `Value must be at least ${Number.MIN_SAFE_INTEGER}.`],
    };
  }
  if (bounds.min !== undefined && value < bounds.min) {
    return { ok: false, errors: [`Value must be at least ${bounds.min}.`] };
  }
  if (bounds.max !== undefined && value > bounds.max) {
    return { ok: false, errors: [`Value cannot exceed ${bounds.max}.`] };
  }
  return { ok: true, value };
}
