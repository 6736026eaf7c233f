/**
 * Error kinds raised by the roster.
 *
 * None of these are fatal: the shell reports them and returns to the menu.
 * Checking `error instanceof NotFoundError` (or reading `error.name`) tells
 * the caller which case it is dealing with.
 */
export class RosterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // new.target is the concrete subclass, so `name` is "NotFoundError" etc.
    this.name = new.target.name;
  }
}

// Bad, duplicate or out-of-range input. Nothing was changed.
export class ValidationError extends RosterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.issues = issues;
  }
}

// The roll number an operation refers to is not in the roster.
export class NotFoundError extends RosterError {
  readonly rollNo: number;

  constructor(rollNo: number) {
    super(`Student with roll number ${rollNo} not found`);
    this.rollNo = rollNo;
  }
}

// Aggregates were requested but there is nothing to aggregate.
export class EmptyRosterError extends RosterError {
  constructor() {
    super("The student roster is empty");
  }
}

// Reading or writing the workbook failed.
// Returned as a value by the storage adapter, never thrown out of it.
export class PersistenceError extends RosterError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.path = path;
  }
}

// Same helper shape used everywhere we log a caught value
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
