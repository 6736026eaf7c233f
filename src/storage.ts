// SheetJS reads and writes .xlsx workbooks entirely in memory
import * as XLSX from "xlsx";

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { describeError, PersistenceError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { StudentRecord } from "./types.ts";
import { validateRows } from "./validator.ts";

// Header row of the roster sheet, in column order
export const COLUMNS = ["roll_no", "name", "marks"] as const;

/**
 * What a load produced.
 *
 * `records` is always usable (possibly empty). `error` is set when the whole
 * file could not be used; `issues` lists rows that were skipped.
 */
export interface LoadResult {
  records: StudentRecord[];
  issues: string[];
  error?: PersistenceError;
}

// Saving never throws: a failed save comes back as a value
export type SaveResult =
  | { ok: true }
  | { ok: false; error: PersistenceError };

/**
 * Anything the roster can be loaded from and saved to.
 *
 * Both calls are synchronous, so an operation and its save finish before
 * the next operation starts.
 */
export interface RosterStorage {
  load(): LoadResult;
  save(records: readonly StudentRecord[]): SaveResult;
}

/**
 * Roster persisted as a single sheet inside an .xlsx workbook.
 *
 * The file is read in full on every load and rewritten in full on every
 * save; nothing is held open between calls.
 */
export class WorkbookStorage implements RosterStorage {
  #path: string;
  #sheetName: string;
  #logger: Logger;

  constructor(path: string, sheetName: string, logger: Logger) {
    this.#path = path;
    this.#sheetName = sheetName;
    this.#logger = logger;
  }

  get path(): string {
    return this.#path;
  }

  load(): LoadResult {
    // No file yet is normal on a first run, but the operator still hears about it
    if (!existsSync(this.#path)) {
      return this.#empty(`Roster file ${this.#path} not found; starting with an empty roster`);
    }

    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(readFileSync(this.#path), { type: "buffer" });
    } catch (error) {
      return this.#empty(`Error reading file ${this.#path}: ${describeError(error)}`, error);
    }

    if (!workbook.SheetNames.includes(this.#sheetName)) {
      return this.#empty(`Sheet "${this.#sheetName}" not found in ${this.#path}`);
    }
    const sheet = workbook.Sheets[this.#sheetName];

    // header: 1 returns raw arrays, so the first one is the header row
    const [header] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });
    const missing = COLUMNS.filter((column) => !(header ?? []).includes(column));
    if (missing.length > 0) {
      return this.#empty(`Sheet "${this.#sheetName}" is missing column(s): ${missing.join(", ")}`);
    }

    // defval keeps empty cells as null instead of dropping the key;
    // blankrows keeps row numbering in validation messages aligned with the sheet
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
      defval: null,
      blankrows: true,
    });
    const { valid, errors } = validateRows(rows);

    this.#logger.info("Roster loaded", { path: this.#path, count: valid.length, skipped: errors.length });
    return { records: valid, issues: errors };
  }

  save(records: readonly StudentRecord[]): SaveResult {
    // Array-of-arrays with the header first, so an empty roster still has its columns
    const sheet = XLSX.utils.aoa_to_sheet([
      [...COLUMNS],
      ...records.map((record) => [record.rollNo, record.name, record.marks]),
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, this.#sheetName);

    try {
      // Make sure the directory exists, like mkdir -p
      const dir = dirname(this.#path);
      if (dir && dir !== ".") {
        mkdirSync(dir, { recursive: true });
      }

      const data: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
      writeFileSync(this.#path, data);
    } catch (error) {
      return {
        ok: false,
        error: new PersistenceError(
          `Error saving data to ${this.#path}: ${describeError(error)}`,
          this.#path,
          error,
        ),
      };
    }

    this.#logger.info("Roster saved", { path: this.#path, count: records.length });
    return { ok: true };
  }

  #empty(message: string, cause?: unknown): LoadResult {
    return { records: [], issues: [], error: new PersistenceError(message, this.#path, cause) };
  }
}

/**
 * Roster kept in process memory only.
 *
 * Handy for tests and dry runs. `failSaves` makes every save report a
 * PersistenceError so callers can exercise the save-failure path.
 */
export class MemoryStorage implements RosterStorage {
  #records: StudentRecord[];
  failSaves = false;
  saveCount = 0;

  constructor(records: readonly StudentRecord[] = []) {
    this.#records = records.map((record) => ({ ...record }));
  }

  // Snapshot of what was last saved
  get records(): StudentRecord[] {
    return this.#records.map((record) => ({ ...record }));
  }

  load(): LoadResult {
    return { records: this.records, issues: [] };
  }

  save(records: readonly StudentRecord[]): SaveResult {
    if (this.failSaves) {
      return { ok: false, error: new PersistenceError("Simulated save failure", "memory") };
    }
    this.#records = records.map((record) => ({ ...record }));
    this.saveCount += 1;
    return { ok: true };
  }
}
