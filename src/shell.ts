import { createInterface } from "node:readline";

import { buildReport } from "./analyzer.ts";
import { describeError, EmptyRosterError, RosterError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { renderRecord, renderReport, renderRoster } from "./render.ts";
import type { MutationResult, RosterStore } from "./roster.ts";
import type { RosterReport } from "./types.ts";
import { MAX_MARKS, MIN_MARKS, parseInteger } from "./validator.ts";

/**
 * Where the shell reads answers and writes text.
 * `ask` resolves to undefined once input has ended (Ctrl+D, closed pipe).
 */
export interface ShellIO {
  ask(question: string): Promise<string | undefined>;
  print(text: string): void;
}

export const MENU = [
  "",
  "--- Menu ---",
  "1. Add Student (Create)",
  "2. View All (Read)",
  "3. Search",
  "4. Update Student",
  "5. Delete Student",
  "6. Generate Report",
  "7. Exit",
].join("\n");

const MARKS_BOUNDS = { min: MIN_MARKS, max: MAX_MARKS };
const ROLL_NO_BOUNDS = { min: 0 };

/**
 * Numbered-menu front end over a RosterStore.
 *
 * Each menu action runs to completion before the menu is shown again.
 * Roster errors are reported to the operator and never end the loop;
 * anything else is a bug and propagates.
 */
export class RosterShell {
  #store: RosterStore;
  #io: ShellIO;
  #logger: Logger;

  constructor(store: RosterStore, io: ShellIO, logger: Logger) {
    this.#store = store;
    this.#io = io;
    this.#logger = logger;
  }

  async run(): Promise<void> {
    this.#io.print("Welcome to the Student Roster Manager!");

    while (true) {
      this.#io.print(MENU);
      const choice = await this.#io.ask("Enter your choice: ");
      if (choice === undefined) break;

      const action = this.#actionFor(choice.trim());
      if (action === "exit") {
        this.#io.print("Exiting application. Goodbye!");
        return;
      }
      if (!action) {
        this.#io.print("Invalid choice. Please select a number from the menu.");
        continue;
      }

      try {
        await action();
      } catch (error) {
        if (!(error instanceof RosterError)) throw error;
        this.#io.print(`Error: ${error.message}.`);
      }
    }
  }

  #actionFor(choice: string): (() => Promise<void> | void) | "exit" | undefined {
    switch (choice) {
      case "1": return () => this.addStudent();
      case "2": return () => this.viewStudents();
      case "3": return () => this.searchStudent();
      case "4": return () => this.updateStudent();
      case "5": return () => this.deleteStudent();
      case "6": return () => this.generateReport();
      case "7": return "exit";
      default: return undefined;
    }
  }

  async addStudent(): Promise<void> {
    this.#io.print("\n--- Add New Student ---");
    const name = await this.#io.ask("Enter student name: ");
    if (name === undefined) return;
    if (!name.trim()) {
      this.#io.print("Student name cannot be empty.");
      return;
    }

    const rollNo = await this.#askInteger("Enter roll number: ", ROLL_NO_BOUNDS, (value) =>
      this.#store.has(value) ? `Error: Roll number ${value} already exists.` : undefined
    );
    if (rollNo === undefined) return;

    const marks = await this.#askInteger(`Enter marks (${MIN_MARKS}-${MAX_MARKS}): `, MARKS_BOUNDS);
    if (marks === undefined) return;

    const result = this.#store.add(name, rollNo, marks);
    this.#io.print("Student added successfully.");
    this.#reportSave(result);
  }

  viewStudents(): void {
    if (this.#store.isEmpty()) {
      this.#io.print("The student roster is currently empty.");
      return;
    }
    this.#io.print("\n--- Student Roster ---");
    this.#io.print(renderRoster(this.#store.list()));
    this.#io.print("----------------------");
  }

  async searchStudent(): Promise<void> {
    const rollNo = await this.#askInteger("Enter roll number to search: ", ROLL_NO_BOUNDS);
    if (rollNo === undefined) return;

    const record = this.#store.search(rollNo);
    if (!record) {
      this.#io.print(`Student with roll number ${rollNo} not found.`);
      return;
    }
    this.#io.print(`\nStudent Found (Roll No: ${rollNo}):`);
    this.#io.print(renderRecord(record));
  }

  async updateStudent(): Promise<void> {
    const rollNo = await this.#askInteger("Enter roll number of student to update: ", ROLL_NO_BOUNDS);
    if (rollNo === undefined) return;

    const record = this.#store.search(rollNo);
    if (!record) {
      this.#io.print(`Student with roll number ${rollNo} not found.`);
      return;
    }

    this.#io.print("\nCurrent Record:");
    this.#io.print(renderRecord(record));
    this.#io.print("\nWhat do you want to update?\n1. Name\n2. Marks");
    const choice = await this.#io.ask("Enter your choice (1 or 2): ");
    if (choice === undefined) return;

    if (choice.trim() === "1") {
      const name = await this.#io.ask("Enter new name: ");
      if (name === undefined) return;
      if (!name.trim()) {
        this.#io.print("Name update cancelled (Name cannot be empty).");
        return;
      }
      const result = this.#store.update(rollNo, "name", name);
      this.#io.print("Name updated.");
      this.#reportSave(result);
    } else if (choice.trim() === "2") {
      const marks = await this.#askInteger(`Enter new marks (${MIN_MARKS}-${MAX_MARKS}): `, MARKS_BOUNDS);
      if (marks === undefined) return;
      const result = this.#store.update(rollNo, "marks", marks);
      this.#io.print("Marks updated.");
      this.#reportSave(result);
    } else {
      this.#io.print("Invalid choice. Update cancelled.");
    }
  }

  async deleteStudent(): Promise<void> {
    const rollNo = await this.#askInteger("Enter roll number to delete: ", ROLL_NO_BOUNDS);
    if (rollNo === undefined) return;

    if (!this.#store.has(rollNo)) {
      this.#io.print(`Student with roll number ${rollNo} not found.`);
      return;
    }
    const result = this.#store.delete(rollNo);
    this.#io.print(`Student with roll number ${rollNo} deleted.`);
    this.#reportSave(result);
  }

  generateReport(): void {
    let report: RosterReport;
    try {
      report = buildReport(this.#store.list());
    } catch (error) {
      if (!(error instanceof EmptyRosterError)) throw error;
      this.#io.print(`Cannot generate report: ${error.message}.`);
      return;
    }
    this.#io.print("");
    this.#io.print(renderReport(report));
  }

  /**
   * Keep asking until the answer parses as a whole number within bounds and
   * passes `check` (which returns a message to reject the value).
   * Resolves to undefined if input ends first.
   */
  async #askInteger(
    question: string,
    bounds: { min?: number; max?: number },
    check?: (value: number) => string | undefined,
  ): Promise<number | undefined> {
    while (true) {
      const answer = await this.#io.ask(question);
      if (answer === undefined) return undefined;

      const parsed = parseInteger(answer, bounds);
      if (!parsed.ok) {
        parsed.errors.forEach((error) => this.#io.print(error));
        continue;
      }

      const problem = check?.(parsed.value);
      if (problem) {
        this.#io.print(problem);
        continue;
      }
      return parsed.value;
    }
  }

  // A failed save is a warning: the change stays in memory for this session
  #reportSave(result: MutationResult) {
    if (!result.saveError) return;
    this.#logger.warn("Roster save failed", {
      path: result.saveError.path,
      error: describeError(result.saveError.cause ?? result.saveError),
    });
    this.#io.print(`Warning: ${result.saveError.message}. Changes are kept for this session only.`);
  }
}

/**
 * ShellIO over a pair of streams (stdin/stdout by default).
 *
 * Lines are queued as they arrive, so input piped in ahead of the prompts is
 * answered in order instead of being dropped. Call `close()` when the shell
 * is done so the process can exit.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ShellIO & { close(): void } {
  // No output stream here: prompts are written by `ask` itself
  const rl = createInterface({ input });
  const lines: string[] = [];
  const waiting: Array<(line: string | undefined) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      lines.push(line);
    }
  });
  rl.on("close", () => {
    closed = true;
    // Anyone still waiting gets "no answer"
    waiting.splice(0).forEach((resolve) => resolve(undefined));
  });

  return {
    ask(question) {
      output.write(question);
      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(undefined);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    print(text) {
      output.write(`${text}\n`);
    },
    close() {
      rl.close();
    },
  };
}
