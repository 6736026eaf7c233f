import { test } from "node:test";
import assert from "node:assert/strict";
import { PassThrough, Writable } from "node:stream";

import { createLogger } from "../src/logger.ts";
import { RosterStore } from "../src/roster.ts";
import { createConsoleIO, RosterShell, type ShellIO } from "../src/shell.ts";
import { MemoryStorage } from "../src/storage.ts";
import type { StudentRecord } from "../src/types.ts";

// Plays back canned answers and records everything the shell prints
class ScriptedIO implements ShellIO {
  readonly printed: string[] = [];
  readonly questions: string[] = [];
  #answers: string[];

  constructor(answers: string[]) {
    this.#answers = [...answers];
  }

  ask(question: string): Promise<string | undefined> {
    this.questions.push(question);
    return Promise.resolve(this.#answers.shift());
  }

  print(text: string): void {
    this.printed.push(text);
  }
}

async function runShell(answers: string[], records: StudentRecord[] = [], storage = new MemoryStorage()) {
  const store = new RosterStore(storage, records);
  const io = new ScriptedIO(answers);
  await new RosterShell(store, io, createLogger("error")).run();
  return { store, io, storage };
}

const ALICE = { rollNo: 1, name: "Alice", marks: 90 };

test("add re-prompts until roll number and marks are valid", async () => {
  // Arrange: a bad number, a taken roll number, then marks too high
  const { store, io } = await runShell(["1", "Carol", "abc", "1", "3", "150", "72", "7"], [ALICE]);

  // Assert: every rejection was explained, then the record was added
  assert.ok(io.printed.includes("Invalid input. Please enter a whole number."));
  assert.ok(io.printed.includes("Error: Roll number 1 already exists."));
  assert.ok(io.printed.includes("Value cannot exceed 100."));
  assert.ok(io.printed.includes("Student added successfully."));
  assert.deepEqual(store.search(3), { rollNo: 3, name: "Carol", marks: 72 });
  assert.equal(io.printed.at(-1), "Exiting application. Goodbye!");
});

test("add with a blank name returns to the menu without prompting further", async () => {
  const { store, io } = await runShell(["1", "   ", "7"]);

  assert.ok(io.printed.includes("Student name cannot be empty."));
  assert.deepEqual(io.questions, ["Enter your choice: ", "Enter student name: ", "Enter your choice: "]);
  assert.equal(store.size, 0);
});

test("search shows the record with its class", async () => {
  const { io } = await runShell(["3", "1", "7"], [ALICE]);

  assert.ok(io.printed.includes("\nStudent Found (Roll No: 1):"));
  assert.ok(io.printed.includes("roll_no  name   marks  class\n      1  Alice     90  Distinction"));
});

test("update of a missing roll number reports it", async () => {
  const { io } = await runShell(["4", "99", "7"]);

  assert.ok(io.printed.includes("Student with roll number 99 not found."));
});

test("update changes the name", async () => {
  const { store, io } = await runShell(["4", "1", "1", "Alicia", "7"], [ALICE]);

  assert.ok(io.printed.includes("Name updated."));
  assert.deepEqual(store.search(1), { rollNo: 1, name: "Alicia", marks: 90 });
});

test("update changes the marks", async () => {
  const { store, io } = await runShell(["4", "1", "2", "-5", "33", "7"], [ALICE]);

  assert.ok(io.printed.includes("Value must be at least 0."));
  assert.ok(io.printed.includes("Marks updated."));
  assert.deepEqual(store.search(1), { rollNo: 1, name: "Alice", marks: 33 });
});

test("update with an unknown field choice is cancelled", async () => {
  const { store, io } = await runShell(["4", "1", "3", "7"], [ALICE]);

  assert.ok(io.printed.includes("Invalid choice. Update cancelled."));
  assert.deepEqual(store.search(1), ALICE);
});

test("delete removes the record", async () => {
  const { store, storage, io } = await runShell(["5", "1", "7"], [ALICE]);

  assert.ok(io.printed.includes("Student with roll number 1 deleted."));
  assert.equal(store.isEmpty(), true);
  assert.deepEqual(storage.records, []);
});

test("view and report on an empty roster print a message", async () => {
  const { io } = await runShell(["2", "6", "7"]);

  assert.ok(io.printed.includes("The student roster is currently empty."));
  assert.ok(io.printed.includes("Cannot generate report: The student roster is empty."));
});

test("report prints the summary", async () => {
  const { io } = await runShell(["6", "7"], [ALICE, { rollNo: 2, name: "Bob", marks: 40 }]);

  const report = io.printed.find((text) => text.startsWith("--- Student Performance Report ---"));
  assert.ok(report);
  assert.ok(report.includes("\nAverage Marks: 65.00\n"));
});

test("an unknown menu choice shows a hint", async () => {
  const { io } = await runShell(["9", "7"]);

  assert.ok(io.printed.includes("Invalid choice. Please select a number from the menu."));
});

test("a failed save is reported as a warning and the change is kept", async () => {
  const storage = new MemoryStorage();
  storage.failSaves = true;

  const { store, io } = await runShell(["1", "Dan", "4", "55", "7"], [], storage);

  assert.ok(io.printed.includes("Warning: Simulated save failure. Changes are kept for this session only."));
  assert.deepEqual(store.search(4), { rollNo: 4, name: "Dan", marks: 55 });
});

test("the shell stops when input ends", async () => {
  const { io } = await runShell(["2"]);

  assert.equal(io.printed.includes("Exiting application. Goodbye!"), false);
  assert.equal(io.questions.length, 2);
});

test("a roll number too large to store exactly is re-prompted", async () => {
  const { store, io } = await runShell(["1", "Zed", "9007199254740993", "5", "80", "7"]);

  assert.ok(io.printed.includes("Value cannot exceed 9007199254740991."));
  assert.deepEqual(store.list(), [{ rollNo: 5, name: "Zed", marks: 80 }]);
});

// Drives the real stream-based IO with input that is all there before the first prompt
async function runPiped(script: string) {
  const input = new PassThrough();
  let text = "";
  const output = new Writable({
    write(chunk, _encoding, callback) {
      text += String(chunk);
      callback();
    },
  });
  input.end(script);

  const store = new RosterStore(new MemoryStorage());
  const io = createConsoleIO(input, output);
  try {
    await new RosterShell(store, io, createLogger("error")).run();
  } finally {
    io.close();
  }
  return { store, text };
}

test("console IO answers every prompt from piped input in order", async () => {
  const { store, text } = await runPiped("1\nZed\n5\n80\n2\n7\n");

  assert.deepEqual(store.list(), [{ rollNo: 5, name: "Zed", marks: 80 }]);
  assert.ok(text.includes("Enter student name: Enter roll number: Enter marks (0-100): Student added successfully.\n"));
  assert.ok(text.includes("      5  Zed      80  Distinction\n"));
  assert.ok(text.endsWith("Enter your choice: Exiting application. Goodbye!\n"));
});

test("console IO ends the shell when piped input runs out mid-prompt", async () => {
  const { store, text } = await runPiped("1\nZed\n");

  assert.equal(store.size, 0);
  assert.equal(text.includes("Goodbye"), false);
  assert.ok(text.endsWith("Enter roll number: \n--- Menu ---\n1. Add Student (Create)\n2. View All (Read)\n3. Search\n4. Update Student\n5. Delete Student\n6. Generate Report\n7. Exit\nEnter your choice: "));
});
