import { NotFoundError, PersistenceError, ValidationError } from "./errors.ts";
import type { RosterStorage } from "./storage.ts";
import type { StudentRecord, UpdatableField } from "./types.ts";
import { validateMarks, validateName, validateStudent } from "./validator.ts";

/**
 * Outcome of a successful mutation.
 *
 * The change has been applied in memory either way. `saveError` is set when
 * writing it to storage failed; the in-memory roster stays the source of truth
 * for the rest of the run and the caller decides how to tell the operator.
 */
export interface MutationResult {
  record: StudentRecord;
  saveError?: PersistenceError;
}

/**
 * In-memory roster: an ordered list of students, unique by roll number.
 *
 * Every mutating operation validates first (nothing changes on failure),
 * then applies the change and saves the whole roster through `storage`.
 * Records handed out are copies, so callers cannot edit the roster behind
 * its back.
 */
export class RosterStore {
  #records: StudentRecord[];
  #storage: RosterStorage;

  constructor(storage: RosterStorage, records: readonly StudentRecord[] = []) {
    this.#storage = storage;
    this.#records = [];

    // Re-check what we were given so the uniqueness invariant holds from the start
    for (const record of records) {
      const result = validateStudent(record);
      if (!result.ok) throw new ValidationError(result.errors);
      if (this.#indexOf(record.rollNo) !== -1) {
        throw new ValidationError([`Roll number ${record.rollNo} already exists`]);
      }
      this.#records.push(result.value);
    }
  }

  get size(): number {
    return this.#records.length;
  }

  isEmpty(): boolean {
    return this.#records.length === 0;
  }

  // All records in insertion order
  list(): StudentRecord[] {
    return this.#records.map((record) => ({ ...record }));
  }

  search(rollNo: number): StudentRecord | undefined {
    const record = this.#records.find((candidate) => candidate.rollNo === rollNo);
    return record ? { ...record } : undefined;
  }

  has(rollNo: number): boolean {
    return this.#indexOf(rollNo) !== -1;
  }

  add(name: string, rollNo: number, marks: number): MutationResult {
    const result = validateStudent({ rollNo, name, marks });
    const errors = result.ok ? [] : [...result.errors];
    if (this.has(rollNo)) {
      errors.push(`Roll number ${rollNo} already exists`);
    }
    if (!result.ok || errors.length > 0) {
      throw new ValidationError(errors);
    }

    this.#records.push(result.value);
    return this.#persist(result.value);
  }

  update(rollNo: number, field: "name", value: string): MutationResult;
  update(rollNo: number, field: "marks", value: number): MutationResult;
  update(rollNo: number, field: UpdatableField, value: string | number): MutationResult;
  update(rollNo: number, field: UpdatableField, value: string | number): MutationResult {
    const index = this.#indexOf(rollNo);
    if (index === -1) throw new NotFoundError(rollNo);
    const record = this.#records[index];

    if (field === "name") {
      const name = validateName(value);
      if (!name.ok) throw new ValidationError(name.errors);
      record.name = name.value;
    } else {
      const marks = validateMarks(value);
      if (!marks.ok) throw new ValidationError(marks.errors);
      record.marks = marks.value;
    }

    return this.#persist(record);
  }

  delete(rollNo: number): MutationResult {
    const index = this.#indexOf(rollNo);
    if (index === -1) throw new NotFoundError(rollNo);

    const [removed] = this.#records.splice(index, 1);
    return this.#persist(removed);
  }

  #indexOf(rollNo: number): number {
    return this.#records.findIndex((record) => record.rollNo === rollNo);
  }

  // Save the whole roster; a failure is reported, never rolled back
  #persist(record: StudentRecord): MutationResult {
    const saved = this.#storage.save(this.#records);
    return saved.ok
      ? { record: { ...record } }
      : { record: { ...record }, saveError: saved.error };
  }
}

/**
 * Build a roster from whatever the storage holds.
 *
 * Load problems never stop startup: they come back alongside an (possibly
 * empty) store for the caller to report.
 */
export function openRoster(storage: RosterStorage): {
  store: RosterStore;
  issues: string[];
  error?: PersistenceError;
} {
  const loaded = storage.load();
  return {
    store: new RosterStore(storage, loaded.records),
    issues: loaded.issues,
    error: loaded.error,
  };
}
