import { recompute, withDerived } from "./grading.ts";
import type { RecordStore } from "./record_store.ts";
import { fail, ok } from "./result.ts";
import type { Result } from "./result.ts";
import { SUBJECTS } from "./types.ts";
import type { StudentPatch, StudentRecord } from "./types.ts";
import { validatePatch, validateStudentInput } from "./validator.ts";

// Destructive operations take an explicit confirmation flag.
export interface Confirmation {
  confirmed: boolean;
}

/**
 * Validate and append a new student.
 *
 * The uniqueness check and the append are two separate file operations;
 * with a single interactive user nothing can slip in between.
 */
export async function addStudent(store: RecordStore, input: unknown): Promise<Result<StudentRecord>> {
  const validated = validateStudentInput(input);
  if (!validated.ok) {
    return fail("InvalidInput", validated.errors.join("; "));
  }

  const { id, name, marks } = validated.value;

  // STEP 1: Roll numbers are unique across the store
  const exists = await store.exists(id);
  if (!exists.ok) return exists;
  if (exists.value) {
    return fail("DuplicateId", `Roll number ${id} already exists`);
  }

  // STEP 2: Derive total, percentage and grade, then append one line
  const record = withDerived(id, name, marks);
  const appended = await store.append(record);
  if (!appended.ok) return appended;

  return ok(record);
}

/**
 * Apply a patch to one record and persist the whole file.
 * Omitted fields (and a blank name) keep their current values.
 */
export async function updateStudent(
  store: RecordStore,
  id: number,
  patch: StudentPatch,
): Promise<Result<StudentRecord>> {
  const validated = validatePatch(patch);
  if (!validated.ok) {
    return fail("InvalidInput", validated.errors.join("; "));
  }

  const loaded = await store.loadAll();
  if (!loaded.ok) return loaded;

  const records = loaded.value;
  const record = records.find((candidate) => candidate.id === id);
  if (!record) {
    return fail("NotFound", `Roll number ${id} not found`);
  }

  // Apply only what the patch carries; recompute before saving
  const changes = validated.value;
  if (changes.name !== undefined) record.name = changes.name;
  SUBJECTS.forEach((subject, index) => {
    const mark = changes.marks?.[subject];
    if (mark !== undefined) record.marks[index] = mark;
  });
  recompute(record);

  const written = await store.overwriteAll(records);
  if (!written.ok) return written;

  return ok(record);
}

/**
 * Physically remove the record with this id.
 * Returns the removed record.
 */
export async function deleteStudent(store: RecordStore, id: number): Promise<Result<StudentRecord>> {
  const loaded = await store.loadAll();
  if (!loaded.ok) return loaded;

  const index = loaded.value.findIndex((record) => record.id === id);
  if (index === -1) {
    return fail("NotFound", `Roll number ${id} not found`);
  }

  // Work on a copy and write the rest back in their original order
  const remaining = [...loaded.value];
  const [removed] = remaining.splice(index, 1);

  const written = await store.overwriteAll(remaining);
  if (!written.ok) return written;

  return ok(removed);
}

/**
 * Remove every record. Refuses to run without confirmation.
 */
export async function deleteAllStudents(store: RecordStore, confirmation: Confirmation): Promise<Result<void>> {
  if (!confirmation.confirmed) {
    return fail("Cancelled", "Delete all was not confirmed");
  }
  return store.clear();
}

/**
 * Persist a snapshot in the caller's order, e.g. after sortRecords.
 * Sorting never saves by itself; this is the explicit second step.
 */
export async function persistOrder(store: RecordStore, records: readonly StudentRecord[]): Promise<Result<void>> {
  return store.overwriteAll(records);
}

/**
 * Find the record that belongs to a logged-in student.
 *
 * An all-digit username is a roll number; anything else is matched against
 * the record name, ignoring case.
 */
export function findOwnRecord(records: readonly StudentRecord[], username: string): StudentRecord | undefined {
  // "12" is roll number 12; "ada" is matched against names
  if (/^\d+$/.test(username)) {
    const id = Number.parseInt(username, 10);
    return records.find((record) => record.id === id);
  }
  const wanted = username.toLowerCase();
  return records.find((record) => record.name.toLowerCase() === wanted);
}
