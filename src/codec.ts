import { withDerived } from "./grading.ts";
import { fail, ok } from "./result.ts";
import type { Result } from "./result.ts";
import { SUBJECTS } from "./types.ts";
import type { Marks, StudentRecord } from "./types.ts";

// Field separator of the record file.
// Names are written as-is: a name containing "|" corrupts its row.
export const DELIMITER = "|";

// id + name + one field per subject
const FIELD_COUNT = 2 + SUBJECTS.length;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Serialize one record to a line (without the trailing newline).
 * Example: { id: 7, name: "Ada", marks: [90, 85.5, 70] } → "7|Ada|90.00|85.50|70.00"
 */
export function encodeRecord(record: StudentRecord): string {
  const marks = record.marks.map((mark) => mark.toFixed(2));
  return [String(record.id), record.name, ...marks].join(DELIMITER);
}

// A mark field that is empty or not numeric reads as 0.
// parseFloat takes the leading number, so "85.5abc" reads as 85.5.
function parseMark(field: string | undefined): number {
  const parsed = Number.parseFloat(field ?? "");
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parse one line of the record file.
 *
 * Fails with MalformedLine when fewer than five fields are present, the id is
 * not an integer, or the name is blank. Derived fields are always recomputed.
 */
export function decodeRecord(line: string): Result<StudentRecord> {
  const fields = line.replace(/\r$/, "").split(DELIMITER);

  if (fields.length < FIELD_COUNT) {
    return fail("MalformedLine", `Expected ${FIELD_COUNT} fields, found ${fields.length}`);
  }

  const [idField, name, ...markFields] = fields;

  if (!INTEGER_PATTERN.test(idField.trim())) {
    return fail("MalformedLine", `Invalid id field: "${idField}"`);
  }
  const id = Number.parseInt(idField.trim(), 10);
  if (!Number.isSafeInteger(id)) {
    return fail("MalformedLine", `Id out of range: "${idField}"`);
  }

  if (name.trim().length === 0) {
    return fail("MalformedLine", "Name field is empty");
  }

  const marks: Marks = [parseMark(markFields[0]), parseMark(markFields[1]), parseMark(markFields[2])];
  return ok(withDerived(id, name, marks));
}
