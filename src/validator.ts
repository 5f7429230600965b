// Import types we need for validation
import { MAX_MARK, ROLES, SUBJECTS } from "./types.ts";
import type { Marks, Role, StudentInput, StudentPatch, Subject } from "./types.ts";

// ValidationResult is a generic discriminated union: check `ok` to know which case.
// On failure, every problem found is listed (not just the first one).
export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

// Longest name the record file accepts.
export const MAX_NAME_LENGTH = 99;

// Characters that would break the one-record-per-line format.
const FORBIDDEN_NAME_CHARS = /[|\r\n]/;

// A credential token is one or more non-whitespace characters.
const TOKEN_PATTERN = /^\S+$/;

// Type guard to check if value is a plain object (not array, not null)
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Type guard to check if value is a non-empty string (ignoring whitespace)
function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

// Type guard for a valid finite number (excludes NaN and Infinity)
function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Is this a mark a subject can carry (0..100 inclusive)?
 */
export function isValidMark(value: unknown): value is number {
  return isFiniteNumber(value) && value >= 0 && value <= MAX_MARK;
}

/**
 * Is this a usable roll number?
 */
export function isValidId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

// Check a name and collect problems into `errors`. Returns the trimmed name.
function checkName(value: unknown, errors: string[]): string {
  if (!isNonEmptyString(value)) {
    errors.push("name must be a non-empty string");
    return "";
  }
  const name = value.trim();
  if (name.length > MAX_NAME_LENGTH) {
    errors.push(`name must be at most ${MAX_NAME_LENGTH} characters`);
  }
  if (FORBIDDEN_NAME_CHARS.test(name)) {
    errors.push('name must not contain "|" or line breaks');
  }
  return name;
}

/**
 * Validate the raw fields of a new student record.
 * Accepts unknown input so the menu layer can pass whatever it parsed.
 */
export function validateStudentInput(value: unknown): ValidationResult<StudentInput> {
  if (!isRecord(value)) {
    return { ok: false, errors: ["student must be an object"] };
  }

  const errors: string[] = [];

  const id = isValidId(value.id) ? value.id : undefined;
  if (id === undefined) {
    errors.push("id must be an integer");
  }

  const name = checkName(value.name, errors);

  const rawMarks = value.marks;
  const marks: Marks = [0, 0, 0];
  if (!Array.isArray(rawMarks) || rawMarks.length !== SUBJECTS.length) {
    errors.push(`marks must be an array of ${SUBJECTS.length} numbers`);
  } else {
    SUBJECTS.forEach((subject, index) => {
      const mark: unknown = rawMarks[index];
      if (isValidMark(mark)) {
        marks[index] = mark;
      } else {
        errors.push(`${subject} mark must be a number between 0 and ${MAX_MARK}`);
      }
    });
  }

  if (errors.length > 0 || id === undefined) {
    return { ok: false, errors };
  }

  return { ok: true, value: { id, name, marks } };
}

/**
 * Validate an update patch.
 *
 * A missing or blank name keeps the current name; a missing subject keeps the
 * current mark. Values that are present must be valid.
 */
export function validatePatch(patch: StudentPatch): ValidationResult<StudentPatch> {
  const errors: string[] = [];
  const normalized: StudentPatch = {};

  // Blank means "leave unchanged", so only a non-blank name is checked
  if (patch.name !== undefined && patch.name.trim().length > 0) {
    normalized.name = checkName(patch.name, errors);
  }

  if (patch.marks) {
    const marks: Partial<Record<Subject, number>> = {};
    for (const subject of SUBJECTS) {
      const mark = patch.marks[subject];
      if (mark === undefined) continue;
      if (isValidMark(mark)) {
        marks[subject] = mark;
      } else {
        errors.push(`${subject} mark must be a number between 0 and ${MAX_MARK}`);
      }
    }
    normalized.marks = marks;
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: normalized };
}

/**
 * A username or password must be a single whitespace-free token,
 * since the credential file is whitespace separated.
 */
export function isCredentialToken(value: string): boolean {
  return TOKEN_PATTERN.test(value);
}

/**
 * Parse a role name, case-insensitively.
 * Returns the upper-case Role, or undefined if it is not one of the five roles.
 */
export function parseRole(value: string): Role | undefined {
  const upper = value.trim().toUpperCase();
  return ROLES.find((role) => role === upper);
}
