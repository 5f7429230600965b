// Import only the types and constants we need
import { MAX_MARK, SUBJECTS } from "./types.ts";
import type { Grade, Marks, StudentRecord } from "./types.ts";

// Grade ladder: the first threshold the percentage reaches wins.
// Checked top-down, so order matters.
const GRADE_THRESHOLDS: ReadonlyArray<readonly [number, Grade]> = [
  [90, "A+"],
  [80, "A"],
  [70, "B"],
  [60, "C"],
  [50, "D"],
];

// Percentage a student needs to count as a pass in the statistics.
export const PASS_PERCENTAGE = 50;

/**
 * Map a percentage to its letter grade.
 * Example: gradeFor(90) = "A+", gradeFor(89.99) = "A", gradeFor(49.99) = "F"
 */
export function gradeFor(percentage: number): Grade {
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (percentage >= threshold) return grade;
  }
  return "F";
}

/**
 * Sum of the marks.
 */
export function totalOf(marks: Marks): number {
  return marks.reduce((acc, mark) => acc + mark, 0);
}

/**
 * Share of the maximum possible total, as a percentage.
 * Multiplying before dividing keeps whole-number results exact
 * (120 out of 300 is 40, not 40.00000000000001).
 */
export function percentageOf(total: number): number {
  return (total * 100) / (MAX_MARK * SUBJECTS.length);
}

/**
 * Recompute total, percentage and grade from the record's marks, in place.
 * Derived fields are never trusted from input; this is called on every
 * decode and before every save.
 */
export function recompute(record: StudentRecord): StudentRecord {
  record.total = totalOf(record.marks);
  record.percentage = percentageOf(record.total);
  record.grade = gradeFor(record.percentage);
  return record;
}

/**
 * Build a complete record from its raw fields.
 */
export function withDerived(id: number, name: string, marks: Marks): StudentRecord {
  // Copy the tuple so the caller's array is never shared with the record
  return recompute({ id, name, marks: [...marks], total: 0, percentage: 0, grade: "F" });
}
