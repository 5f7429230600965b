// Search and sort over an in-memory snapshot.
// Nothing here touches the store or mutates the array it is given.
import { fail, ok } from "./result.ts";
import type { Result } from "./result.ts";
import type { StudentRecord } from "./types.ts";

// What the menu layer can search by.
export type SearchCriteria =
  | { by: "name"; query: string }
  | { by: "id"; id: number }
  | { by: "range"; lo: number; hi: number }
  | { by: "grade"; grade: string };

export type SortKey = "id-asc" | "id-desc" | "name" | "total-desc";

/**
 * Case-insensitive substring match on the name.
 * An empty query matches every record.
 */
export function searchByName(records: readonly StudentRecord[], query: string): StudentRecord[] {
  // Lower-case both sides once; "" is a substring of every name
  const needle = query.toLowerCase();
  return records.filter((record) => record.name.toLowerCase().includes(needle));
}

/**
 * Exact id lookup. Ids are unique, so there is at most one match.
 */
export function findById(records: readonly StudentRecord[], id: number): StudentRecord | undefined {
  return records.find((record) => record.id === id);
}

/**
 * Records whose percentage lies in [lo, hi], both ends inclusive.
 *
 * Crossed bounds (lo > hi) are not rejected; they simply match nothing.
 * Bounds that are not finite numbers fail with InvalidRange.
 */
export function searchByPercentageRange(
  records: readonly StudentRecord[],
  lo: number,
  hi: number,
): Result<StudentRecord[]> {
  // NaN and Infinity are not bounds
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) {
    return fail("InvalidRange", "Percentage bounds must be numbers");
  }
  return ok(records.filter((record) => record.percentage >= lo && record.percentage <= hi));
}

/**
 * Case-insensitive exact match on the grade token ("a+" finds "A+").
 */
export function searchByGrade(records: readonly StudentRecord[], grade: string): StudentRecord[] {
  // Grades are stored upper case ("A+", "B", ...)
  const wanted = grade.trim().toUpperCase();
  return records.filter((record) => record.grade === wanted);
}

/**
 * Run whichever search the criteria describe.
 */
export function search(records: readonly StudentRecord[], criteria: SearchCriteria): Result<StudentRecord[]> {
  // The union is exhaustive, so every branch returns
  switch (criteria.by) {
    case "name":
      return ok(searchByName(records, criteria.query));
    case "id": {
      // Unlike the other searches, a missing id is an error, not an empty list
      const match = findById(records, criteria.id);
      return match ? ok([match]) : fail("NotFound", `Roll number ${criteria.id} not found`);
    }
    case "range":
      return searchByPercentageRange(records, criteria.lo, criteria.hi);
    case "grade":
      return ok(searchByGrade(records, criteria.grade));
  }
}

// Plain code-unit comparison of lower-cased names.
function compareNames(a: StudentRecord, b: StudentRecord): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

// One comparator per sort key. Record<SortKey, ...> makes the compiler
// insist on an entry for every key.
const COMPARATORS: Record<SortKey, (a: StudentRecord, b: StudentRecord) => number> = {
  "id-asc": (a, b) => a.id - b.id,
  "id-desc": (a, b) => b.id - a.id,
  "name": compareNames,
  "total-desc": (a, b) => b.total - a.total,
};

/**
 * Return a sorted copy of the snapshot.
 *
 * Array.prototype.sort is stable, so records that compare equal (same total,
 * same name ignoring case) keep their original relative order.
 * Sorting never persists; see persistOrder in students.ts.
 */
export function sortRecords(records: readonly StudentRecord[], key: SortKey): StudentRecord[] {
  // Copy first: sort() works in place
  return [...records].sort(COMPARATORS[key]);
}
