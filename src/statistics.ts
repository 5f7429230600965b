// Import only what we need
import { PASS_PERCENTAGE } from "./grading.ts";
import { fail, ok } from "./result.ts";
import type { Result } from "./result.ts";
import type { StudentRecord } from "./types.ts";

// ClassStatistics is the aggregate view of a whole snapshot.
export interface ClassStatistics {
  count: number;              // Number of records
  meanPercentage: number;     // Arithmetic mean of percentages
  highest: StudentRecord;     // Record with the maximum percentage (first one on ties)
  lowest: StudentRecord;      // Record with the minimum percentage (first one on ties)
  passCount: number;          // Records at or above the pass percentage
  failCount: number;          // Everyone else
}

/**
 * Compute class statistics in a single pass.
 * An empty snapshot fails with EmptyStore rather than dividing by zero.
 */
export function computeStatistics(records: readonly StudentRecord[]): Result<ClassStatistics> {
  if (records.length === 0) {
    return fail("EmptyStore", "No student records");
  }

  let sum = 0;
  let passCount = 0;
  let highest = records[0];
  let lowest = records[0];

  for (const record of records) {
    sum += record.percentage;

    // Strict comparisons keep the first record on ties
    if (record.percentage > highest.percentage) highest = record;
    if (record.percentage < lowest.percentage) lowest = record;

    if (record.percentage >= PASS_PERCENTAGE) passCount++;
  }

  return ok({
    count: records.length,
    meanPercentage: sum / records.length,
    highest,
    lowest,
    passCount,
    failCount: records.length - passCount,
  });
}
