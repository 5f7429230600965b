import assert from "node:assert/strict";
import { test } from "node:test";

import { gradeFor, percentageOf, recompute, totalOf, withDerived } from "../src/grading.ts";
import type { Marks, StudentRecord } from "../src/types.ts";

test("gradeFor applies the thresholds at their boundaries", () => {
  const cases: Array<[number, string]> = [
    [100, "A+"],
    [90, "A+"],
    [89.99, "A"],
    [80, "A"],
    [79.99, "B"],
    [70, "B"],
    [60, "C"],
    [50, "D"],
    [49.99, "F"],
    [0, "F"],
  ];

  for (const [percentage, expected] of cases) {
    assert.equal(gradeFor(percentage), expected, `gradeFor(${percentage})`);
  }
});

test("percentageOf is exact for whole totals", () => {
  assert.equal(percentageOf(120), 40);
  assert.equal(percentageOf(300), 100);
  assert.equal(percentageOf(0), 0);
});

test("totalOf sums the three marks", () => {
  assert.equal(totalOf([10, 20.5, 30]), 60.5);
});

test("recompute overwrites stale derived fields in place", () => {
  // Arrange
  const record: StudentRecord = { id: 1, name: "Ann", marks: [90, 90, 90], total: 1, percentage: 1, grade: "F" };

  // Act
  const result = recompute(record);

  // Assert: same object, fresh values
  assert.equal(result, record);
  assert.equal(record.total, 270);
  assert.equal(record.percentage, 90);
  assert.equal(record.grade, "A+");
});

test("withDerived copies the marks", () => {
  const marks: Marks = [50, 60, 70];

  const record = withDerived(2, "Ben", marks);
  marks[0] = 0;

  assert.deepEqual(record.marks, [50, 60, 70]);
  assert.equal(record.total, 180);
  assert.equal(record.percentage, 60);
  assert.equal(record.grade, "C");
});
