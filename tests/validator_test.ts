import assert from "node:assert/strict";
import { test } from "node:test";

import {
  isCredentialToken,
  isValidMark,
  parseRole,
  validatePatch,
  validateStudentInput,
} from "../src/validator.ts";

test("validateStudentInput accepts a valid student and trims the name", () => {
  // Arrange
  const input = { id: 7, name: "  Ada  ", marks: [90, 85.5, 0] };

  // Act
  const result = validateStudentInput(input);

  // Assert
  assert.deepEqual(result, { ok: true, value: { id: 7, name: "Ada", marks: [90, 85.5, 0] } });
});

test("validateStudentInput collects every problem", () => {
  // Arrange: wrong id type, blank name and three bad marks
  const input = { id: "7", name: " ", marks: [101, -1, "x"] };

  // Act
  const result = validateStudentInput(input);

  // Assert
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.deepEqual(result.errors, [
      "id must be an integer",
      "name must be a non-empty string",
      "Math mark must be a number between 0 and 100",
      "Science mark must be a number between 0 and 100",
      "English mark must be a number between 0 and 100",
    ]);
  }
});

test("validateStudentInput rejects non-objects and wrong-sized marks", () => {
  assert.deepEqual(validateStudentInput(null), { ok: false, errors: ["student must be an object"] });
  assert.deepEqual(validateStudentInput({ id: 1, name: "Ann", marks: [1, 2] }), {
    ok: false,
    errors: ["marks must be an array of 3 numbers"],
  });
});

test("validateStudentInput rejects fractional ids", () => {
  const result = validateStudentInput({ id: 1.5, name: "Ann", marks: [1, 2, 3] });
  assert.deepEqual(result, { ok: false, errors: ["id must be an integer"] });
});

test("validateStudentInput rejects names the record file cannot hold", () => {
  const tooLong = validateStudentInput({ id: 1, name: "x".repeat(100), marks: [1, 2, 3] });
  const piped = validateStudentInput({ id: 1, name: "A|B", marks: [1, 2, 3] });

  assert.deepEqual(tooLong, { ok: false, errors: ["name must be at most 99 characters"] });
  assert.deepEqual(piped, { ok: false, errors: ['name must not contain "|" or line breaks'] });
});

test("isValidMark is inclusive at both ends", () => {
  assert.equal(isValidMark(0), true);
  assert.equal(isValidMark(100), true);
  assert.equal(isValidMark(100.01), false);
  assert.equal(isValidMark(Number.NaN), false);
});

test("validatePatch treats a blank name as unchanged", () => {
  assert.deepEqual(validatePatch({ name: "   " }), { ok: true, value: {} });
});

test("validatePatch keeps only the subjects present", () => {
  const result = validatePatch({ name: " Bea ", marks: { Science: 80 } });
  assert.deepEqual(result, { ok: true, value: { name: "Bea", marks: { Science: 80 } } });
});

test("validatePatch rejects an out-of-range mark", () => {
  const result = validatePatch({ marks: { English: 120 } });
  assert.deepEqual(result, { ok: false, errors: ["English mark must be a number between 0 and 100"] });
});

test("parseRole is case-insensitive and rejects unknown roles", () => {
  assert.equal(parseRole("staff"), "STAFF");
  assert.equal(parseRole(" Principal "), "PRINCIPAL");
  assert.equal(parseRole("teacher"), undefined);
});

test("isCredentialToken requires one whitespace-free token", () => {
  assert.equal(isCredentialToken("bob"), true);
  assert.equal(isCredentialToken("bo b"), false);
  assert.equal(isCredentialToken(""), false);
});
