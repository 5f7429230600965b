import assert from "node:assert/strict";
import { access, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { after, before, test } from "node:test";

import { withDerived } from "../src/grading.ts";
import {
  backupFile,
  exportSnapshot,
  obfuscateFile,
  renderCsv,
  renderReport,
  restoreFile,
  xorKeyByte,
} from "../src/maintenance.ts";
import { makeTempDir } from "./helpers.ts";

let dir = "";
let cleanup = async () => {};

before(async () => {
  ({ dir, cleanup } = await makeTempDir());
});

after(async () => {
  await cleanup();
});

test("backupFile copies the bytes exactly", async () => {
  // Arrange: content that is not valid UTF-8
  const source = join(dir, "backup-source.txt");
  const backup = join(dir, "copies", "backup.txt");
  const bytes = Buffer.from([0x31, 0x7c, 0xff, 0x00, 0x0a]);
  await writeFile(source, bytes);

  // Act
  const result = await backupFile(source, backup);

  // Assert
  assert.equal(result.ok, true);
  assert.deepEqual(await readFile(backup), bytes);
});

test("backupFile of a missing source fails and writes nothing", async () => {
  const backup = join(dir, "never.txt");

  const result = await backupFile(join(dir, "absent.txt"), backup);

  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.kind, "NotFound");
  await assert.rejects(access(backup));
});

test("restoreFile needs confirmation", async () => {
  // Arrange
  const backup = join(dir, "restore-backup.txt");
  const target = join(dir, "restore-target.txt");
  await writeFile(backup, "1|Ann|40.00|40.00|40.00\n");
  await writeFile(target, "2|Ben|50.00|50.00|50.00\n");

  // Act
  const refused = await restoreFile(backup, target, { confirmed: false });
  const unchanged = await readFile(target, "utf8");
  const restored = await restoreFile(backup, target, { confirmed: true });

  // Assert
  assert.deepEqual(refused, { ok: false, error: { kind: "Cancelled", message: "Restore was not confirmed" } });
  assert.equal(unchanged, "2|Ben|50.00|50.00|50.00\n");
  assert.equal(restored.ok, true);
  assert.equal(await readFile(target, "utf8"), "1|Ann|40.00|40.00|40.00\n");
});

test("restoreFile without a backup fails with NotFound", async () => {
  const result = await restoreFile(join(dir, "no-backup.txt"), join(dir, "whatever.txt"), { confirmed: true });

  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.kind, "NotFound");
});

test("renderCsv quotes names and formats numbers", () => {
  const records = [withDerived(7, 'Ada "The Countess"', [90, 85.5, 70]), withDerived(2, "Ben", [50, 60, 70])];

  const csv = renderCsv(records);

  assert.equal(
    csv,
    "Roll,Name,Math,Science,English,Total,Percentage,Grade\n" +
      '7,"Ada ""The Countess""",90.00,85.50,70.00,245.50,81.83,A\n' +
      '2,"Ben",50.00,60.00,70.00,180.00,60.00,C\n',
  );
});

test("renderCsv of no records is just the header", () => {
  assert.equal(renderCsv([]), "Roll,Name,Math,Science,English,Total,Percentage,Grade\n");
});

test("renderReport lays out one block per record", () => {
  const report = renderReport([withDerived(1, "Ben", [50, 60, 70])], new Date("2026-01-05T09:30:00.000Z"));

  assert.equal(
    report,
    [
      "Student Report Generated on 2026-01-05T09:30:00.000Z",
      "",
      "Roll: 1",
      "Name: Ben",
      "Math: 50.00",
      "Science: 60.00",
      "English: 70.00",
      "Total: 180.00",
      "Percentage: 60.00",
      "Grade: C",
      "-----------------",
      "",
    ].join("\n"),
  );
});

test("exportSnapshot writes both files", async () => {
  // Arrange
  const records = [withDerived(1, "Ben", [50, 60, 70])];
  const generatedAt = new Date("2026-01-05T09:30:00.000Z");
  const csvPath = join(dir, "export", "students.csv");
  const reportPath = join(dir, "export", "report.txt");

  // Act
  const result = await exportSnapshot(records, { csvPath, reportPath, generatedAt });

  // Assert
  assert.equal(result.ok, true);
  assert.equal(await readFile(csvPath, "utf8"), renderCsv(records));
  assert.equal(await readFile(reportPath, "utf8"), renderReport(records, generatedAt));
});

test("exportSnapshot refuses an empty snapshot", async () => {
  const csvPath = join(dir, "empty.csv");

  const result = await exportSnapshot([], { csvPath, reportPath: join(dir, "empty-report.txt") });

  assert.deepEqual(result, { ok: false, error: { kind: "EmptyStore", message: "No records to export" } });
  await assert.rejects(access(csvPath));
});

test("xorKeyByte accepts exactly one byte-sized character", () => {
  assert.equal(xorKeyByte("k"), 0x6b);
  assert.equal(xorKeyByte(""), undefined);
  assert.equal(xorKeyByte("ab"), undefined);
  assert.equal(xorKeyByte("€"), undefined);
});

test("obfuscateFile twice with the same key restores the file", async () => {
  // Arrange: more than one chunk of bytes
  const path = join(dir, "secret.bin");
  const original = Buffer.alloc(10_000);
  for (let i = 0; i < original.length; i++) original[i] = i % 251;
  await writeFile(path, original);

  // Act
  const first = await obfuscateFile(path, "k");
  const scrambled = await readFile(path);
  const second = await obfuscateFile(path, "k");

  // Assert
  assert.equal(first.ok, true);
  assert.equal(second.ok, true);
  assert.equal(scrambled.length, original.length);
  assert.equal(scrambled[0], 0x6b);
  assert.equal(scrambled[9_999], (9_999 % 251) ^ 0x6b);
  assert.deepEqual(await readFile(path), original);
});

test("obfuscateFile rejects bad keys and missing files", async () => {
  const path = join(dir, "plain.txt");
  await writeFile(path, "hello");

  const badKey = await obfuscateFile(path, "ab");
  const missing = await obfuscateFile(join(dir, "nope.txt"), "k");

  assert.deepEqual(badKey, {
    ok: false,
    error: { kind: "InvalidInput", message: "Obfuscation key must be a single character" },
  });
  assert.equal(await readFile(path, "utf8"), "hello");
  assert.equal(missing.ok, false);
  if (!missing.ok) assert.equal(missing.error.kind, "NotFound");
});
