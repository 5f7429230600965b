import { copyFile, open, writeFile } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";

import { ensureParentDir } from "./files.ts";
import { done, fail, ioFailure } from "./result.ts";
import type { Result } from "./result.ts";
import type { Confirmation } from "./students.ts";
import { SUBJECTS } from "./types.ts";
import type { StudentRecord } from "./types.ts";

// Obfuscation reads and rewrites the file this many bytes at a time.
export const XOR_CHUNK_SIZE = 4096;

/**
 * Copy the record file to the backup path, byte for byte.
 * A missing source fails with NotFound and writes nothing.
 */
export async function backupFile(sourcePath: string, backupPath: string): Promise<Result<void>> {
  try {
    await ensureParentDir(backupPath);
    await copyFile(sourcePath, backupPath);
    return done();
  } catch (error) {
    return ioFailure(`back up ${sourcePath}`, error);
  }
}

/**
 * Copy the backup over the record file. Destructive, so it only runs when the
 * caller has confirmed.
 */
export async function restoreFile(
  backupPath: string,
  targetPath: string,
  confirmation: Confirmation,
): Promise<Result<void>> {
  if (!confirmation.confirmed) {
    return fail("Cancelled", "Restore was not confirmed");
  }
  try {
    await ensureParentDir(targetPath);
    await copyFile(backupPath, targetPath);
    return done();
  } catch (error) {
    return ioFailure(`restore from ${backupPath}`, error);
  }
}

// Quote a CSV field, doubling any embedded quotes.
function quoteCsv(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Render the snapshot as CSV: a header row, then one row per record.
 *
 * Roll,Name,Math,Science,English,Total,Percentage,Grade
 * 7,"Ada",90.00,85.50,70.00,245.50,81.83,A
 */
export function renderCsv(records: readonly StudentRecord[]): string {
  const header = ["Roll", "Name", ...SUBJECTS, "Total", "Percentage", "Grade"].join(",");
  const rows = records.map((record) =>
    [
      String(record.id),
      quoteCsv(record.name),
      ...record.marks.map((mark) => mark.toFixed(2)),
      record.total.toFixed(2),
      record.percentage.toFixed(2),
      record.grade,
    ].join(",")
  );
  return [header, ...rows].map((line) => `${line}\n`).join("");
}

/**
 * Render the snapshot as a plain-text report: a timestamped header, then one
 * block per record closed by a dashed separator.
 */
export function renderReport(records: readonly StudentRecord[], generatedAt: Date): string {
  const lines = [`Student Report Generated on ${generatedAt.toISOString()}`, ""];

  for (const record of records) {
    lines.push(`Roll: ${record.id}`);
    lines.push(`Name: ${record.name}`);
    SUBJECTS.forEach((subject, index) => {
      lines.push(`${subject}: ${record.marks[index].toFixed(2)}`);
    });
    lines.push(`Total: ${record.total.toFixed(2)}`);
    lines.push(`Percentage: ${record.percentage.toFixed(2)}`);
    lines.push(`Grade: ${record.grade}`);
    lines.push("-----------------");
  }

  return lines.map((line) => `${line}\n`).join("");
}

export interface ExportTargets {
  csvPath: string;
  reportPath: string;
  generatedAt?: Date;   // Defaults to now
}

/**
 * Write both export artifacts from a snapshot. The store is not touched.
 * An empty snapshot fails with EmptyStore and writes nothing.
 */
export async function exportSnapshot(
  records: readonly StudentRecord[],
  targets: ExportTargets,
): Promise<Result<void>> {
  if (records.length === 0) {
    return fail("EmptyStore", "No records to export");
  }

  const csv = renderCsv(records);
  const report = renderReport(records, targets.generatedAt ?? new Date());

  try {
    await ensureParentDir(targets.csvPath);
    await writeFile(targets.csvPath, csv, "utf8");
    await ensureParentDir(targets.reportPath);
    await writeFile(targets.reportPath, report, "utf8");
    return done();
  } catch (error) {
    return ioFailure("write export files", error);
  }
}

/**
 * Byte value of a single-character obfuscation key, or undefined when the key
 * is not exactly one character in the 0..255 range.
 */
export function xorKeyByte(key: string): number | undefined {
  if (key.length !== 1) return undefined;
  const code = key.charCodeAt(0);
  return code <= 0xff ? code : undefined;
}

/**
 * XOR every byte of a file with a single-character key, in place.
 *
 * The transform is its own inverse: running it twice with the same key gives
 * back the original bytes. Nothing records whether a file is currently
 * obfuscated; the caller has to remember.
 */
export async function obfuscateFile(path: string, key: string): Promise<Result<void>> {
  const keyByte = xorKeyByte(key);
  if (keyByte === undefined) {
    return fail("InvalidInput", "Obfuscation key must be a single character");
  }

  let handle: FileHandle;
  try {
    handle = await open(path, "r+");
  } catch (error) {
    return ioFailure(`open ${path}`, error);
  }

  let outcome: Result<void>;
  try {
    const buffer = Buffer.alloc(XOR_CHUNK_SIZE);
    let position = 0;
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, XOR_CHUNK_SIZE, position);
      if (bytesRead === 0) break;
      for (let i = 0; i < bytesRead; i++) {
        buffer[i] ^= keyByte;
      }
      // Write the chunk back over the bytes it came from
      await handle.write(buffer, 0, bytesRead, position);
      position += bytesRead;
    }
    outcome = done();
  } catch (error) {
    outcome = ioFailure(`obfuscate ${path}`, error);
  }

  // Always release the handle; a failed close only matters if nothing failed before it
  try {
    await handle.close();
  } catch (error) {
    if (outcome.ok) outcome = ioFailure(`close ${path}`, error);
  }
  return outcome;
}
