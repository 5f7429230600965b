import { appendFile } from "node:fs/promises";

import { decodeRecord, encodeRecord } from "./codec.ts";
import { ensureParentDir, readTextIfExists, replaceFile } from "./files.ts";
import type { Logger } from "./logger.ts";
import { done, ioFailure, ok } from "./result.ts";
import type { Result } from "./result.ts";
import type { StudentRecord } from "./types.ts";

/**
 * Whole-file store for student records.
 *
 * One record per line in `id|name|m1|m2|m3` form. There is no cache: every
 * call re-reads the file, so callers always see the latest persisted state.
 * The store does not enforce id uniqueness on append; callers check
 * `exists` first (see addStudent in students.ts).
 */
export class RecordStore {
  #path: string;
  #logger: Logger;

  /**
   * @param path - Record file, e.g. "students.txt". A missing file is an empty store.
   */
  constructor(path: string, logger: Logger) {
    this.#path = path;
    this.#logger = logger;
  }

  get path(): string {
    return this.#path;
  }

  /**
   * Read every record in file order.
   * Lines that fail to decode are skipped; they never surface as errors.
   *
   * The file is decoded as UTF-8. Bytes that are not valid UTF-8 load as
   * U+FFFD, so the next overwriteAll (any update, delete or persisted sort)
   * stores the replacement character instead of the original bytes, also in
   * records nobody edited. Valid UTF-8 names round-trip unchanged.
   */
  async loadAll(): Promise<Result<StudentRecord[]>> {
    // STEP 1: Read the whole file (undefined when it does not exist yet)
    let content: string | undefined;
    try {
      content = await readTextIfExists(this.#path);
    } catch (error) {
      const failure = ioFailure(`read ${this.#path}`, error);
      this.#logger.error("Failed to load student records", { path: this.#path, error: failure.error.message });
      return failure;
    }

    // A store that was never written is simply empty
    if (content === undefined) return ok([]);

    // STEP 2: Decode line by line, counting what we had to skip
    const records: StudentRecord[] = [];
    let skipped = 0;
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) continue;   // Blank lines (e.g. the final newline)
      const decoded = decodeRecord(line);
      if (decoded.ok) {
        records.push(decoded.value);
      } else {
        skipped++;
      }
    }

    // STEP 3: Skipped lines are only worth a debug note, never an error
    if (skipped > 0) {
      this.#logger.debug("Skipped malformed record lines", { path: this.#path, skipped });
    }
    return ok(records);
  }

  /**
   * Is there a record with this id? Scans a fresh load.
   */
  async exists(id: number): Promise<Result<boolean>> {
    const loaded = await this.loadAll();
    if (!loaded.ok) return loaded;
    return ok(loaded.value.some((record) => record.id === id));
  }

  /**
   * Append one record at the end of the file.
   */
  async append(record: StudentRecord): Promise<Result<void>> {
    try {
      // The first append also creates the file (and its directory)
      await ensureParentDir(this.#path);
      await appendFile(this.#path, `${encodeRecord(record)}\n`, "utf8");
      return done();
    } catch (error) {
      const failure = ioFailure(`append to ${this.#path}`, error);
      this.#logger.error("Failed to append student record", { id: record.id, error: failure.error.message });
      return failure;
    }
  }

  /**
   * Replace the whole file with `records`, in the given order.
   * This is the only mutation path for update, delete and sort-persist.
   */
  async overwriteAll(records: readonly StudentRecord[]): Promise<Result<void>> {
    // Every line ends in "\n", including the last one
    const content = records.map((record) => `${encodeRecord(record)}\n`).join("");
    try {
      await replaceFile(this.#path, content);
      return done();
    } catch (error) {
      const failure = ioFailure(`write ${this.#path}`, error);
      this.#logger.error("Failed to rewrite student records", { count: records.length, error: failure.error.message });
      return failure;
    }
  }

  /**
   * Remove every record (the file is kept, empty).
   */
  async clear(): Promise<Result<void>> {
    return this.overwriteAll([]);
  }
}
