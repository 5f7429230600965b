import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { withDerived } from "../src/grading.ts";
import { createLogger } from "../src/logger.ts";
import type { Logger, MessageLevel } from "../src/logger.ts";
import type { StudentRecord } from "../src/types.ts";

// A fresh temporary directory plus a cleanup function for `after`.
export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "student-ledger-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

// Logger that writes nowhere.
export function silentLogger(): Logger {
  return createLogger("silent");
}

// Logger that keeps every line it would have written.
export function capturingLogger(): { logger: Logger; lines: Array<{ level: MessageLevel; line: string }> } {
  const lines: Array<{ level: MessageLevel; line: string }> = [];
  const logger = createLogger("debug", (level, line) => {
    lines.push({ level, line });
  });
  return { logger, lines };
}

// Record whose three marks are all equal, so its percentage equals `mark`.
export function flatRecord(id: number, name: string, mark: number): StudentRecord {
  return withDerived(id, name, [mark, mark, mark]);
}
