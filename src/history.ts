// libsql client: SQLite with a local file or in-memory database.
// Its native engine comes from npm as a per-platform package.
import { createClient } from "@libsql/client";
import type { Client, Row } from "@libsql/client";
import { randomUUID } from "node:crypto";

import { ensureParentDir } from "./files.ts";
import type { Logger } from "./logger.ts";
import { errorMessage } from "./result.ts";
import type { Session } from "./types.ts";

/**
 * One recorded operation, as stored in the activity table.
 */
export interface ActivityEntry {
  id: string;              // UUID
  occurredAt: string;      // ISO timestamp
  actor: string;           // Username of the session that acted
  role: string;            // Role at the time
  action: string;          // e.g. "add", "restore", "manageCredentials"
  target: string | null;   // Roll number, username or file path, when there is one
  status: "ok" | "failed";
  error: string | null;    // Failure message, NULL on success
}

// Column values come back as null | string | number | bigint | ArrayBuffer.
// Every column we read was written as TEXT, so String() is a no-op for them.
function text(row: Row, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? "" : String(value);
}

function nullableText(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : String(value);
}

/**
 * SQLite-backed audit trail of every mutating operation.
 *
 * A failed write is logged, never thrown: the operation being recorded has
 * already happened.
 */
export class ActivityLog {
  #client: Client;    // The libsql connection
  #logger: Logger;    // Logger for database failures

  private constructor(client: Client, logger: Logger) {
    this.#client = client;
    this.#logger = logger;
  }

  /**
   * Open (or create) the history database, creating its directory first.
   * Rejects when the database cannot be opened or its schema created.
   *
   * @param path - SQLite file, e.g. "data/history.db", or ":memory:"
   */
  static async open(path: string, logger: Logger): Promise<ActivityLog> {
    // STEP 1: Make sure the directory exists (nothing to do for ":memory:")
    if (path !== ":memory:") {
      await ensureParentDir(path);
    }

    // STEP 2: Connect. A "file:" URL creates the file if it is missing
    const client = createClient({ url: path === ":memory:" ? ":memory:" : `file:${path}` });

    // STEP 3: Create the schema, closing the connection if that fails
    const log = new ActivityLog(client, logger);
    try {
      await log.#init();
    } catch (error) {
      client.close();
      throw error;
    }
    return log;
  }

  // CREATE TABLE IF NOT EXISTS is idempotent, so this runs on every open.
  async #init() {
    await this.#client.executeMultiple(`
      CREATE TABLE IF NOT EXISTS activity (
        id TEXT PRIMARY KEY,          -- UUID
        occurred_at TEXT NOT NULL,    -- ISO timestamp
        actor TEXT NOT NULL,          -- username
        role TEXT NOT NULL,
        action TEXT NOT NULL,
        target TEXT,                  -- roll number, username or path (NULL if none)
        status TEXT NOT NULL,         -- "ok" or "failed"
        error TEXT                    -- failure message (NULL on success)
      );
      CREATE INDEX IF NOT EXISTS activity_occurred_at ON activity (occurred_at);
    `);
  }

  /**
   * Record one operation outcome. Never rejects.
   */
  async record(params: {
    session: Session;
    action: string;
    target?: string;
    error?: string;
  }): Promise<void> {
    try {
      await this.#client.execute({
        sql: `INSERT INTO activity (id, occurred_at, actor, role, action, target, status, error)
              VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        args: [
          randomUUID(),
          new Date().toISOString(),
          params.session.username,
          params.session.role,
          params.action,
          params.target ?? null,
          // No error message means the operation succeeded
          params.error === undefined ? "ok" : "failed",
          params.error ?? null,
        ],
      });
    } catch (error) {
      this.#logger.error("Failed to record activity", {
        action: params.action,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Most recent entries first.
   */
  async recent(limit = 20): Promise<ActivityEntry[]> {
    // rowid breaks ties between entries written in the same millisecond
    const result = await this.#client.execute({
      sql: `SELECT id, occurred_at, actor, role, action, target, status, error
            FROM activity ORDER BY occurred_at DESC, rowid DESC LIMIT ?`,
      args: [limit],
    });

    // Convert snake_case columns into the camelCase entry shape
    return result.rows.map((row): ActivityEntry => ({
      id: text(row, "id"),
      occurredAt: text(row, "occurred_at"),
      actor: text(row, "actor"),
      role: text(row, "role"),
      action: text(row, "action"),
      target: nullableText(row, "target"),
      status: text(row, "status") === "ok" ? "ok" : "failed",
      error: nullableText(row, "error"),
    }));
  }

  close() {
    try {
      this.#client.close();
    } catch (error) {
      this.#logger.warn("Failed to close history database", { error: errorMessage(error) });
    }
  }
}
