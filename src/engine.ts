import { CredentialStore } from "./credential_store.ts";
import { ActivityLog } from "./history.ts";
import { createLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";
import { backupFile, exportSnapshot, obfuscateFile, restoreFile } from "./maintenance.ts";
import { search, sortRecords } from "./query.ts";
import type { SearchCriteria, SortKey } from "./query.ts";
import { RecordStore } from "./record_store.ts";
import { errorMessage, fail, ok } from "./result.ts";
import type { Result } from "./result.ts";
import { authorize } from "./session.ts";
import type { Action } from "./session.ts";
import { computeStatistics } from "./statistics.ts";
import type { ClassStatistics } from "./statistics.ts";
import {
  addStudent,
  deleteAllStudents,
  deleteStudent,
  findOwnRecord,
  persistOrder,
  updateStudent,
} from "./students.ts";
import type { Confirmation } from "./students.ts";
import type { AppConfig, CredentialEntry, Session, StudentPatch, StudentRecord } from "./types.ts";

/**
 * Everything the facade needs. Paths are the files the maintenance utilities
 * write next to the record store.
 */
export interface LedgerDeps {
  records: RecordStore;
  credentials: CredentialStore;
  backupPath: string;
  csvPath: string;
  reportPath: string;
  logger: Logger;
  history?: ActivityLog;   // Audit trail; omitted means no history
}

/**
 * The API the menu layer talks to.
 *
 * Every method takes the caller's Session (except login), checks the role,
 * runs the operation against freshly loaded files and returns a Result.
 * Mutations are logged and, when history is enabled, recorded.
 * Nothing here writes to stdout or ends the process.
 */
export class StudentLedger {
  #deps: LedgerDeps;
  #logger: Logger;

  constructor(deps: LedgerDeps) {
    this.#deps = deps;
    this.#logger = deps.logger;
  }

  /**
   * Check credentials and hand back a session for later calls.
   */
  async login(username: string, password: string): Promise<Result<Session>> {
    const checked = await this.#deps.credentials.check(username, password);
    if (!checked.ok) {
      this.#logger.warn("Login failed", { username });
      return checked;
    }
    this.#logger.info("Login succeeded", { username, role: checked.value });
    return ok({ username, role: checked.value });
  }

  async listStudents(session: Session): Promise<Result<StudentRecord[]>> {
    return this.#read(session, "view", (records) => ok(records));
  }

  async search(session: Session, criteria: SearchCriteria): Promise<Result<StudentRecord[]>> {
    return this.#read(session, "search", (records) => search(records, criteria));
  }

  /**
   * The logged-in user's own record (by roll number or name).
   */
  async viewOwnRecord(session: Session): Promise<Result<StudentRecord>> {
    return this.#read(session, "viewOwn", (records) => {
      const record = findOwnRecord(records, session.username);
      return record ? ok(record) : fail("NotFound", `No record found for ${session.username}`);
    });
  }

  async statistics(session: Session): Promise<Result<ClassStatistics>> {
    return this.#read(session, "statistics", computeStatistics);
  }

  async addStudent(session: Session, input: unknown): Promise<Result<StudentRecord>> {
    // The roll number is only known once the input has been validated
    return this.#mutate(session, "add", (record) => String(record.id), () =>
      addStudent(this.#deps.records, input)
    );
  }

  async updateStudent(session: Session, id: number, patch: StudentPatch): Promise<Result<StudentRecord>> {
    return this.#mutate(session, "update", String(id), () => updateStudent(this.#deps.records, id, patch));
  }

  async deleteStudent(session: Session, id: number): Promise<Result<StudentRecord>> {
    return this.#mutate(session, "delete", String(id), () => deleteStudent(this.#deps.records, id));
  }

  async deleteAllStudents(session: Session, confirmation: Confirmation): Promise<Result<void>> {
    return this.#mutate(session, "deleteAll", this.#deps.records.path, () =>
      deleteAllStudents(this.#deps.records, confirmation)
    );
  }

  /**
   * Sorted snapshot. With `persist: true` the new order is also written back;
   * otherwise the file is untouched.
   */
  async sort(session: Session, key: SortKey, options: { persist?: boolean } = {}): Promise<Result<StudentRecord[]>> {
    const sorted = await this.#read(session, "sort", (records) => ok(sortRecords(records, key)));
    if (!sorted.ok || !options.persist) return sorted;

    const ordered = sorted.value;
    return this.#mutate(session, "sort", key, async () => {
      const written = await persistOrder(this.#deps.records, ordered);
      return written.ok ? ok(ordered) : written;
    });
  }

  async exportRecords(session: Session, generatedAt?: Date): Promise<Result<void>> {
    const { csvPath, reportPath } = this.#deps;
    return this.#mutate(session, "export", csvPath, async () => {
      const loaded = await this.#deps.records.loadAll();
      if (!loaded.ok) return loaded;
      return exportSnapshot(loaded.value, { csvPath, reportPath, generatedAt });
    });
  }

  async backup(session: Session): Promise<Result<void>> {
    return this.#mutate(session, "backup", this.#deps.backupPath, () =>
      backupFile(this.#deps.records.path, this.#deps.backupPath)
    );
  }

  async restore(session: Session, confirmation: Confirmation): Promise<Result<void>> {
    return this.#mutate(session, "restore", this.#deps.backupPath, () =>
      restoreFile(this.#deps.backupPath, this.#deps.records.path, confirmation)
    );
  }

  /**
   * XOR the record file with `key`. Call again with the same key to undo.
   * While the file is obfuscated, loads will find no valid records.
   */
  async toggleObfuscation(session: Session, key: string): Promise<Result<void>> {
    return this.#mutate(session, "obfuscate", this.#deps.records.path, () =>
      obfuscateFile(this.#deps.records.path, key)
    );
  }

  async addUser(session: Session, username: string, password: string, role: string): Promise<Result<CredentialEntry>> {
    return this.#mutate(session, "manageCredentials", username, () =>
      this.#deps.credentials.add(username, password, role)
    );
  }

  async resetPassword(session: Session, username: string, newPassword: string): Promise<Result<number>> {
    return this.#mutate(session, "manageCredentials", username, () =>
      this.#deps.credentials.resetPassword(username, newPassword)
    );
  }

  async removeUser(session: Session, username: string): Promise<Result<number>> {
    return this.#mutate(session, "manageCredentials", username, () =>
      this.#deps.credentials.remove(username)
    );
  }

  close() {
    this.#deps.history?.close();
  }

  // Authorize, load a snapshot and run a read-only computation on it.
  async #read<T>(
    session: Session,
    action: Action,
    compute: (records: StudentRecord[]) => Result<T>,
  ): Promise<Result<T>> {
    const denied = authorize(session, action);
    if (denied) {
      this.#logger.warn("Permission denied", { username: session.username, action });
      return denied;
    }

    const loaded = await this.#deps.records.loadAll();
    if (!loaded.ok) return loaded;
    return compute(loaded.value);
  }

  // Authorize, run a mutation, then log and record its outcome.
  // `target` names what was touched; a function derives it from the result,
  // so it is only known (and recorded) when the mutation succeeds.
  async #mutate<T>(
    session: Session,
    action: Action,
    target: string | ((value: T) => string) | undefined,
    run: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    const { history } = this.#deps;
    const fixedTarget = typeof target === "function" ? undefined : target;

    const denied = authorize(session, action);
    if (denied) {
      this.#logger.warn("Permission denied", { username: session.username, action });
      await history?.record({ session, action, target: fixedTarget, error: denied.error.message });
      return denied;
    }

    const result = await run();

    if (result.ok) {
      const resolved = typeof target === "function" ? target(result.value) : target;
      this.#logger.info("Operation completed", { username: session.username, action, target: resolved });
      await history?.record({ session, action, target: resolved });
    } else {
      this.#logger.warn("Operation failed", {
        username: session.username,
        action,
        target: fixedTarget,
        kind: result.error.kind,
        error: result.error.message,
      });
      await history?.record({ session, action, target: fixedTarget, error: result.error.message });
    }
    return result;
  }
}

/**
 * Build a ledger from configuration: stores on the configured paths, the
 * history database when one is configured, and the default credentials on
 * first run.
 */
export async function createLedger(config: AppConfig, logger?: Logger): Promise<StudentLedger> {
  const log = logger ?? createLogger(config.logLevel);

  const credentials = new CredentialStore(config.credentialFile, log);
  const seeded = await credentials.ensureDefaults();
  if (!seeded.ok) {
    // Login will fail until the file is fixed, but the ledger is still usable
    log.error("Could not create default credentials", { error: seeded.error.message });
  }

  const history = config.historyDbPath ? await openHistory(config.historyDbPath, log) : undefined;

  return new StudentLedger({
    records: new RecordStore(config.studentFile, log),
    credentials,
    backupPath: config.backupFile,
    csvPath: config.csvFile,
    reportPath: config.reportFile,
    logger: log,
    history,
  });
}

// History is optional: a database that cannot be opened is logged and the
// ledger runs without it.
async function openHistory(path: string, logger: Logger): Promise<ActivityLog | undefined> {
  try {
    return await ActivityLog.open(path, logger);
  } catch (error) {
    logger.error("Could not open history database", { path, error: errorMessage(error) });
    return undefined;
  }
}
