import { appendFile, writeFile } from "node:fs/promises";

import { ensureParentDir, readTextIfExists, replaceFile } from "./files.ts";
import type { Logger } from "./logger.ts";
import { fail, hasErrorCode, ioFailure, ok } from "./result.ts";
import type { Failure, Result } from "./result.ts";
import type { CredentialEntry, Role } from "./types.ts";
import { isCredentialToken, parseRole } from "./validator.ts";

// Written on first run when no credential file exists yet.
export const DEFAULT_CREDENTIALS: readonly CredentialEntry[] = [
  { username: "admin", password: "admin", role: "ADMIN" },
  { username: "staff", password: "staff", role: "STAFF" },
  { username: "guest", password: "guest", role: "GUEST" },
  { username: "principal", password: "principal", role: "PRINCIPAL" },
  { username: "student", password: "student", role: "STUDENT" },
];

// One username/password/role triple exactly as it sits in the file.
// The role stays a raw token: lines with a role outside the five are
// ignored for login but survive every rewrite.
interface StoredLine {
  username: string;
  password: string;
  role: string;
}

function formatEntry(entry: StoredLine): string {
  return `${entry.username} ${entry.password} ${entry.role}\n`;
}

// Split the file into whitespace-separated triples.
// Tokens that do not fill a last triple are returned as `rest`.
function readLines(content: string): { lines: StoredLine[]; rest: string[] } {
  const tokens = content.split(/\s+/).filter(Boolean);
  const lines: StoredLine[] = [];

  let i = 0;
  for (; i + 2 < tokens.length; i += 3) {
    lines.push({ username: tokens[i], password: tokens[i + 1], role: tokens[i + 2] });
  }
  return { lines, rest: tokens.slice(i) };
}

/**
 * Parse the credential file: whitespace-separated username/password/role
 * triples. A triple with an unknown role is skipped; an incomplete last
 * triple is ignored.
 */
export function parseCredentials(content: string): CredentialEntry[] {
  const entries: CredentialEntry[] = [];

  for (const line of readLines(content).lines) {
    const role = parseRole(line.role);
    if (!role) continue;   // e.g. "old pw TEACHER"
    entries.push({ username: line.username, password: line.password, role });
  }
  return entries;
}

/**
 * Whole-file store for login credentials.
 *
 * Lookups honor the first matching line. Reset and remove touch every line
 * with the username, so duplicate usernames all change together while only
 * the first one ever logs in.
 */
export class CredentialStore {
  #path: string;
  #logger: Logger;

  constructor(path: string, logger: Logger) {
    this.#path = path;
    this.#logger = logger;
  }

  get path(): string {
    return this.#path;
  }

  /**
   * Write the default entries if the credential file does not exist yet.
   * Returns true when the defaults were written.
   */
  async ensureDefaults(): Promise<Result<boolean>> {
    try {
      await ensureParentDir(this.#path);
      // "wx" fails if the file exists, so an existing file is never touched
      await writeFile(this.#path, DEFAULT_CREDENTIALS.map(formatEntry).join(""), { encoding: "utf8", flag: "wx" });
      this.#logger.info("Default credentials created", { path: this.#path });
      return ok(true);
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        return ok(false);
      }
      return this.#failure("create", error);
    }
  }

  /**
   * Every entry with a known role, in file order. A missing file has no entries.
   */
  async list(): Promise<Result<CredentialEntry[]>> {
    try {
      const content = await readTextIfExists(this.#path);
      return ok(content === undefined ? [] : parseCredentials(content));
    } catch (error) {
      return this.#failure("read", error);
    }
  }

  /**
   * Check a username/password pair. The first exact match wins.
   */
  async check(username: string, password: string): Promise<Result<Role>> {
    const listed = await this.list();
    if (!listed.ok) return listed;

    const match = listed.value.find((entry) => entry.username === username && entry.password === password);
    if (!match) {
      return fail("InvalidCredentials", "Invalid username or password");
    }
    return ok(match.role);
  }

  /**
   * Append a new entry. The role is upper-cased; usernames are not deduplicated.
   */
  async add(username: string, password: string, role: string): Promise<Result<CredentialEntry>> {
    if (!isCredentialToken(username) || !isCredentialToken(password)) {
      return fail("InvalidInput", "Username and password must be single words without spaces");
    }
    const parsedRole = parseRole(role);
    if (!parsedRole) {
      return fail("InvalidInput", `Unknown role "${role}"`);
    }

    const entry: CredentialEntry = { username, password, role: parsedRole };
    try {
      await ensureParentDir(this.#path);
      await appendFile(this.#path, formatEntry(entry), "utf8");
      return ok(entry);
    } catch (error) {
      return this.#failure("append to", error);
    }
  }

  /**
   * Set a new password on every line with this username, whatever its role.
   * Fails with NotFound, leaving the file untouched, when there is none.
   */
  async resetPassword(username: string, newPassword: string): Promise<Result<number>> {
    if (!isCredentialToken(newPassword)) {
      return fail("InvalidInput", "Password must be a single word without spaces");
    }
    return this.#rewrite(username, (entry) => ({ ...entry, password: newPassword }));
  }

  /**
   * Drop every line with this username.
   * Fails with NotFound, leaving the file untouched, when there is none.
   */
  async remove(username: string): Promise<Result<number>> {
    return this.#rewrite(username, () => undefined);
  }

  // Read, transform the lines with this username (undefined drops one),
  // write back. Every other line is written back as it was read, unknown
  // roles included. Resolves to the number of lines that matched.
  async #rewrite(
    username: string,
    transform: (line: StoredLine) => StoredLine | undefined,
  ): Promise<Result<number>> {
    let content: string | undefined;
    try {
      content = await readTextIfExists(this.#path);
    } catch (error) {
      return this.#failure("read", error);
    }
    const { lines, rest } = readLines(content ?? "");

    let matched = 0;
    const next: StoredLine[] = [];
    for (const line of lines) {
      if (line.username !== username) {
        next.push(line);
        continue;
      }
      matched++;
      const replaced = transform(line);
      if (replaced) next.push(replaced);
    }

    // Nothing to change: leave the file exactly as it is
    if (matched === 0) {
      return fail("NotFound", `User "${username}" not found`);
    }

    // A dangling partial triple is kept at the end, as it was
    const tail = rest.length > 0 ? `${rest.join(" ")}\n` : "";
    try {
      await replaceFile(this.#path, next.map(formatEntry).join("") + tail);
      return ok(matched);
    } catch (error) {
      return this.#failure("write", error);
    }
  }

  #failure(action: string, error: unknown): Failure {
    const failure = ioFailure(`${action} ${this.#path}`, error);
    this.#logger.error("Credential file operation failed", { path: this.#path, error: failure.error.message });
    return failure;
  }
}
