// Every engine operation returns a Result instead of throwing.
// Callers check the `ok` field to know which case they hold:
//
//   const result = await store.loadAll();
//   if (!result.ok) return report(result.error.message);
//   use(result.value);

/**
 * Failure categories the engine can report.
 *
 * - IOError: a file could not be opened, read or written
 * - MalformedLine: a stored line could not be decoded (skipped during loads)
 * - NotFound: an id, username or file is absent
 * - DuplicateId: a new record reuses an existing id
 * - InvalidInput: caller input failed validation
 * - InvalidRange: range bounds are not finite numbers
 * - EmptyStore: the operation needs at least one record
 * - InvalidCredentials: no credential entry matched
 * - PermissionDenied: the session's role may not do this
 * - Cancelled: a destructive operation was not confirmed
 */
export type ErrorKind =
  | "IOError"
  | "MalformedLine"
  | "NotFound"
  | "DuplicateId"
  | "InvalidInput"
  | "InvalidRange"
  | "EmptyStore"
  | "InvalidCredentials"
  | "PermissionDenied"
  | "Cancelled";

export interface EngineError {
  kind: ErrorKind;
  message: string;  // Human-readable reason, safe to show to the user
}

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: EngineError };
export type Result<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

// Success without a payload, for writes.
export function done(): Success<void> {
  return { ok: true, value: undefined };
}

export function fail(kind: ErrorKind, message: string): Failure {
  return { ok: false, error: { kind, message } };
}

// Same message extraction used across the codebase for unknown thrown values.
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Node's filesystem errors carry a string code such as "ENOENT" or "EEXIST".
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function isNotFoundError(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}

// Convert a caught filesystem error into a Failure.
// `action` reads like "read students.txt" and prefixes the message.
export function ioFailure(action: string, error: unknown): Failure {
  if (isNotFoundError(error)) {
    return fail("NotFound", `Could not ${action}: file not found`);
  }
  return fail("IOError", `Could not ${action}: ${errorMessage(error)}`);
}
