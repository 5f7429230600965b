import { fail } from "./result.ts";
import type { Failure } from "./result.ts";
import type { Role, Session } from "./types.ts";

// Every facade operation maps to one of these actions.
export type Action =
  | "view"
  | "viewOwn"
  | "search"
  | "add"
  | "update"
  | "delete"
  | "deleteAll"
  | "sort"
  | "statistics"
  | "export"
  | "backup"
  | "restore"
  | "obfuscate"
  | "manageCredentials";

// Which roles may perform each action.
// STUDENT only ever sees their own record.
const PERMISSIONS: Record<Action, readonly Role[]> = {
  view: ["ADMIN", "STAFF", "PRINCIPAL", "GUEST"],
  viewOwn: ["ADMIN", "STAFF", "PRINCIPAL", "GUEST", "STUDENT"],
  search: ["ADMIN", "STAFF", "PRINCIPAL", "GUEST"],
  add: ["ADMIN", "STAFF"],
  update: ["ADMIN", "STAFF"],
  delete: ["ADMIN", "STAFF"],
  deleteAll: ["ADMIN"],
  sort: ["ADMIN", "STAFF"],
  statistics: ["ADMIN", "STAFF", "PRINCIPAL"],
  export: ["ADMIN", "STAFF", "PRINCIPAL", "GUEST"],
  backup: ["ADMIN", "STAFF", "PRINCIPAL", "GUEST"],
  restore: ["ADMIN", "STAFF", "PRINCIPAL", "GUEST"],
  obfuscate: ["ADMIN"],
  manageCredentials: ["ADMIN"],
};

/**
 * May this role perform the action?
 */
export function can(role: Role, action: Action): boolean {
  return PERMISSIONS[action].includes(role);
}

/**
 * Returns a PermissionDenied failure when the session may not perform the
 * action, undefined when it may.
 */
export function authorize(session: Session, action: Action): Failure | undefined {
  if (can(session.role, action)) return undefined;
  return fail("PermissionDenied", `Permission denied: ${session.role} cannot ${action}`);
}
