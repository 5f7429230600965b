// This file defines the "shape" of every data structure the ledger passes around.
// Stores, queries and the facade all agree on these types.

// The three fixed subjects, in the order their marks are stored on disk.
// `as const` keeps the literal strings so Subject below is a union, not string.
export const SUBJECTS = ["Math", "Science", "English"] as const;
export type Subject = typeof SUBJECTS[number];

// Highest mark a single subject can carry.
export const MAX_MARK = 100;

// Marks are a fixed-length tuple, one entry per subject (same order as SUBJECTS).
export type Marks = [number, number, number];

// Letter grade ladder, best first.
export const GRADES = ["A+", "A", "B", "C", "D", "F"] as const;
export type Grade = typeof GRADES[number];

// StudentRecord is the core data structure: one line of the record file.
export interface StudentRecord {
  id: number;        // Roll number, unique across the store, supplied by the caller
  name: string;      // Display name, 1..99 characters
  marks: Marks;      // Raw subject marks, each 0..100

  // Derived fields. Always recomputed from marks, never trusted from disk.
  total: number;       // Sum of marks
  percentage: number;  // total as a share of the maximum possible (0..100)
  grade: Grade;        // Letter grade from the percentage
}

// StudentInput is what a caller supplies to create a record.
// Derived fields are absent: withDerived fills them in.
export interface StudentInput {
  id: number;
  name: string;
  marks: Marks;
}

// StudentPatch describes an update. Any field left undefined (or a blank name)
// keeps its current value.
export interface StudentPatch {
  name?: string;
  marks?: Partial<Record<Subject, number>>;
}

// Roles recognised by the credential file. Always stored upper case.
export const ROLES = ["ADMIN", "STAFF", "PRINCIPAL", "STUDENT", "GUEST"] as const;
export type Role = typeof ROLES[number];

// One line of the credential file.
export interface CredentialEntry {
  username: string;  // Single token, no whitespace
  password: string;  // Single token, stored in clear text
  role: Role;
}

// Session is handed out by a successful login and passed explicitly into every
// facade operation. There is no process-wide "current user".
export interface Session {
  username: string;
  role: Role;
}

// LogLevel controls what gets logged. "silent" suppresses everything.
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

// AppConfig holds all application configuration, loaded from the environment.
export interface AppConfig {
  studentFile: string;      // Record file, one student per line
  credentialFile: string;   // Username/password/role file
  backupFile: string;       // Destination of backup, source of restore
  csvFile: string;          // CSV export target
  reportFile: string;       // Plain-text report target
  historyDbPath?: string;   // Optional SQLite audit trail; history is off when unset
  logLevel: LogLevel;
}
