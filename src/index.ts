// Public entry point: the facade, the stores and the pure helpers a menu layer
// (or another program) may want to call directly.

export { createLedger, StudentLedger } from "./engine.ts";
export type { LedgerDeps } from "./engine.ts";
export { loadConfig, parseConfig } from "./config.ts";
export { createLogger, Logger } from "./logger.ts";
export type { LogSink, MessageLevel } from "./logger.ts";

export { RecordStore } from "./record_store.ts";
export { CredentialStore, DEFAULT_CREDENTIALS, parseCredentials } from "./credential_store.ts";
export { ActivityLog } from "./history.ts";
export type { ActivityEntry } from "./history.ts";

export { decodeRecord, encodeRecord, DELIMITER } from "./codec.ts";
export { gradeFor, percentageOf, recompute, totalOf, withDerived, PASS_PERCENTAGE } from "./grading.ts";
export {
  addStudent,
  deleteAllStudents,
  deleteStudent,
  findOwnRecord,
  persistOrder,
  updateStudent,
} from "./students.ts";
export type { Confirmation } from "./students.ts";
export {
  findById,
  search,
  searchByGrade,
  searchByName,
  searchByPercentageRange,
  sortRecords,
} from "./query.ts";
export type { SearchCriteria, SortKey } from "./query.ts";
export { computeStatistics } from "./statistics.ts";
export type { ClassStatistics } from "./statistics.ts";
export {
  backupFile,
  exportSnapshot,
  obfuscateFile,
  renderCsv,
  renderReport,
  restoreFile,
  xorKeyByte,
  XOR_CHUNK_SIZE,
} from "./maintenance.ts";
export type { ExportTargets } from "./maintenance.ts";
export { authorize, can } from "./session.ts";
export type { Action } from "./session.ts";
export { isCredentialToken, parseRole, validatePatch, validateStudentInput, MAX_NAME_LENGTH } from "./validator.ts";
export type { ValidationResult } from "./validator.ts";

export { done, fail, ok } from "./result.ts";
export type { EngineError, ErrorKind, Failure, Result, Success } from "./result.ts";
export { GRADES, MAX_MARK, ROLES, SUBJECTS } from "./types.ts";
export type {
  AppConfig,
  CredentialEntry,
  Grade,
  LogLevel,
  Marks,
  Role,
  Session,
  StudentInput,
  StudentPatch,
  StudentRecord,
  Subject,
} from "./types.ts";
