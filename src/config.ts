import { config as loadDotenv } from "dotenv";
import { z } from "zod";

import { isNotFoundError } from "./result.ts";
import type { AppConfig } from "./types.ts";

// Every setting comes from the environment; defaults match a fresh
// checkout where all files sit in the working directory.
const EnvSchema = z.object({
  STUDENT_FILE: z.string().min(1).default("students.txt"),
  CREDENTIAL_FILE: z.string().min(1).default("credentials.txt"),
  BACKUP_FILE: z.string().min(1).default("students_backup.txt"),
  CSV_FILE: z.string().min(1).default("students.csv"),
  REPORT_FILE: z.string().min(1).default("report.txt"),
  // Unset (or empty) turns the activity history off
  HISTORY_DB_PATH: z.string().optional().transform((value) => value || undefined),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

/**
 * Validate an environment map into AppConfig.
 * Throws one Error listing every invalid variable.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    studentFile: vars.STUDENT_FILE,
    credentialFile: vars.CREDENTIAL_FILE,
    backupFile: vars.BACKUP_FILE,
    csvFile: vars.CSV_FILE,
    reportFile: vars.REPORT_FILE,
    historyDbPath: vars.HISTORY_DB_PATH,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Load .env (if present) into process.env, then validate.
 * A missing .env file is fine; any other problem reading it is not.
 */
export function loadConfig(path?: string): AppConfig {
  const result = loadDotenv(path ? { path } : undefined);
  if (result.error && !isNotFoundError(result.error)) {
    throw result.error;
  }
  return parseConfig(process.env);
}
