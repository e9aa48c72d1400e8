import { appendFileSync } from "node:fs";
import { log } from "@clack/prompts";
import { getLogFilePath } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface LogRecord {
  time: string;
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

// The raw-mode TUI owns stdout while it runs, so warnings and errors are
// journaled and replayed through clack once the screen is released.
// debug and info only reach the log file.
const journal: LogRecord[] = [];

const JOURNALED: ReadonlySet<LogLevel> = new Set(["warn", "error"]);

function write(record: LogRecord): void {
  if (JOURNALED.has(record.level)) {
    journal.push(record);
  }

  const file = getLogFilePath();
  if (!file) return;

  try {
    appendFileSync(file, JSON.stringify(record) + "\n", "utf-8");
  } catch (error) {
    // Surface the sink failure once replayed
    journal.push({
      time: new Date().toISOString(),
      level: "warn",
      scope: "logger",
      message: `Could not write log file ${file}: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

/**
 * Create a scoped logger
 */
export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel) => (message: string, fields?: LogFields) =>
    write({ time: new Date().toISOString(), level, scope, message, fields });

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/**
 * Warnings and errors written since the last drain
 */
export function getJournal(): readonly LogRecord[] {
  return journal;
}

/**
 * Print journaled warnings and errors through clack and empty the journal
 */
export function flushJournal(): void {
  for (const record of journal.splice(0, journal.length)) {
    const details = formatFields(record.fields);
    const line = details ? `${record.message} ${details}` : record.message;

    if (record.level === "error") {
      log.error(line);
    } else if (record.level === "warn") {
      log.warn(line);
    }
  }
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(" ");
}
