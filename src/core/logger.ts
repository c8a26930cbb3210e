/**
 * Scoped logging for the datasets server
 * Every record goes to the console and, unless LOG_FILE is empty, to a rotated log file.
 * LOG_FORMAT=json switches both to one JSON object per line.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, statSync, unlinkSync } from "fs";
import { dirname } from "path";
import { env, type LogLevel } from "../config/env.ts";

const MAX_LOG_SIZE_BYTES = 10 * 1024 * 1024; // 10MB
const MAX_LOG_FILES = 5;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  /** Logs the error's message and stack alongside the message */
  error(message: string, error?: unknown): void;
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel = env.logLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function formatRecord(record: LogRecord, format: "text" | "json" = env.logFormat): string {
  if (format === "json") {
    return JSON.stringify({ ...record, level: record.level.toUpperCase() });
  }
  const line = `[${record.timestamp}] [${record.level.toUpperCase()}] [${record.scope}] ${record.message}`;
  return record.data === undefined ? line : `${line} ${JSON.stringify(record.data)}`;
}

export function describeError(error: unknown): { error: string; stack?: string } {
  return error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };
}

/**
 * app.log -> app.log.1 -> ... -> app.log.5, dropping the oldest
 */
function rotate(file: string): void {
  if (!existsSync(file) || statSync(file).size < MAX_LOG_SIZE_BYTES) return;

  const oldest = `${file}.${MAX_LOG_FILES}`;
  if (existsSync(oldest)) unlinkSync(oldest);
  for (let i = MAX_LOG_FILES - 1; i >= 1; i--) {
    if (existsSync(`${file}.${i}`)) renameSync(`${file}.${i}`, `${file}.${i + 1}`);
  }
  renameSync(file, `${file}.1`);
}

function appendToLogFile(line: string, file: string = env.logFile): void {
  if (!file) return;
  try {
    mkdirSync(dirname(file), { recursive: true });
    rotate(file);
    appendFileSync(file, line + "\n");
  } catch (e) {
    console.error("Failed to write to log file:", e);
  }
}

function write(level: LogLevel, scope: string, message: string, data: unknown): void {
  if (!isLevelEnabled(level)) return;

  const record: LogRecord = { timestamp: new Date().toISOString(), level, scope, message };
  if (data !== undefined) record.data = data;

  const line = formatRecord(record);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
  appendToLogFile(line);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write("debug", scope, message, data),
    info: (message, data) => write("info", scope, message, data),
    warn: (message, data) => write("warn", scope, message, data),
    error: (message, error) => write("error", scope, message, error === undefined ? undefined : describeError(error)),
  };
}

/**
 * Last lines of the current log file, oldest first
 */
export function getRecentLogs(lines: number = 100, file: string = env.logFile): string[] {
  if (!file || !existsSync(file)) return [];
  const content = readFileSync(file, "utf-8").trim();
  return content ? content.split("\n").slice(-lines) : [];
}
