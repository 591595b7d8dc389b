import { appendFileSync, writeFileSync } from "node:fs";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Level names as they appear in the log file. */
export type RecordLevel = "info" | "warning" | "error";

export type LogRecord = {
  timestamp: string;
  level: RecordLevel;
  message: string;
  [key: string]: unknown;
};

export type LogSink = (record: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const RECORD_LEVEL: Record<Exclude<LogLevel, "debug">, RecordLevel> = {
  info: "info",
  warn: "warning",
  error: "error",
};

let currentLevel: LogLevel = "info";
let verbose = true;
let sink: LogSink | null = null;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** Quiet mode hides debug, info and success lines on the console. The file sink is unaffected. */
export function setVerbose(on: boolean): void {
  verbose = on;
}

export function setLogSink(next: LogSink | null): void {
  sink = next;
}

/**
 * Truncate `path` and route every record to it as one JSON object per line.
 * Appends are synchronous so records from concurrent tasks never interleave.
 */
export function openLogFile(path: string): void {
  writeFileSync(path, "");
  setLogSink((record) => {
    appendFileSync(path, `${JSON.stringify(record)}\n`);
  });
}

export function closeLogFile(): void {
  setLogSink(null);
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function write(level: Exclude<LogLevel, "debug">, msg: string, data?: Record<string, unknown>): void {
  sink?.({ ...data, timestamp: new Date().toISOString(), level: RECORD_LEVEL[level], message: msg });
}

export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    if (verbose && shouldLog("debug")) console.debug(chalk.gray(formatMsg("debug", msg, data)));
  },
  info(msg: string, data?: Record<string, unknown>): void {
    if (!shouldLog("info")) return;
    if (verbose) console.info(formatMsg("info", msg, data));
    write("info", msg, data);
  },
  /** Info-level record, printed green. */
  success(msg: string, data?: Record<string, unknown>): void {
    if (!shouldLog("info")) return;
    if (verbose) console.info(chalk.green(formatMsg("info", msg, data)));
    write("info", msg, data);
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    if (!shouldLog("warn")) return;
    console.warn(chalk.yellow(formatMsg("warn", msg, data)));
    write("warn", msg, data);
  },
  error(msg: string, data?: Record<string, unknown>): void {
    if (!shouldLog("error")) return;
    console.error(chalk.red(formatMsg("error", msg, data)));
    write("error", msg, data);
  },
};
