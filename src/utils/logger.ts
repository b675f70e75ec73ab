import { appendFileSync, mkdirSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_FILE_NAME = "packrat.log";

let currentLevel: LogLevel = "info";
let logFile: string | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_PRIORITY;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror log lines (without colours) into `<logDir>/packrat.log`.
 * Pass null to stop writing to the file.
 */
export function setLogDirectory(logDir: string | null): void {
  if (logDir === null) {
    logFile = null;
    return;
  }
  mkdirSync(logDir, { recursive: true });
  logFile = path.join(logDir, LOG_FILE_NAME);
}

export function getLogFile(): string | null {
  return logFile;
}

/**
 * Last `lines` lines of `<logDir>/packrat.log`, or null when there is no
 * log file yet.
 */
export async function readLogTail(logDir: string, lines: number): Promise<string[] | null> {
  let content: string;
  try {
    content = await readFile(path.join(logDir, LOG_FILE_NAME), "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }

  const all = content.split("\n");
  if (all[all.length - 1] === "") all.pop();
  return lines > 0 ? all.slice(-lines) : [];
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return ` ${data.message}`;
  }
  if (typeof data === "object") {
    return ` ${JSON.stringify(data, null, 2)}`;
  }
  return ` ${String(data)}`;
}

function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = formatTimestamp();
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);

  return `${color}[${timestamp}] ${levelStr}${RESET} ${message}${formatData(data)}`;
}

function writeToFile(level: LogLevel, message: string, data?: unknown): void {
  if (!logFile) return;
  const line = `[${formatTimestamp()}] ${level.toUpperCase().padEnd(5)} ${message}${formatData(data)}\n`;
  try {
    appendFileSync(logFile, line);
  } catch (err) {
    // Stop mirroring rather than failing every subsequent log call
    logFile = null;
    console.error(formatMessage("error", "Log file disabled after write failure", err));
  }
}

export function debug(message: string, data?: unknown): void {
  if (shouldLog("debug")) {
    console.log(formatMessage("debug", message, data));
    writeToFile("debug", message, data);
  }
}

export function info(message: string, data?: unknown): void {
  if (shouldLog("info")) {
    console.log(formatMessage("info", message, data));
    writeToFile("info", message, data);
  }
}

export function warn(message: string, data?: unknown): void {
  if (shouldLog("warn")) {
    console.warn(formatMessage("warn", message, data));
    writeToFile("warn", message, data);
  }
}

export function error(message: string, data?: unknown): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message, data));
    writeToFile("error", message, data);
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
