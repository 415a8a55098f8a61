/**
 * Application logging: structured JSONL file logger and console interceptor.
 *
 * Two things live here:
 *
 * 1. createAppLogger writes structured JSONL entries to daily log files
 *    under <data_dir>/logs/. Each file is named YYYY-MM-DD.jsonl and holds
 *    one JSON object per line with timestamp, level, message, and optional
 *    args. A new file starts each calendar day; old files are kept.
 *
 * 2. installConsoleLogging replaces console.log/info/warn/error/debug with
 *    interceptors that write a formatted, timestamped line to stderr and
 *    mirror the entry to the file logger when one is given. stdout carries
 *    the MCP protocol, so nothing here ever writes to it.
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";
import { stderr } from "node:process";
import { normalize } from "./normalize.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
}

export interface AppLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function toDateString(date: Date): string {
  return date.toISOString().split("T")[0];
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return normalize(value);
}

export function createAppLogger(dataDir: string): AppLogger {
  const logsDir = path.join(dataDir, "logs");
  fs.mkdirSync(logsDir, { recursive: true });

  function append(level: LogLevel, message: string, args: unknown[]): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(args.length > 0 ? { args: args.map(toSerializable) } : {}),
    } satisfies LogEntry);

    const filePath = path.join(logsDir, `${toDateString(new Date())}.jsonl`);
    fs.appendFileSync(filePath, `${line}\n`, "utf-8");
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      append("debug", message, args);
    },
    info(message: string, ...args: unknown[]): void {
      append("info", message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      append("warn", message, args);
    },
    error(message: string, ...args: unknown[]): void {
      append("error", message, args);
    },
  };
}

// ---------------------------------------------------------------------------
// Stderr formatting
// ---------------------------------------------------------------------------

/** ANSI color codes, used only when the stream is a TTY. */
const ANSI = {
  reset:  "\x1b[0m",
  dim:    "\x1b[2m",
  yellow: "\x1b[33m",
  red:    "\x1b[31m",
  cyan:   "\x1b[36m",
} as const;

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: "DBG",
  info:  "INF",
  warn:  "WRN",
  error: "ERR",
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: ANSI.dim,
  info:  ANSI.cyan,
  warn:  ANSI.yellow,
  error: ANSI.red,
};

/**
 * Format a log line. Colors only when the target stream is a TTY.
 */
export function formatLine(level: LogLevel, message: string, isTty: boolean, now = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace("T", " ");
  const prefix = LEVEL_PREFIX[level];

  if (!isTty) {
    return `${ts} [${prefix}] ${message}`;
  }
  return `${ANSI.dim}${ts}${ANSI.reset} ${LEVEL_COLOR[level]}[${prefix}]${ANSI.reset} ${message}`;
}

// ---------------------------------------------------------------------------
// Console intercept
// ---------------------------------------------------------------------------

export interface LogStream {
  write(line: string): unknown;
  isTTY?: boolean;
}

export interface ConsoleLoggingOptions {
  /** Entries below this level are dropped. Default: "info". */
  level?: LogLevel;
  /** Mirror target. Omit to log to the stream only. */
  logger?: AppLogger;
  /** Defaults to process.stderr. */
  stream?: LogStream;
}

type ConsoleMethod = "log" | "info" | "debug" | "warn" | "error";

const CONSOLE_METHODS: ConsoleMethod[] = ["log", "info", "debug", "warn", "error"];

const CONSOLE_LEVELS: Record<ConsoleMethod, LogLevel> = {
  log: "info",
  info: "info",
  debug: "debug",
  warn: "warn",
  error: "error",
};

let restoreInstalled: (() => void) | undefined;

/**
 * Intercept console.* calls. Returns a function that puts the original
 * methods back. Installing twice replaces the first installation.
 */
export function installConsoleLogging(options: ConsoleLoggingOptions = {}): () => void {
  restoreInstalled?.();

  const threshold = levelRank(options.level ?? "info");
  const stream: LogStream = options.stream ?? stderr;
  const isTty = stream.isTTY ?? false;
  const logger = options.logger;

  const originals = {
    log: console.log,
    info: console.info,
    debug: console.debug,
    warn: console.warn,
    error: console.error,
  };

  function makeInterceptor(level: LogLevel) {
    return (...args: unknown[]): void => {
      if (levelRank(level) < threshold) return;
      const message = util.format(...args);
      stream.write(formatLine(level, message, isTty) + "\n");
      logger?.[level](message);
    };
  }

  for (const method of CONSOLE_METHODS) {
    console[method] = makeInterceptor(CONSOLE_LEVELS[method]);
  }

  const restore = (): void => {
    Object.assign(console, originals);
    if (restoreInstalled === restore) restoreInstalled = undefined;
  };
  restoreInstalled = restore;
  return restore;
}
