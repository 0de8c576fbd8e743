/**
 * Application logging: structured JSONL file logger and console interceptor.
 *
 * 1. createAppLogger writes one JSON object per line (timestamp, level,
 *    message, optional args) to data/logs/YYYY-MM-DD.jsonl, skipping entries
 *    below the configured level. A new file starts each calendar day.
 *
 * 2. installConsoleFileLogging replaces console.log/info/warn/error/debug with
 *    interceptors that write a formatted, timestamped line to stdio and mirror
 *    the entry to the JSONL file. The stores log through console.*, so after
 *    installation every mutation lands in both places.
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";
import { stdout, stderr } from "node:process";

export type LogLevel = "debug" | "info" | "warn" | "error";

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

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Prevents double-wrapping console methods when called more than once.
let consoleFileLoggingInstalled = false;

function toDateString(date: Date): string {
  return date.toISOString().split("T")[0];
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
      ...("kind" in value && typeof value.kind === "string" ? { kind: value.kind } : {}),
    };
  }
  return value;
}

export function createAppLogger(dataDir: string, minLevel: LogLevel = "debug"): AppLogger {
  const logsDir = path.join(dataDir, "logs");
  fs.mkdirSync(logsDir, { recursive: true });

  function append(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

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
// Stdio formatting
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
 * Format a log line for stdio. Piped output stays plain text.
 */
export function formatLine(level: LogLevel, message: string, isTty: boolean, now: Date = new Date()): string {
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

export interface ConsoleLoggingOptions {
  /** Also write formatted lines to stdout/stderr. Default true; the CLI turns it off to keep its output clean. */
  stdio?: boolean;
}

/**
 * Intercept console.* calls to write timestamped lines to stdio and mirror
 * them to the JSONL file logger. Replaces the raw methods permanently.
 */
export function installConsoleFileLogging(logger: AppLogger, options: ConsoleLoggingOptions = {}): void {
  if (consoleFileLoggingInstalled) {
    return;
  }
  consoleFileLoggingInstalled = true;

  const echo = options.stdio ?? true;
  const stdoutTty = stdout.isTTY ?? false;
  const stderrTty = stderr.isTTY ?? false;

  function makeInterceptor(level: LogLevel, stream: NodeJS.WriteStream, isTty: boolean) {
    return (...args: unknown[]): void => {
      const message = util.format(...args);
      if (echo) {
        stream.write(formatLine(level, message, isTty) + "\n");
      }
      logger[level](message);
    };
  }

  console.log   = makeInterceptor("info",  stdout, stdoutTty);
  console.info  = makeInterceptor("info",  stdout, stdoutTty);
  console.debug = makeInterceptor("debug", stdout, stdoutTty);
  console.warn  = makeInterceptor("warn",  stderr, stderrTty);
  console.error = makeInterceptor("error", stderr, stderrTty);
}
