/**
 * Application logging: JSONL file logger and console interceptor.
 *
 * 1. createAppLogger writes one JSON object per line to daily files under
 *    <data_dir>/logs/YYYY-MM-DD.jsonl. A new file starts each calendar day.
 *
 * 2. installConsoleFileLogging replaces console.log/info/warn/error/debug.
 *    Each call is checked against the level threshold and the silenced tags,
 *    written as a timestamped line to stdout/stderr (when mirroring), and
 *    appended to the JSONL file (when a file logger is given).
 *
 * Modules log through console.* with a "[tag]" prefix, e.g. "[matrix] ...".
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";
import { stdout, stderr } from "node:process";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

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

// Set while the interceptors are installed, so a second install cannot wrap them twice.
let restoreConsole: (() => void) | null = null;

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
  return value;
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

/**
 * Format a log line for stdio.
 *
 * ANSI color codes are only emitted when the target stream is a TTY. When
 * stdout/stderr is piped (e.g., to a file or another process), isTTY is
 * false and the output stays plain text without escape sequences.
 */
export function formatLine(level: LogLevel, message: string, isTty: boolean, now = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace("T", " ");
  const prefix = LEVEL_PREFIX[level];

  if (!isTty) {
    return `${ts} [${prefix}] ${message}`;
  }

  const tsColored = `${ANSI.dim}${ts}${ANSI.reset}`;
  let prefixColored: string;
  if (level === "warn") {
    prefixColored = `${ANSI.yellow}[${prefix}]${ANSI.reset}`;
  } else if (level === "error") {
    prefixColored = `${ANSI.red}[${prefix}]${ANSI.reset}`;
  } else if (level === "debug") {
    prefixColored = `${ANSI.dim}[${prefix}]${ANSI.reset}`;
  } else {
    prefixColored = `${ANSI.cyan}[${prefix}]${ANSI.reset}`;
  }

  return `${tsColored} ${prefixColored} ${message}`;
}

// ---------------------------------------------------------------------------
// Console intercept
// ---------------------------------------------------------------------------

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ConsoleLoggingOptions {
  /** Lowest level that is written anywhere. Default "info". */
  level?: LogLevel;
  /** Write lines to stdout/stderr. Default true. */
  mirrorToStdout?: boolean;
  /** Tags (the "[tag]" message prefix) whose output is cut to errors only. */
  silence?: string[];
  stdout?: OutputStream;
  stderr?: OutputStream;
}

const TAG_PATTERN = /^\[([^\]:]+)(?::[^\]]*)?\]/;

/** Tag of a console line: "matrix" for "[matrix] ..." and "queue" for "[queue:bridge] ...". */
export function messageTag(message: string): string | null {
  return TAG_PATTERN.exec(message)?.[1] ?? null;
}

export function shouldLog(
  level: LogLevel,
  message: string,
  options: Pick<ConsoleLoggingOptions, "level" | "silence"> = {},
): boolean {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(options.level ?? "info")) return false;
  if (level === "error" || !options.silence?.length) return true;
  const tag = messageTag(message);
  return tag === null || !options.silence.includes(tag);
}

/**
 * Intercept console.* calls. Returns a function that puts the original
 * methods back. Installing again while installed is a no-op.
 */
export function installConsoleFileLogging(
  logger: AppLogger | null,
  options: ConsoleLoggingOptions = {},
): () => void {
  if (restoreConsole) {
    return restoreConsole;
  }

  const out = options.stdout ?? stdout;
  const err = options.stderr ?? stderr;
  const mirror = options.mirrorToStdout ?? true;
  const original = {
    log: console.log,
    info: console.info,
    debug: console.debug,
    warn: console.warn,
    error: console.error,
  };

  function makeInterceptor(level: LogLevel, stream: OutputStream) {
    const isTty = stream.isTTY ?? false;
    return (...args: unknown[]): void => {
      const message = util.format(...args);
      if (!shouldLog(level, message, options)) return;
      if (mirror) stream.write(formatLine(level, message, isTty) + "\n");
      logger?.[level](message);
    };
  }

  console.log   = makeInterceptor("info",  out);
  console.info  = makeInterceptor("info",  out);
  console.debug = makeInterceptor("debug", out);
  console.warn  = makeInterceptor("warn",  err);
  console.error = makeInterceptor("error", err);

  const restore = (): void => {
    Object.assign(console, original);
    restoreConsole = null;
  };
  restoreConsole = restore;
  return restore;
}
