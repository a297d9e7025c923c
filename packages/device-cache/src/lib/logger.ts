/**
 * Structured JSON-line logging with async buffered writes.
 * Each module creates its own logger: `createLogger("file-cache")`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type LogSink = (line: string, level: LogLevel) => void;

interface LogEntry {
  ts: string;
  level: LogLevel;
  service: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const FLUSH_INTERVAL = 50; // ms
const MAX_BUFFER = 100;

let stdoutBuf: string[] = [];
let stderrBuf: string[] = [];
let minLevel: LogLevel = "warn";
let sink: LogSink | null = null;
let flushTimer: ReturnType<typeof setInterval> | null = null;

function flushStdout(): void {
  if (stdoutBuf.length === 0) return;
  const batch = stdoutBuf.join("");
  stdoutBuf = [];
  process.stdout.write(batch);
}

function flushStderr(): void {
  if (stderrBuf.length === 0) return;
  const batch = stderrBuf.join("");
  stderrBuf = [];
  process.stderr.write(batch);
}

export function flushLogs(): void {
  flushStdout();
  flushStderr();
}

function ensureFlushTimer(): void {
  if (flushTimer) return;
  flushTimer = setInterval(flushLogs, FLUSH_INTERVAL);
  flushTimer.unref();
  process.once("beforeExit", flushLogs);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/** Route every line to `next` instead of stdout/stderr. */
export function setLogSink(next: LogSink): void {
  sink = next;
}

export function resetLogSink(): void {
  sink = null;
}

function emit(level: LogLevel, service: string, msg: string, meta?: LogMeta): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const entry: LogEntry = { ts: new Date().toISOString(), level, service, msg, ...meta };
  const line = JSON.stringify(entry, serializeErrors) + "\n";

  if (sink) {
    sink(line, level);
    return;
  }

  ensureFlushTimer();
  if (level === "error" || level === "warn") {
    stderrBuf.push(line);
    if (stderrBuf.length >= MAX_BUFFER) flushStderr();
  } else {
    stdoutBuf.push(line);
    if (stdoutBuf.length >= MAX_BUFFER) flushStdout();
  }
}

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return value.message;
  }
  return value;
}

export interface Logger {
  debug: (msg: string, meta?: LogMeta) => void;
  info:  (msg: string, meta?: LogMeta) => void;
  warn:  (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
}

export function createLogger(service: string): Logger {
  return {
    debug: (msg, meta) => emit("debug", service, msg, meta),
    info:  (msg, meta) => emit("info",  service, msg, meta),
    warn:  (msg, meta) => emit("warn",  service, msg, meta),
    error: (msg, meta) => emit("error", service, msg, meta),
  };
}
