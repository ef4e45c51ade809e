// src/log/logger.ts
// Scoped console logger. Every component and extension gets its own child
// scope (pipeline.orchestrator, extensions.shell, ...) instead of sharing one.

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

export type LogFields = Record<string, unknown>;

export interface LogRecord {
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
  at: string; // ISO timestamp
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  critical(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel | "silent";
  sink?: LogSink;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, critical: 50 };

const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

const TAG: Record<LogLevel, (s: string) => string> = {
  debug: COLOR.gray,
  info: COLOR.cyan,
  warn: COLOR.yellow,
  error: COLOR.red,
  critical: COLOR.magenta,
};

export function isLogLevel(v: string): v is LogLevel {
  return v in RANK;
}

function fmtFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(fields)) {
    if (v instanceof Error) {
      parts.push(`${k}=${v.name}: ${v.message}`);
      continue;
    }
    let text: string;
    try { text = typeof v === "string" ? v : JSON.stringify(v); } catch { text = String(v); }
    if (text && text.length > 240) text = text.slice(0, 240) + "…";
    parts.push(`${k}=${text}`);
  }
  return parts.length ? " " + COLOR.gray(parts.join(" ")) : "";
}

export const consoleSink: LogSink = (r) => {
  const line = `${COLOR.gray(r.at.replace("T", " ").slice(0, 19))} ${TAG[r.level](`[${r.level.toUpperCase()}]`)} ${r.scope}: ${r.message}${fmtFields(r.fields)}`;
  if (RANK[r.level] >= RANK.warn) console.error(line);
  else console.log(line);
};

/** Threshold from LOG_LEVEL (default info); QUIET=1 silences everything. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | "silent" {
  if (env.QUIET === "1") return "silent";
  const raw = (env.LOG_LEVEL ?? "info").toLowerCase();
  if (raw === "warning") return "warn";
  return isLogLevel(raw) ? raw : "info";
}

export function createLogger(scope = "pipeline", opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? levelFromEnv();
  const sink = opts.sink ?? consoleSink;

  const emit = (lvl: LogLevel, message: string, fields?: LogFields) => {
    if (level === "silent" || RANK[lvl] < RANK[level]) return;
    sink({ level: lvl, scope, message, fields, at: new Date().toISOString() });
  };

  return {
    scope,
    debug: (m, f) => emit("debug", m, f),
    info: (m, f) => emit("info", m, f),
    warn: (m, f) => emit("warn", m, f),
    error: (m, f) => emit("error", m, f),
    critical: (m, f) => emit("critical", m, f),
    child: (sub) => createLogger(`${scope}.${sub}`, { level, sink }),
  };
}

/** Collects records in memory; used by tests to assert on warnings. */
export function createMemoryLogger(scope = "pipeline"): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  return { logger: createLogger(scope, { level: "debug", sink: (r) => records.push(r) }), records };
}
