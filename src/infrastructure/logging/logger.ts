import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Where formatted lines go. warn and above use `err`. */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const processSink: LogSink = {
  out: (line) => {
    process.stdout.write(line);
  },
  err: (line) => {
    process.stderr.write(line);
  },
};

export interface LoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
  readonly bindings?: Record<string, unknown> | undefined;
  readonly sink?: LogSink | undefined;
}

/** Errors in meta are flattened to their message so JSON lines stay readable. */
const normaliseMeta = (meta: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = v instanceof Error ? v.message : v;
  }
  return out;
};

/** One JSON object per line (for Datadog, ELK, CloudWatch, etc.). */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string =>
  `${JSON.stringify({ level, msg, time: new Date().toISOString(), ...meta })}\n`;

/**
 * Structured logger.
 * - "pretty": ANSI-colored human-readable output (development)
 * - "json": structured JSON lines (production log aggregators)
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? "info";
  const format = options.format ?? "pretty";
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? processSink;

  const minPriority = LEVEL_PRIORITY[level];
  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (entryLevel: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;

    const line = formatter(entryLevel, msg, normaliseMeta({ ...bindings, ...meta }));
    if (LEVEL_PRIORITY[entryLevel] >= LEVEL_PRIORITY.warn) {
      sink.err(line);
    } else {
      sink.out(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger({ level, format, sink, bindings: { ...bindings, ...extra } }),
  };
};

/** Logger that drops everything; used where output would only be noise. */
export const createSilentLogger = (): Logger =>
  createLogger({ level: "fatal", sink: { out: () => {}, err: () => {} } });
