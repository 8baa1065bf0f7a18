import type { LogLevel } from "../core/ports/logger.js";

// ── ANSI escape sequences ──────────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");
const paint =
  (...codes: string[]) =>
  (s: string): string =>
    `${codes.map(esc).join("")}${s}${reset}`;

const bold = paint("1");
const dim = paint("2");
const cyan = paint("36");
const green = paint("32");
const yellow = paint("33");
const red = paint("31");
const gray = paint("90");
const white = paint("97");
const badge = (bg: string, fg: string) => (s: string) => paint(bg, fg)(` ${s} `);

const METHOD_BADGES: Record<string, (s: string) => string> = {
  GET: badge("42", "30"),
  POST: badge("46", "30"),
  PUT: badge("43", "30"),
  PATCH: badge("43", "30"),
  DELETE: badge("41", "97"),
};

const LEVEL_BADGES: Record<LogLevel, string> = {
  debug: gray("DBG"),
  info: green("INF"),
  warn: yellow("WRN"),
  error: red("ERR"),
  fatal: badge("41", "97")("FTL"),
};

// ── Helpers ─────────────────────────────────────────────────────────────

const clock = (): string => {
  const d = new Date();
  const two = (n: number) => String(n).padStart(2, "0");
  return `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}.${String(
    d.getMilliseconds(),
  ).padStart(3, "0")}`;
};

const statusColor = (status: number | null): string => {
  if (status === null) return bold(red("---"));
  const s = String(status);
  if (status < 300) return bold(green(s));
  if (status < 400) return bold(cyan(s));
  if (status < 500) return bold(yellow(s));
  return bold(red(s));
};

const durationColor = (ms: number): string => {
  if (ms < 50) return green(`${ms}ms`);
  if (ms < 500) return yellow(`${ms}ms`);
  return red(`${ms}ms`);
};

const renderValue = (v: unknown): string =>
  v !== null && typeof v === "object" ? JSON.stringify(v) : String(v);

const formatMeta = (meta: Record<string, unknown>): string => {
  const parts = Object.entries(meta)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${dim(k)}${dim("=")}${white(renderValue(v))}`);
  return parts.length === 0 ? "" : ` ${parts.join(" ")}`;
};

// ── Public formatters ───────────────────────────────────────────────────

/**
 * Structured log entry for the pretty logger.
 *
 *   INF 12:34:56.789 Delivery succeeded  deliveryId=… status=200
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => `  ${LEVEL_BADGES[level]} ${dim(gray(clock()))} ${white(msg)}${formatMeta(meta)}\n`;

/**
 * Inbound HTTP access line.
 *
 *   ← 12:34:56.789 POST 201 /api/v1/events 3.1ms  ip=127.0.0.1 rid=abc12345
 */
export const formatAccessLog = (
  method: string,
  path: string,
  status: number,
  durationMs: number,
  ip: string,
  requestId: string,
): string => {
  const m = (METHOD_BADGES[method] ?? white)(method);
  const meta = dim(gray(`ip=${ip} rid=${requestId.slice(0, 8)}`));
  return `  ${dim("←")} ${dim(gray(clock()))} ${m} ${statusColor(status)} ${white(path)} ${durationColor(durationMs)}  ${meta}\n`;
};
