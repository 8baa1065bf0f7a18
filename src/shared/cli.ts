import type { AppConfig } from "../infrastructure/config/config.js";

// ── ANSI escape sequences ──────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const bold = (s: string) => `${esc("1")}${s}${reset}`;
const dim = (s: string) => `${esc("2")}${s}${reset}`;
const cyan = (s: string) => `${esc("36")}${s}${reset}`;
const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgCyan = (s: string) => `${esc("46")}${esc("30")} ${s} ${reset}`;
const bgGreen = (s: string) => `${esc("42")}${esc("30")} ${s} ${reset}`;
const bgYellow = (s: string) => `${esc("43")}${esc("30")} ${s} ${reset}`;
const bgRed = (s: string) => `${esc("41")}${esc("97")} ${s} ${reset}`;

const envBadge = (env: string): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "test":
      return bgYellow("TEST");
    default:
      return bgCyan(env.toUpperCase());
  }
};

interface StartupInfo {
  readonly config: AppConfig;
  readonly bootTimeMs: number;
  readonly storage: "sqlite" | "postgres";
}

/** Startup summary: listen address, storage, worker queues and inbound sources. */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, bootTimeMs, storage } = info;
  const queues = Object.entries(config.delivery.queues)
    .map(([name, n]) => `${name}×${n}`)
    .join(" ");
  const sources = Object.keys(config.incoming.sources);

  const lines = [
    "",
    `  ${bold(cyan("relay"))}  ${envBadge(config.env)}  ${dim("booted in")} ${bold(green(`${Math.round(bootTimeMs)}ms`))}`,
    "",
    `  ${bold(white("→"))} ${dim("Listening")}   ${bold(cyan(`http://${config.host}:${config.port}`))}`,
    `  ${gray("├─")} ${dim("PID")}          ${white(String(process.pid))}`,
    `  ${gray("├─")} ${dim("Runtime")}      ${white(`Node ${process.versions.node}`)}`,
    `  ${gray("├─")} ${dim("Storage")}      ${white(storage === "postgres" ? "postgres" : config.database.path)}`,
    `  ${gray("├─")} ${dim("Queues")}       ${config.delivery.enabled ? white(queues) : yellow("workers disabled")}`,
    `  ${gray("├─")} ${dim("Sources")}      ${white(sources.length > 0 ? sources.join(", ") : "none")}`,
    `  ${gray("└─")} ${dim("Log level")}    ${white(config.log.level)}`,
    "",
    `  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`,
    "",
  ];

  process.stdout.write(`${lines.join("\n")}\n`);
};

export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", draining workers and shutting down…")}\n\n`,
  );
};

/** Config validation failure, one line per field error. */
export const printConfigError = (errors: Readonly<Record<string, string[] | undefined>>): void => {
  const lines = ["", `  ${bgRed("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`, ""];

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages ?? []) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("", `  ${dim("Hint: see .env.example for every supported variable")}`, "");
  process.stderr.write(`${lines.join("\n")}\n`);
};
