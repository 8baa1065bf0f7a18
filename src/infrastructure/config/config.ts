import { z } from "zod";
import {
  type IncomingSource,
  SignatureScheme,
} from "../../core/entities/incoming-source.entity.js";
import { printConfigError } from "../../shared/cli.js";

const booleanString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

/** `default:4,priority:2` → { default: 4, priority: 2 } */
const queuesSchema = z
  .string()
  .default("default:4")
  .transform((raw, ctx) => {
    const queues: Record<string, number> = {};
    for (const entry of raw.split(",").map((e) => e.trim()).filter(Boolean)) {
      const [name, limit] = entry.split(":").map((s) => s.trim());
      const concurrency = Number(limit);
      if (!name || !/^[a-z0-9_-]+$/i.test(name) || !Number.isInteger(concurrency) || concurrency < 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid queue entry "${entry}" (expected name:concurrency)`,
        });
        return z.NEVER;
      }
      queues[name] = concurrency;
    }
    if (Object.keys(queues).length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at least one queue is required" });
      return z.NEVER;
    }
    return Object.freeze(queues);
  });

/** `name:scheme:header:secret` entries separated by `;` */
const sourcesSchema = z
  .string()
  .default("")
  .transform((raw, ctx) => {
    const sources: Record<string, IncomingSource> = {};
    for (const entry of raw.split(";").map((e) => e.trim()).filter(Boolean)) {
      const [name, scheme, header, ...secretParts] = entry.split(":");
      const secret = secretParts.join(":");
      const parsedScheme = z.nativeEnum(SignatureScheme).safeParse(scheme);
      if (!name || !parsedScheme.success || !header || secret.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid source entry for "${name ?? ""}" (expected name:scheme:header:secret)`,
        });
        return z.NEVER;
      }
      sources[name] = Object.freeze({
        name,
        scheme: parsedScheme.data,
        header: header.toLowerCase(),
        secret,
      });
    }
    return Object.freeze(sources);
  });

/**
 * Application config, validated at boot via Zod and frozen afterwards.
 * Fails fast with clear messages if env vars are invalid.
 */
const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default("0.0.0.0"),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  database: z.object({
    /** Postgres connection string; SQLite is used when absent */
    url: z.string().url().optional(),
    path: z.string().default("data/relay.sqlite"),
  }),

  idempotency: z.object({
    ttlMs: z.coerce.number().int().positive().default(86_400_000), // 24h
    staleLockMs: z.coerce.number().int().positive().default(30_000),
    sweepIntervalMs: z.coerce.number().int().positive().default(600_000),
  }),

  delivery: z
    .object({
      queues: queuesSchema,
      pollIntervalMs: z.coerce.number().int().positive().default(1_000),
      timeoutMs: z.coerce.number().int().positive().default(30_000),
      /** in_flight rows untouched this long are returned to the queue */
      leaseMs: z.coerce.number().int().positive().default(120_000),
      responseMaxBytes: z.coerce.number().int().positive().default(2_048),
      enabled: booleanString.default("true"),
    })
    .refine((d) => d.leaseMs > d.timeoutMs, {
      message: "DELIVERY_LEASE_MS must be greater than DELIVERY_TIMEOUT_MS",
      path: ["leaseMs"],
    }),

  signature: z.object({
    toleranceSeconds: z.coerce.number().int().positive().default(300),
  }),

  incoming: z.object({
    sources: sourcesSchema,
    /** received/processing events untouched this long are re-dispatched */
    staleMs: z.coerce.number().int().positive().default(300_000),
    recoveryIntervalMs: z.coerce.number().int().positive().default(60_000),
  }),

  alerting: z.object({
    webhookUrl: z.string().url().optional(),
    timeoutMs: z.coerce.number().int().positive().default(5_000),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
};

/** Parse without side effects; used by loadConfig and tests. */
export const parseConfig = (env: ConfigEnv) =>
  configSchema.safeParse({
    env: env["NODE_ENV"],
    port: env["PORT"],
    host: env["HOST"],
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
    },
    database: {
      url: env["DATABASE_URL"],
      path: env["DATABASE_PATH"],
    },
    idempotency: {
      ttlMs: env["IDEMPOTENCY_TTL_MS"],
      staleLockMs: env["IDEMPOTENCY_STALE_LOCK_MS"],
      sweepIntervalMs: env["IDEMPOTENCY_SWEEP_INTERVAL_MS"],
    },
    delivery: {
      queues: env["DELIVERY_QUEUES"],
      pollIntervalMs: env["DELIVERY_POLL_INTERVAL_MS"],
      timeoutMs: env["DELIVERY_TIMEOUT_MS"],
      leaseMs: env["DELIVERY_LEASE_MS"],
      responseMaxBytes: env["DELIVERY_RESPONSE_MAX_BYTES"],
      enabled: env["DELIVERY_WORKERS_ENABLED"],
    },
    signature: {
      toleranceSeconds: env["SIGNATURE_TOLERANCE_SECONDS"],
    },
    incoming: {
      sources: env["INCOMING_SOURCES"],
      staleMs: env["INCOMING_STALE_MS"],
      recoveryIntervalMs: env["INCOMING_RECOVERY_INTERVAL_MS"],
    },
    alerting: {
      webhookUrl: env["ALERT_WEBHOOK_URL"],
      timeoutMs: env["ALERT_TIMEOUT_MS"],
    },
  });

export const loadConfig = (env: ConfigEnv = process.env): AppConfig => {
  const result = parseConfig(env);

  if (!result.success) {
    printConfigError(result.error.flatten().fieldErrors);
    process.exit(1);
  }

  return deepFreeze(result.data);
};
