import { describe, expect, it } from "vitest";
import { parseConfig } from "../../src/infrastructure/config/config.js";

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const result = parseConfig({});
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.data).toMatchObject({
      env: "development",
      port: 3000,
      host: "0.0.0.0",
      log: { level: "info", format: "pretty" },
      database: { path: "data/relay.sqlite" },
      idempotency: { ttlMs: 86_400_000, staleLockMs: 30_000, sweepIntervalMs: 600_000 },
      delivery: {
        queues: { default: 4 },
        pollIntervalMs: 1_000,
        timeoutMs: 30_000,
        leaseMs: 120_000,
        responseMaxBytes: 2_048,
        enabled: true,
      },
      signature: { toleranceSeconds: 300 },
      incoming: { sources: {}, staleMs: 300_000, recoveryIntervalMs: 60_000 },
    });
    expect(result.data.database.url).toBeUndefined();
  });

  it("coerces numbers and booleans", () => {
    const result = parseConfig({ PORT: "8080", IDEMPOTENCY_TTL_MS: "1000", DELIVERY_WORKERS_ENABLED: "false" });
    expect(result.success && result.data.port).toBe(8080);
    expect(result.success && result.data.idempotency.ttlMs).toBe(1000);
    expect(result.success && result.data.delivery.enabled).toBe(false);
  });

  it("requires the in-flight lease to outlast the request timeout", () => {
    const result = parseConfig({ DELIVERY_TIMEOUT_MS: "30000", DELIVERY_LEASE_MS: "30000" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]).toMatchObject({
      path: ["delivery", "leaseMs"],
      message: "DELIVERY_LEASE_MS must be greater than DELIVERY_TIMEOUT_MS",
    });

    expect(parseConfig({ DELIVERY_TIMEOUT_MS: "30000", DELIVERY_LEASE_MS: "30001" }).success).toBe(true);
  });

  it("parses named queues with their concurrency", () => {
    const result = parseConfig({ DELIVERY_QUEUES: "default:4, priority:2" });
    expect(result.success && result.data.delivery.queues).toEqual({ default: 4, priority: 2 });
  });

  it("rejects malformed queue entries", () => {
    expect(parseConfig({ DELIVERY_QUEUES: "default:0" }).success).toBe(false);
    expect(parseConfig({ DELIVERY_QUEUES: "bad name:2" }).success).toBe(false);
    expect(parseConfig({ DELIVERY_QUEUES: "," }).success).toBe(false);
  });

  it("parses inbound sources, lower-casing the header and keeping colons in the secret", () => {
    const result = parseConfig({
      INCOMING_SOURCES: "payments:timestamped:X-Webhook-Signature:test-secret; github:hmac:X-Hub-Signature-256:test:secret",
    });
    expect(result.success && result.data.incoming.sources).toEqual({
      payments: {
        name: "payments",
        scheme: "timestamped",
        header: "x-webhook-signature",
        secret: "test-secret",
      },
      github: { name: "github", scheme: "hmac", header: "x-hub-signature-256", secret: "test:secret" },
    });
  });

  it("rejects a source with an unknown scheme or no secret", () => {
    const unknown = parseConfig({ INCOMING_SOURCES: "payments:rsa:x-sig:test-secret" });
    expect(unknown.success).toBe(false);
    if (!unknown.success) {
      expect(unknown.error.issues[0]?.message).toBe(
        'invalid source entry for "payments" (expected name:scheme:header:secret)',
      );
    }
    expect(parseConfig({ INCOMING_SOURCES: "payments:hmac:x-sig" }).success).toBe(false);
  });

  it("rejects out-of-range values", () => {
    expect(parseConfig({ PORT: "70000" }).success).toBe(false);
    expect(parseConfig({ LOG_LEVEL: "verbose" }).success).toBe(false);
    expect(parseConfig({ DATABASE_URL: "not a url" }).success).toBe(false);
  });
});
