import { describe, expect, it } from "vitest";
import { type HealthProbe, createHealthService } from "../../src/application/services/health.service.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";

const probe = (name: string, critical: boolean, check: HealthProbe["check"]): HealthProbe => ({
  name,
  critical,
  check,
});

describe("HealthService", () => {
  const logger = createSilentLogger();

  it("reports ok with no probes", async () => {
    const status = await createHealthService({ logger, version: "test" }).check();
    expect(status.status).toBe("ok");
    expect(status.version).toBe("test");
    expect(status.checks).toEqual({});
  });

  it("reports ok when every probe passes, with a measured latency", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [probe("database", true, async () => ({ status: "ok", details: "sqlite" }))],
    });
    const status = await hs.check();
    expect(status.status).toBe("ok");
    expect(status.checks["database"]?.details).toBe("sqlite");
    expect(typeof status.checks["database"]?.latencyMs).toBe("number");
  });

  it("degrades when a non-critical probe fails", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [
        probe("database", true, async () => ({ status: "ok" })),
        probe("workers", false, async () => ({ status: "down", details: "stopped" })),
      ],
    });
    expect((await hs.check()).status).toBe("degraded");
  });

  it("goes down when a critical probe is down", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [
        probe("database", true, async () => ({ status: "down" })),
        probe("workers", false, async () => ({ status: "degraded" })),
      ],
    });
    expect((await hs.check()).status).toBe("down");
  });

  it("a degraded critical probe only degrades", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [probe("database", true, async () => ({ status: "degraded" }))],
    });
    expect((await hs.check()).status).toBe("degraded");
  });

  it("treats a throwing probe as down and reports the message", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [
        probe("database", true, async () => {
          throw new Error("connection refused");
        }),
      ],
    });
    const status = await hs.check();
    expect(status.status).toBe("down");
    expect(status.checks["database"]).toMatchObject({ status: "down", details: "connection refused" });
  });
});
