import type { Logger } from "../../core/ports/logger.js";

export type HealthState = "ok" | "degraded" | "down";

export interface HealthStatus {
  readonly status: HealthState;
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: HealthState;
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

/**
 * One component of the deep check. A `critical` probe that reports `down`
 * takes the whole service down; any other failure only degrades it.
 */
export interface HealthProbe {
  readonly name: string;
  readonly critical: boolean;
  check(): Promise<ComponentHealth>;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  readonly probes?: readonly HealthProbe[] | undefined;
}

const round = (ms: number): number => Math.round(ms * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version } = deps;
  const probes = deps.probes ?? [];

  const runProbe = async (probe: HealthProbe): Promise<ComponentHealth> => {
    const start = performance.now();
    try {
      const result = await probe.check();
      return { ...result, latencyMs: result.latencyMs ?? round(performance.now() - start) };
    } catch (e: unknown) {
      return {
        status: "down",
        latencyMs: round(performance.now() - start),
        details: e instanceof Error ? e.message : String(e),
      };
    }
  };

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running deep health check");
      const start = performance.now();

      const results = await Promise.all(probes.map(runProbe));
      const checks: Record<string, ComponentHealth> = {};
      let overallStatus: HealthState = "ok";

      for (const [i, probe] of probes.entries()) {
        const result = results[i];
        if (!result) continue;
        checks[probe.name] = result;
        if (result.status === "ok") continue;
        if (probe.critical && result.status === "down") {
          overallStatus = "down";
        } else if (overallStatus === "ok") {
          overallStatus = "degraded";
        }
      }

      if (overallStatus !== "ok") {
        const failed = Object.entries(checks)
          .filter(([, c]) => c.status !== "ok")
          .map(([name]) => name);
        logger.warn("Health check failed", { status: overallStatus, failedComponents: failed });
      } else {
        logger.debug("Health check passed", { latencyMs: round(performance.now() - start) });
      }

      return {
        status: overallStatus,
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        checks,
      };
    },
  };
};
