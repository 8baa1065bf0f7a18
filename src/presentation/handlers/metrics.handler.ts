/**
 * Serves `GET /metrics` in Prometheus text exposition format.
 */

import type { MetricsCollector } from "../../core/ports/metrics.js";

const CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export const metricsHandler = (metrics: MetricsCollector) => ({
  serve(): Response {
    return new Response(metrics.serialize(), {
      status: 200,
      headers: { "Content-Type": CONTENT_TYPE, "Cache-Control": "no-store" },
    });
  },
});
