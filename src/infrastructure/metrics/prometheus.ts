/**
 * Prometheus-compatible metrics collector.
 *
 * Counters, histograms and gauges with label support, serialized to the
 * Prometheus text exposition format (v0.0.4).
 */

import type {
  Counter,
  Gauge,
  Histogram,
  HistogramSnapshot,
  MetricsCollector,
} from "../../core/ports/metrics.js";

interface Serializable {
  serialize(): string;
  reset(): void;
}

// ── Label key serialization ──

const escapeLabel = (v: string): string =>
  v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");

const labelKey = (labels?: Record<string, string>): string => {
  if (!labels) return "";
  const entries = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : 1));
  return entries.map(([k, v]) => `${k}="${escapeLabel(v)}"`).join(",");
};

const formatLabels = (key: string): string => (key ? `{${key}}` : "");

const header = (name: string, help: string, type: string): string[] => [
  `# HELP ${name} ${help}`,
  `# TYPE ${name} ${type}`,
];

// ── Counter ──

const createCounter = (name: string, help: string): Counter & Serializable => {
  const values = new Map<string, number>();

  return {
    inc(labels?: Record<string, string>, value = 1) {
      const key = labelKey(labels);
      values.set(key, (values.get(key) ?? 0) + value);
    },
    get(labels?: Record<string, string>): number {
      return values.get(labelKey(labels)) ?? 0;
    },
    serialize(): string {
      const lines = header(name, help, "counter");
      for (const [key, value] of values) {
        lines.push(`${name}${formatLabels(key)} ${value}`);
      }
      if (values.size === 0) lines.push(`${name} 0`);
      return lines.join("\n");
    },
    reset() {
      values.clear();
    },
  };
};

// ── Histogram ──

/** Latency buckets in ms; outbound attempts may take up to the 30s timeout */
const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

interface HistogramData {
  count: number;
  sum: number;
  buckets: Map<number, number>;
}

const createHistogram = (
  name: string,
  help: string,
  buckets: readonly number[] = DEFAULT_BUCKETS,
): Histogram & Serializable => {
  const data = new Map<string, HistogramData>();

  const getOrCreate = (key: string): HistogramData => {
    let entry = data.get(key);
    if (!entry) {
      entry = { count: 0, sum: 0, buckets: new Map(buckets.map((b) => [b, 0])) };
      data.set(key, entry);
    }
    return entry;
  };

  return {
    observe(value: number, labels?: Record<string, string>) {
      const entry = getOrCreate(labelKey(labels));
      entry.count++;
      entry.sum += value;
      for (const bound of buckets) {
        if (value <= bound) entry.buckets.set(bound, (entry.buckets.get(bound) ?? 0) + 1);
      }
    },
    get(labels?: Record<string, string>): HistogramSnapshot | undefined {
      const entry = data.get(labelKey(labels));
      if (!entry) return undefined;
      return { count: entry.count, sum: entry.sum, buckets: new Map(entry.buckets) };
    },
    serialize(): string {
      const lines = header(name, help, "histogram");
      const rows: [string, HistogramData][] =
        data.size > 0 ? [...data] : [["", { count: 0, sum: 0, buckets: new Map() }]];

      for (const [key, entry] of rows) {
        const lbl = key ? `,${key}` : "";
        for (const bound of buckets) {
          lines.push(`${name}_bucket{le="${bound}"${lbl}} ${entry.buckets.get(bound) ?? 0}`);
        }
        lines.push(`${name}_bucket{le="+Inf"${lbl}} ${entry.count}`);
        lines.push(`${name}_sum${formatLabels(key)} ${entry.sum}`);
        lines.push(`${name}_count${formatLabels(key)} ${entry.count}`);
      }
      return lines.join("\n");
    },
    reset() {
      data.clear();
    },
  };
};

// ── Gauge ──

const createGauge = (name: string, help: string): Gauge & Serializable => {
  const values = new Map<string, number>();

  return {
    set(value: number, labels?: Record<string, string>) {
      values.set(labelKey(labels), value);
    },
    inc(labels?: Record<string, string>, value = 1) {
      const key = labelKey(labels);
      values.set(key, (values.get(key) ?? 0) + value);
    },
    dec(labels?: Record<string, string>, value = 1) {
      const key = labelKey(labels);
      values.set(key, (values.get(key) ?? 0) - value);
    },
    get(labels?: Record<string, string>): number {
      return values.get(labelKey(labels)) ?? 0;
    },
    serialize(): string {
      const lines = header(name, help, "gauge");
      for (const [key, value] of values) {
        lines.push(`${name}${formatLabels(key)} ${value}`);
      }
      if (values.size === 0) lines.push(`${name} 0`);
      return lines.join("\n");
    },
    reset() {
      values.clear();
    },
  };
};

// ── Collector ──

export const createMetricsCollector = (): MetricsCollector => {
  const httpRequestsTotal = createCounter("http_requests_total", "Total number of HTTP requests");
  const httpRequestDurationMs = createHistogram(
    "http_request_duration_ms",
    "HTTP request duration in milliseconds",
  );
  const idempotencyDecisionsTotal = createCounter(
    "idempotency_decisions_total",
    "Idempotency gate decisions by outcome",
  );
  const deliveryAttemptsTotal = createCounter(
    "webhook_delivery_attempts_total",
    "Outbound webhook attempts by outcome",
  );
  const deliveryDurationMs = createHistogram(
    "webhook_delivery_duration_ms",
    "Outbound webhook attempt duration in milliseconds",
  );
  const deliveriesInFlight = createGauge(
    "webhook_deliveries_in_flight",
    "Outbound webhook attempts currently running in this process",
  );
  const incomingEventsTotal = createCounter(
    "incoming_webhook_events_total",
    "Inbound webhook events by outcome",
  );

  const all: readonly Serializable[] = [
    httpRequestsTotal,
    httpRequestDurationMs,
    idempotencyDecisionsTotal,
    deliveryAttemptsTotal,
    deliveryDurationMs,
    deliveriesInFlight,
    incomingEventsTotal,
  ];

  return {
    httpRequestsTotal,
    httpRequestDurationMs,
    idempotencyDecisionsTotal,
    deliveryAttemptsTotal,
    deliveryDurationMs,
    deliveriesInFlight,
    incomingEventsTotal,

    serialize(): string {
      return `${all.map((m) => m.serialize()).join("\n\n")}\n`;
    },

    reset(): void {
      for (const metric of all) metric.reset();
    },
  };
};
