/**
 * Metrics collector port: Prometheus-compatible metrics interface.
 * The core defines WHAT is tracked; infrastructure decides HOW.
 */

export interface Counter {
  inc(labels?: Record<string, string>, value?: number): void;
  get(labels?: Record<string, string>): number;
}

export interface Histogram {
  observe(value: number, labels?: Record<string, string>): void;
  get(labels?: Record<string, string>): HistogramSnapshot | undefined;
}

export interface Gauge {
  set(value: number, labels?: Record<string, string>): void;
  inc(labels?: Record<string, string>, value?: number): void;
  dec(labels?: Record<string, string>, value?: number): void;
  get(labels?: Record<string, string>): number;
}

export interface HistogramSnapshot {
  readonly count: number;
  readonly sum: number;
  readonly buckets: ReadonlyMap<number, number>;
}

export interface MetricsCollector {
  /** HTTP requests by method/status */
  readonly httpRequestsTotal: Counter;
  readonly httpRequestDurationMs: Histogram;
  /** Gate decisions: proceed / replay / conflict / locked / bypass */
  readonly idempotencyDecisionsTotal: Counter;
  /** Delivery attempt outcomes, labelled by `outcome` */
  readonly deliveryAttemptsTotal: Counter;
  readonly deliveryDurationMs: Histogram;
  /** Deliveries currently being attempted by this process */
  readonly deliveriesInFlight: Gauge;
  /** Inbound outcomes: accepted / duplicate / rejected / processed / error */
  readonly incomingEventsTotal: Counter;

  /** Serialize all metrics to Prometheus text exposition format */
  serialize(): string;

  reset(): void;
}
