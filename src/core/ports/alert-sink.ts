/**
 * Alert sink port: operator notifications for terminal failures
 * (exhausted deliveries, inbound events that failed processing).
 */

export const AlertLevel = {
  WARNING: "warning",
  CRITICAL: "critical",
} as const;

export type AlertLevel = (typeof AlertLevel)[keyof typeof AlertLevel];

export interface AlertPayload {
  readonly level: AlertLevel;
  readonly title: string;
  readonly message: string;
  readonly timestamp: string;
  readonly source: string;
  readonly metadata?: Record<string, unknown> | undefined;
}

export interface AlertSink {
  /** Send an alert notification. Never rejects. */
  send(payload: AlertPayload): Promise<void>;
  readonly enabled: boolean;
}
