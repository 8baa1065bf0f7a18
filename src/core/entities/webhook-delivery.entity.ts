import type { DeliveryId, EndpointId } from "../types/brand.js";
import type { WebhookEventType } from "./webhook-endpoint.entity.js";

export const DeliveryStatus = {
  PENDING: "pending",
  IN_FLIGHT: "in_flight",
  DELIVERED: "delivered",
  PENDING_RETRY: "pending_retry",
  FAILED_EXHAUSTED: "failed_exhausted",
  CANCELLED: "cancelled",
} as const;

export type DeliveryStatus = (typeof DeliveryStatus)[keyof typeof DeliveryStatus];

export const TERMINAL_DELIVERY_STATUSES: ReadonlySet<DeliveryStatus> = new Set([
  DeliveryStatus.DELIVERED,
  DeliveryStatus.FAILED_EXHAUSTED,
  DeliveryStatus.CANCELLED,
]);

export const isTerminal = (status: DeliveryStatus): boolean =>
  TERMINAL_DELIVERY_STATUSES.has(status);

/** Hard cap on send attempts per delivery. */
export const MAX_DELIVERY_ATTEMPTS = 5;

/** Delay before the next attempt, indexed by the number of failed attempts so far minus one. */
export const RETRY_SCHEDULE_MS: readonly number[] = Object.freeze([
  60_000, // 1m
  5 * 60_000, // 5m
  30 * 60_000, // 30m
  2 * 60 * 60_000, // 2h
  24 * 60 * 60_000, // 24h
]);

/**
 * One delivery of one event to one endpoint.
 * `version` is bumped on every transition and guards compare-and-set updates.
 */
export interface WebhookDelivery {
  readonly id: DeliveryId;
  readonly endpointId: EndpointId;
  readonly eventId: string;
  readonly eventType: WebhookEventType;
  /** Serialized JSON body exactly as sent */
  readonly payload: string;
  readonly queue: string;
  readonly status: DeliveryStatus;
  readonly attempts: number;
  readonly nextAttemptAt: number | null;
  readonly lastAttemptAt: number | null;
  readonly lastResponseStatus: number | null;
  readonly lastResponseBody: string | null;
  readonly lastError: string | null;
  readonly claimedBy: string | null;
  readonly version: number;
  readonly createdAt: number;
  readonly updatedAt: number;
}
