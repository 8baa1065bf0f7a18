import type {
  CachedResponse,
  IdempotencyRecord,
} from "../../core/entities/idempotency-record.entity.js";
import { IdempotencyStatus } from "../../core/entities/idempotency-record.entity.js";
import type { IncomingWebhookEvent } from "../../core/entities/incoming-event.entity.js";
import { IncomingEventStatus } from "../../core/entities/incoming-event.entity.js";
import type { WebhookDelivery } from "../../core/entities/webhook-delivery.entity.js";
import { DeliveryStatus } from "../../core/entities/webhook-delivery.entity.js";
import type { WebhookEndpoint, WebhookEventType } from "../../core/entities/webhook-endpoint.entity.js";
import { isWebhookEventType } from "../../core/entities/webhook-endpoint.entity.js";
import { brand } from "../../core/types/brand.js";

/**
 * Row shapes and row → entity mappers shared by the SQLite and Postgres
 * adapters. Postgres hands back BOOLEAN columns as booleans where SQLite
 * uses 0/1, hence the `boolean | number` flags.
 */

export type IdempotencyRow = {
  scope: string;
  key: string;
  request_hash: string;
  status: string;
  lock_token: string;
  response_status: number | null;
  response_body: string | null;
  response_headers: string | null;
  locked_at: number;
  completed_at: number | null;
  created_at: number;
  expires_at: number;
};

export type EndpointRow = {
  id: string;
  owner_id: string;
  url: string;
  secret: string;
  events: string;
  all_events: boolean | number;
  enabled: boolean | number;
  description: string | null;
  max_concurrency: number | null;
  created_at: number;
  updated_at: number;
};

export type DeliveryRow = {
  id: string;
  endpoint_id: string;
  event_id: string;
  event_type: string;
  payload: string;
  queue: string;
  status: string;
  attempts: number;
  next_attempt_at: number | null;
  last_attempt_at: number | null;
  last_response_status: number | null;
  last_response_body: string | null;
  last_error: string | null;
  claimed_by: string | null;
  version: number;
  created_at: number;
  updated_at: number;
};

export type IncomingEventRow = {
  id: string;
  source: string;
  event_id: string;
  event_type: string | null;
  payload: string;
  status: string;
  error_message: string | null;
  received_at: number;
  processed_at: number | null;
  updated_at: number;
};

const oneOf = <T extends string>(values: Readonly<Record<string, T>>, raw: string, what: string): T => {
  const match = Object.values(values).find((v) => v === raw);
  if (match === undefined) throw new Error(`Unknown ${what} "${raw}" in storage`);
  return match;
};

/** Event list column → known event types; unknown entries are dropped */
export const parseEventTypes = (raw: string): WebhookEventType[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((v): v is WebhookEventType => typeof v === "string" && isWebhookEventType(v));
};

const parseHeaders = (raw: string | null): Record<string, string> => {
  if (raw === null) return {};
  const parsed: unknown = JSON.parse(raw);
  const headers: Record<string, string> = {};
  if (parsed !== null && typeof parsed === "object") {
    for (const [name, value] of Object.entries(parsed)) {
      if (typeof value === "string") headers[name] = value;
    }
  }
  return headers;
};

export const serializeHeaders = (headers: Readonly<Record<string, string>>): string =>
  JSON.stringify(headers);

export const rowToIdempotencyRecord = (row: IdempotencyRow): IdempotencyRecord => {
  const response: CachedResponse | null =
    row.response_status === null
      ? null
      : {
          status: row.response_status,
          body: row.response_body ?? "",
          headers: parseHeaders(row.response_headers),
        };
  return {
    scope: row.scope,
    key: row.key,
    requestHash: row.request_hash,
    status: oneOf(IdempotencyStatus, row.status, "idempotency status"),
    lockToken: row.lock_token,
    response,
    lockedAt: Number(row.locked_at),
    completedAt: row.completed_at === null ? null : Number(row.completed_at),
    createdAt: Number(row.created_at),
    expiresAt: Number(row.expires_at),
  };
};

export const rowToEndpoint = (row: EndpointRow): WebhookEndpoint => ({
  id: brand<string, "EndpointId">(row.id),
  ownerId: brand<string, "OwnerId">(row.owner_id),
  url: row.url,
  secret: row.secret,
  events: parseEventTypes(row.events),
  allEvents: Boolean(row.all_events),
  enabled: Boolean(row.enabled),
  description: row.description,
  maxConcurrency: row.max_concurrency,
  createdAt: Number(row.created_at),
  updatedAt: Number(row.updated_at),
});

const nullableNumber = (v: number | null): number | null => (v === null ? null : Number(v));

export const rowToDelivery = (row: DeliveryRow): WebhookDelivery => {
  if (!isWebhookEventType(row.event_type)) {
    throw new Error(`Unknown event type "${row.event_type}" in storage`);
  }
  return {
    id: brand<string, "DeliveryId">(row.id),
    endpointId: brand<string, "EndpointId">(row.endpoint_id),
    eventId: row.event_id,
    eventType: row.event_type,
    payload: row.payload,
    queue: row.queue,
    status: oneOf(DeliveryStatus, row.status, "delivery status"),
    attempts: row.attempts,
    nextAttemptAt: nullableNumber(row.next_attempt_at),
    lastAttemptAt: nullableNumber(row.last_attempt_at),
    lastResponseStatus: row.last_response_status,
    lastResponseBody: row.last_response_body,
    lastError: row.last_error,
    claimedBy: row.claimed_by,
    version: Number(row.version),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
};

export const rowToIncomingEvent = (row: IncomingEventRow): IncomingWebhookEvent => ({
  id: row.id,
  source: row.source,
  eventId: row.event_id,
  eventType: row.event_type,
  payload: row.payload,
  status: oneOf(IncomingEventStatus, row.status, "incoming event status"),
  errorMessage: row.error_message,
  receivedAt: Number(row.received_at),
  processedAt: nullableNumber(row.processed_at),
  updatedAt: Number(row.updated_at),
});

export const emptyDeliveryCounts = (): Record<DeliveryStatus, number> => ({
  pending: 0,
  in_flight: 0,
  delivered: 0,
  pending_retry: 0,
  failed_exhausted: 0,
  cancelled: 0,
});

export const isDeliveryStatus = (value: string): value is DeliveryStatus =>
  Object.values(DeliveryStatus).some((s) => s === value);
