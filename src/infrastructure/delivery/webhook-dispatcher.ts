/**
 * Webhook dispatcher: performs one attempt of a claimed delivery.
 *
 * - Re-checks the endpoint: a disabled endpoint hands the row back untouched,
 *   a deleted one cancels it
 * - Signs the stored payload (`X-Webhook-Signature: t=<ts>,v1=<hex>`)
 * - Records status and truncated body of every attempt
 * - Schedules the next attempt from the fixed backoff, or marks the row exhausted
 */

import {
  DeliveryStatus,
  MAX_DELIVERY_ATTEMPTS,
  RETRY_SCHEDULE_MS,
  type WebhookDelivery,
} from "../../core/entities/webhook-delivery.entity.js";
import type { WebhookEndpoint } from "../../core/entities/webhook-endpoint.entity.js";
import { type AppError, deliveryExhausted } from "../../core/errors/app-error.js";
import { AlertLevel, type AlertSink } from "../../core/ports/alert-sink.js";
import type { AttemptRecord, DeliveryStore } from "../../core/ports/delivery-store.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { WebhookRegistry } from "../../core/ports/webhook-registry.js";
import type { WebhookTransport } from "../../core/ports/webhook-transport.js";
import { type Result, ok } from "../../core/types/result.js";
import { truncateUtf8 } from "../../shared/utils/truncate.js";
import { SIGNATURE_HEADER, signPayload } from "../security/signature.js";

export const USER_AGENT = "relay-webhooks/1.0";

export const AttemptOutcome = {
  DELIVERED: "delivered",
  RETRY: "retry",
  EXHAUSTED: "exhausted",
  /** Endpoint disabled; row returned to the queue as it was */
  SKIPPED: "skipped",
  /** Endpoint deleted; row cancelled */
  CANCELLED: "cancelled",
  /** Row changed under us (reaped or cancelled); outcome not written */
  STALE: "stale",
} as const;

export type AttemptOutcome = (typeof AttemptOutcome)[keyof typeof AttemptOutcome];

/** Delay after the n-th failed attempt (n ≥ 1) */
export const retryDelayMs = (failedAttempts: number): number => {
  const index = Math.min(Math.max(failedAttempts, 1), RETRY_SCHEDULE_MS.length) - 1;
  return RETRY_SCHEDULE_MS[index] ?? 0;
};

export interface WebhookDispatcher {
  /** Run one attempt of a delivery this worker has claimed (`in_flight`) */
  attempt(delivery: WebhookDelivery): Promise<Result<AttemptOutcome, AppError>>;
}

interface WebhookDispatcherDeps {
  readonly registry: WebhookRegistry;
  readonly deliveries: DeliveryStore;
  readonly transport: WebhookTransport;
  readonly alertSink: AlertSink;
  readonly metrics: MetricsCollector;
  readonly logger: Logger;
  readonly timeoutMs?: number | undefined;
  readonly responseMaxBytes?: number | undefined;
  readonly now?: (() => number) | undefined;
}

export const buildDeliveryHeaders = (
  delivery: WebhookDelivery,
  endpoint: WebhookEndpoint,
  attempt: number,
  timestampSeconds: number,
): Record<string, string> => ({
  "Content-Type": "application/json",
  "User-Agent": USER_AGENT,
  "X-Webhook-Id": delivery.id,
  "X-Webhook-Event": delivery.eventType,
  "X-Webhook-Event-Id": delivery.eventId,
  "X-Webhook-Attempt": String(attempt),
  [SIGNATURE_HEADER]: signPayload(delivery.payload, endpoint.secret, timestampSeconds),
});

export const createWebhookDispatcher = (deps: WebhookDispatcherDeps): WebhookDispatcher => {
  const { registry, deliveries, transport, alertSink, metrics } = deps;
  const timeoutMs = deps.timeoutMs ?? 30_000;
  const responseMaxBytes = deps.responseMaxBytes ?? 2_048;
  const now = deps.now ?? Date.now;
  const logger = deps.logger.child({ service: "dispatcher" });

  const alertExhausted = async (delivery: WebhookDelivery, record: AttemptRecord): Promise<void> => {
    const error = deliveryExhausted(record.attempts);
    logger.error("Delivery exhausted", {
      deliveryId: delivery.id,
      endpointId: delivery.endpointId,
      eventId: delivery.eventId,
      attempts: record.attempts,
      lastStatus: record.responseStatus,
      lastError: record.error,
    });
    await alertSink.send({
      level: AlertLevel.WARNING,
      title: "Webhook delivery exhausted",
      message: error.message,
      timestamp: new Date(record.now).toISOString(),
      source: "delivery-worker",
      metadata: {
        deliveryId: delivery.id,
        endpointId: delivery.endpointId,
        eventId: delivery.eventId,
        eventType: delivery.eventType,
        lastResponseStatus: record.responseStatus,
        lastError: record.error,
      },
    });
  };

  return {
    async attempt(delivery: WebhookDelivery): Promise<Result<AttemptOutcome, AppError>> {
      const found = await registry.get(delivery.endpointId);
      if (!found.ok) return found;
      const endpoint = found.value;

      if (!endpoint) {
        const cancelled = await deliveries.cancelClaim(delivery.id, delivery.version, now());
        if (!cancelled.ok) return cancelled;
        if (!cancelled.value) {
          metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.STALE });
          return ok(AttemptOutcome.STALE);
        }
        metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.CANCELLED });
        logger.info("Endpoint deleted; delivery cancelled", {
          deliveryId: delivery.id,
          endpointId: delivery.endpointId,
        });
        return ok(AttemptOutcome.CANCELLED);
      }

      if (!endpoint.enabled) {
        const released = await deliveries.releaseClaim(delivery.id, delivery.version, now());
        if (!released.ok) return released;
        metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.SKIPPED });
        logger.debug("Endpoint disabled; delivery returned to queue", {
          deliveryId: delivery.id,
          endpointId: delivery.endpointId,
        });
        return ok(AttemptOutcome.SKIPPED);
      }

      const attemptNumber = delivery.attempts + 1;
      const headers = buildDeliveryHeaders(
        delivery,
        endpoint,
        attemptNumber,
        Math.floor(now() / 1000),
      );

      const started = performance.now();
      metrics.deliveriesInFlight.inc();
      const sent = await transport.post({
        url: endpoint.url,
        headers,
        body: delivery.payload,
        timeoutMs,
        maxResponseBytes: responseMaxBytes,
      });
      metrics.deliveriesInFlight.dec();
      const durationMs = Math.round((performance.now() - started) * 100) / 100;
      metrics.deliveryDurationMs.observe(durationMs);

      const finishedAt = now();
      const status = sent.ok ? sent.value.status : null;
      const succeeded = status !== null && status >= 200 && status < 300;
      const responseBody = sent.ok ? truncateUtf8(sent.value.body, responseMaxBytes) : null;
      const error = succeeded ? null : sent.ok ? `HTTP ${sent.value.status}` : sent.error.message;

      let record: AttemptRecord;
      if (succeeded) {
        record = {
          status: DeliveryStatus.DELIVERED,
          attempts: attemptNumber,
          nextAttemptAt: null,
          responseStatus: status,
          responseBody,
          error: null,
          now: finishedAt,
        };
      } else if (attemptNumber >= MAX_DELIVERY_ATTEMPTS) {
        record = {
          status: DeliveryStatus.FAILED_EXHAUSTED,
          attempts: attemptNumber,
          nextAttemptAt: null,
          responseStatus: status,
          responseBody,
          error,
          now: finishedAt,
        };
      } else {
        record = {
          status: DeliveryStatus.PENDING_RETRY,
          attempts: attemptNumber,
          nextAttemptAt: finishedAt + retryDelayMs(attemptNumber),
          responseStatus: status,
          responseBody,
          error,
          now: finishedAt,
        };
      }

      const written = await deliveries.finishAttempt(delivery.id, delivery.version, record);
      if (!written.ok) return written;
      if (!written.value) {
        metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.STALE });
        logger.warn("Delivery changed during attempt; outcome discarded", {
          deliveryId: delivery.id,
          attempt: attemptNumber,
          status,
        });
        return ok(AttemptOutcome.STALE);
      }

      const meta = {
        deliveryId: delivery.id,
        endpointId: endpoint.id,
        eventType: delivery.eventType,
        attempt: attemptNumber,
        status,
        durationMs,
      };

      if (record.status === DeliveryStatus.DELIVERED) {
        metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.DELIVERED });
        logger.info("Delivery succeeded", meta);
        return ok(AttemptOutcome.DELIVERED);
      }

      if (record.status === DeliveryStatus.FAILED_EXHAUSTED) {
        metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.EXHAUSTED });
        await alertExhausted(delivery, record);
        return ok(AttemptOutcome.EXHAUSTED);
      }

      metrics.deliveryAttemptsTotal.inc({ outcome: AttemptOutcome.RETRY });
      logger.warn("Delivery failed, retry scheduled", {
        ...meta,
        error,
        nextAttemptAt: record.nextAttemptAt,
      });
      return ok(AttemptOutcome.RETRY);
    },
  };
};
