import type { IncomingSource } from "../../core/entities/incoming-source.entity.js";
import {
  IncomingEventStatus,
  type IncomingWebhookEvent,
} from "../../core/entities/incoming-event.entity.js";
import {
  type AppError,
  badRequest,
  conflict,
  errorMessage,
  notFound,
} from "../../core/errors/app-error.js";
import { AlertLevel, type AlertSink } from "../../core/ports/alert-sink.js";
import type { IncomingEventStore } from "../../core/ports/incoming-event-store.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { SignatureVerifier } from "../../core/ports/signature-verifier.js";
import type { PaginatedResult } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { ListIncomingEventsQuery } from "../dtos/webhook.dto.js";

/** Downstream processing of an accepted event. Throwing marks the event `error`. */
export type IncomingEventHandler = (event: IncomingWebhookEvent) => Promise<void>;

export interface ReceiveAck {
  readonly eventId: string;
  /** true when (source, eventId) was already recorded; nothing was re-enqueued */
  readonly duplicate: boolean;
}

/** Reads a request header case-insensitively */
export type HeaderLookup = (name: string) => string | undefined;

/**
 * Incoming webhook gateway: verify, deduplicate, hand off.
 * The acknowledgment never waits for processing.
 */
export interface IncomingWebhookService {
  receive(source: string, rawBody: string, header: HeaderLookup): Promise<Result<ReceiveAck, AppError>>;
  /** `received → processing → processed | error`; null when another processor holds the event */
  process(source: string, eventId: string): Promise<Result<IncomingWebhookEvent | null, AppError>>;
  /**
   * Operator retry: `error → received`, then dispatch again. Events stuck in
   * `received` or `processing` for longer than the staleness window are
   * accepted too.
   */
  retry(source: string, eventId: string): Promise<Result<IncomingWebhookEvent, AppError>>;
  /** Re-dispatch every stale `received` / `processing` event; returns how many */
  recoverStale(): Promise<Result<number, AppError>>;
  list(query: ListIncomingEventsQuery): Promise<Result<PaginatedResult<IncomingWebhookEvent>, AppError>>;
  registerHandler(source: string, handler: IncomingEventHandler): void;
  /** Resolves once every dispatched processing run has settled */
  drain(): Promise<void>;
}

interface Deps {
  readonly store: IncomingEventStore;
  readonly sources: Readonly<Record<string, IncomingSource>>;
  readonly verifier: SignatureVerifier;
  readonly alertSink: AlertSink;
  readonly metrics: MetricsCollector;
  readonly logger: Logger;
  /** Age after which an unfinished event is considered abandoned */
  readonly staleMs?: number | undefined;
  readonly now?: (() => number) | undefined;
}

const RECOVERY_BATCH = 100;

interface ParsedEvent {
  readonly id: string;
  readonly type: string | null;
}

const parseEvent = (rawBody: string): ParsedEvent | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return null;

  const id: unknown = Reflect.get(parsed, "id");
  const type: unknown = Reflect.get(parsed, "type");
  const eventId = typeof id === "string" ? id.trim() : typeof id === "number" ? String(id) : "";
  if (eventId.length === 0 || eventId.length > 255) return null;
  return { id: eventId, type: typeof type === "string" ? type : null };
};

export const createIncomingWebhookService = (deps: Deps): IncomingWebhookService => {
  const { store, sources, verifier, alertSink, metrics } = deps;
  const now = deps.now ?? Date.now;
  const staleMs = deps.staleMs ?? 300_000;
  const logger = deps.logger.child({ service: "incoming" });
  const handlers = new Map<string, IncomingEventHandler>();
  const inFlight = new Set<Promise<void>>();

  const defaultHandler: IncomingEventHandler = async (event) => {
    logger.info("Incoming event accepted with no handler registered", {
      source: event.source,
      eventId: event.eventId,
      type: event.eventType,
    });
  };

  const process = async (
    source: string,
    eventId: string,
  ): Promise<Result<IncomingWebhookEvent | null, AppError>> => {
    const claimed = await store.transition(
      source,
      eventId,
      IncomingEventStatus.RECEIVED,
      IncomingEventStatus.PROCESSING,
      now(),
    );
    if (!claimed.ok) return claimed;
    if (!claimed.value) return ok(null);

    const handler = handlers.get(source) ?? defaultHandler;
    try {
      await handler(claimed.value);
    } catch (e: unknown) {
      const message = errorMessage(e);
      const failed = await store.transition(
        source,
        eventId,
        IncomingEventStatus.PROCESSING,
        IncomingEventStatus.ERROR,
        now(),
        message,
      );
      metrics.incomingEventsTotal.inc({ source, outcome: "error" });
      logger.error("Incoming event processing failed", { source, eventId, error: message });
      await alertSink.send({
        level: AlertLevel.WARNING,
        title: "Incoming webhook processing failed",
        message,
        timestamp: new Date(now()).toISOString(),
        source: "incoming-webhooks",
        metadata: { source, eventId },
      });
      return failed;
    }

    const done = await store.transition(
      source,
      eventId,
      IncomingEventStatus.PROCESSING,
      IncomingEventStatus.PROCESSED,
      now(),
    );
    if (done.ok) {
      metrics.incomingEventsTotal.inc({ source, outcome: "processed" });
      logger.debug("Incoming event processed", { source, eventId });
    }
    return done;
  };

  const dispatch = (source: string, eventId: string): void => {
    const task: Promise<void> = process(source, eventId)
      .then(
        (result) => {
          if (!result.ok) {
            logger.error("Incoming event state update failed", {
              source,
              eventId,
              error: result.error.message,
            });
          }
        },
        (e: unknown) => {
          logger.error("Incoming event processing threw", { source, eventId, error: errorMessage(e) });
        },
      )
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  };

  return {
    async receive(sourceName, rawBody, header) {
      const source = sources[sourceName];
      if (!source) return err(notFound("Webhook source"));

      const verified = verifier.verify(source, rawBody, header(source.header));
      if (!verified.ok) {
        metrics.incomingEventsTotal.inc({ source: sourceName, outcome: "rejected" });
        logger.warn("Incoming webhook signature rejected", {
          source: sourceName,
          reason: verified.error.details?.["reason"],
        });
        return verified;
      }

      const event = parseEvent(rawBody);
      if (!event) {
        metrics.incomingEventsTotal.inc({ source: sourceName, outcome: "rejected" });
        return err(badRequest("Webhook body must be a JSON object with an id"));
      }

      const stored = await store.insertIfAbsent({
        source: sourceName,
        eventId: event.id,
        eventType: event.type,
        payload: rawBody,
        now: now(),
      });
      if (!stored.ok) return stored;

      if (!stored.value.inserted) {
        metrics.incomingEventsTotal.inc({ source: sourceName, outcome: "duplicate" });
        logger.info("Duplicate incoming event acknowledged", { source: sourceName, eventId: event.id });
        return ok({ eventId: event.id, duplicate: true });
      }

      metrics.incomingEventsTotal.inc({ source: sourceName, outcome: "accepted" });
      dispatch(sourceName, event.id);
      return ok({ eventId: event.id, duplicate: false });
    },

    process,

    async retry(source, eventId) {
      const found = await store.get(source, eventId);
      if (!found.ok) return found;
      const event = found.value;
      if (!event) return err(notFound("Incoming event"));

      const stalled =
        (event.status === IncomingEventStatus.RECEIVED || event.status === IncomingEventStatus.PROCESSING) &&
        event.updatedAt < now() - staleMs;
      if (event.status !== IncomingEventStatus.ERROR && !stalled) {
        return err(conflict(`Only failed or stalled events can be retried (status: ${event.status})`));
      }

      const reset = await store.transition(source, eventId, event.status, IncomingEventStatus.RECEIVED, now());
      if (!reset.ok) return reset;
      if (!reset.value) return err(conflict("Incoming event changed state; reload and retry"));

      logger.info("Incoming event re-dispatched by operator", { source, eventId, from: event.status });
      dispatch(source, eventId);
      return ok(reset.value);
    },

    async recoverStale() {
      const stale = await store.listStale(now() - staleMs, RECOVERY_BATCH);
      if (!stale.ok) return stale;

      let recovered = 0;
      for (const event of stale.value) {
        const reset = await store.transition(
          event.source,
          event.eventId,
          event.status,
          IncomingEventStatus.RECEIVED,
          now(),
        );
        if (!reset.ok) return reset;
        if (!reset.value) continue;
        dispatch(event.source, event.eventId);
        recovered++;
      }

      if (recovered > 0) logger.warn("Re-dispatched stalled incoming events", { count: recovered });
      return ok(recovered);
    },

    async list(query) {
      return store.list(query);
    },

    registerHandler(source, handler) {
      handlers.set(source, handler);
    },

    async drain() {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },
  };
};
