/**
 * Incoming event store port: dedup table for inbound webhooks.
 */

import type { AppError } from "../errors/app-error.js";
import type {
  IncomingEventStatus,
  IncomingWebhookEvent,
} from "../entities/incoming-event.entity.js";
import type { CursorParams, PaginatedResult } from "../types/pagination.js";
import type { Result } from "../types/result.js";

export interface NewIncomingEvent {
  readonly source: string;
  readonly eventId: string;
  readonly eventType: string | null;
  readonly payload: string;
  readonly now: number;
}

export interface IncomingEventListOptions extends CursorParams {
  readonly status?: IncomingEventStatus | undefined;
  readonly source?: string | undefined;
}

export interface IncomingEventStore {
  /**
   * Atomic insert in `received`. On a (source, eventId) conflict nothing is
   * written and `inserted` is false.
   */
  insertIfAbsent(
    event: NewIncomingEvent,
  ): Promise<Result<{ readonly event: IncomingWebhookEvent; readonly inserted: boolean }, AppError>>;

  /**
   * Compare-and-set `from` → `to`. `errorMessage` is stored for `error` and
   * cleared otherwise; `processedAt` is set on `processed`.
   * Returns null when the row was not in `from`.
   */
  transition(
    source: string,
    eventId: string,
    from: IncomingEventStatus,
    to: IncomingEventStatus,
    now: number,
    errorMessage?: string | undefined,
  ): Promise<Result<IncomingWebhookEvent | null, AppError>>;

  /**
   * Events still `received` or `processing` whose last update is older than
   * `staleBefore`, oldest first. These were accepted but never finished.
   */
  listStale(staleBefore: number, limit: number): Promise<Result<readonly IncomingWebhookEvent[], AppError>>;

  get(source: string, eventId: string): Promise<Result<IncomingWebhookEvent | null, AppError>>;

  list(
    options: IncomingEventListOptions,
  ): Promise<Result<PaginatedResult<IncomingWebhookEvent>, AppError>>;
}
