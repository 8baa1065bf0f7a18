/**
 * PostgreSQL inbound event adapter.
 */

import type {
  IncomingEventStatus,
  IncomingWebhookEvent,
} from "../../../core/entities/incoming-event.entity.js";
import { type AppError, badRequest, internal } from "../../../core/errors/app-error.js";
import type {
  IncomingEventListOptions,
  IncomingEventStore,
  NewIncomingEvent,
} from "../../../core/ports/incoming-event-store.js";
import { type PaginatedResult, decodeCursor, toPage } from "../../../core/types/pagination.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { generateId } from "../../../shared/utils/id.js";
import { type IncomingEventRow, rowToIncomingEvent } from "../rows.js";
import type { PgPool } from "./connection.js";

export const createPgIncomingEventStore = (pool: PgPool): IncomingEventStore => {
  const get = async (source: string, eventId: string): Promise<IncomingWebhookEvent | null> => {
    const { rows } = await pool.query<IncomingEventRow>(
      "SELECT * FROM webhook_events WHERE source = $1 AND event_id = $2",
      [source, eventId],
    );
    const row = rows[0];
    return row ? rowToIncomingEvent(row) : null;
  };

  return {
    async insertIfAbsent(
      event: NewIncomingEvent,
    ): Promise<Result<{ readonly event: IncomingWebhookEvent; readonly inserted: boolean }, AppError>> {
      try {
        const { rows } = await pool.query<IncomingEventRow>(
          `INSERT INTO webhook_events (id, source, event_id, event_type, payload, status, received_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, 'received', $6, $6)
           ON CONFLICT (source, event_id) DO NOTHING
           RETURNING *`,
          [generateId(), event.source, event.eventId, event.eventType, event.payload, event.now],
        );
        const row = rows[0];
        if (row) return ok({ event: rowToIncomingEvent(row), inserted: true });

        const existing = await get(event.source, event.eventId);
        if (!existing) return err(internal("Incoming event vanished after conflict"));
        return ok({ event: existing, inserted: false });
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async transition(
      source: string,
      eventId: string,
      from: IncomingEventStatus,
      to: IncomingEventStatus,
      now: number,
      errorMessage?: string | undefined,
    ): Promise<Result<IncomingWebhookEvent | null, AppError>> {
      try {
        const { rows } = await pool.query<IncomingEventRow>(
          `UPDATE webhook_events
           SET status = $1::text, error_message = $2,
               processed_at = CASE WHEN $1::text = 'processed' THEN $3::bigint ELSE processed_at END,
               updated_at = $3
           WHERE source = $4 AND event_id = $5 AND status = $6
           RETURNING *`,
          [to, to === "error" ? (errorMessage ?? null) : null, now, source, eventId, from],
        );
        const row = rows[0];
        return ok(row ? rowToIncomingEvent(row) : null);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async listStale(
      staleBefore: number,
      limit: number,
    ): Promise<Result<readonly IncomingWebhookEvent[], AppError>> {
      try {
        const { rows } = await pool.query<IncomingEventRow>(
          `SELECT * FROM webhook_events
           WHERE status IN ('received', 'processing') AND updated_at < $1
           ORDER BY updated_at ASC, id ASC
           LIMIT $2`,
          [staleBefore, limit],
        );
        return ok(rows.map(rowToIncomingEvent));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async get(source: string, eventId: string): Promise<Result<IncomingWebhookEvent | null, AppError>> {
      try {
        return ok(await get(source, eventId));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async list(
      options: IncomingEventListOptions,
    ): Promise<Result<PaginatedResult<IncomingWebhookEvent>, AppError>> {
      const params: (string | number)[] = [];
      const clauses: string[] = [];
      if (options.status) {
        params.push(options.status);
        clauses.push(`status = $${params.length}`);
      }
      if (options.source) {
        params.push(options.source);
        clauses.push(`source = $${params.length}`);
      }
      if (options.cursor) {
        const position = decodeCursor(options.cursor);
        if (!position) return err(badRequest("Invalid cursor"));
        params.push(position.createdAt, position.id);
        const at = params.length - 1;
        clauses.push(`(received_at < $${at} OR (received_at = $${at} AND id < $${at + 1}))`);
      }
      params.push(options.limit + 1);
      const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

      try {
        const { rows } = await pool.query<IncomingEventRow>(
          `SELECT * FROM webhook_events ${where} ORDER BY received_at DESC, id DESC LIMIT $${params.length}`,
          params,
        );
        return ok(
          toPage(rows.map(rowToIncomingEvent), options.limit, (e) => ({
            createdAt: e.receivedAt,
            id: e.id,
          })),
        );
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },
  };
};
