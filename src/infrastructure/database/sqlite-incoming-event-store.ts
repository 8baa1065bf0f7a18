import type Database from "better-sqlite3";
import type {
  IncomingEventStatus,
  IncomingWebhookEvent,
} from "../../core/entities/incoming-event.entity.js";
import { type AppError, badRequest, internal } from "../../core/errors/app-error.js";
import type {
  IncomingEventListOptions,
  IncomingEventStore,
  NewIncomingEvent,
} from "../../core/ports/incoming-event-store.js";
import { type PaginatedResult, decodeCursor, toPage } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import { type IncomingEventRow, rowToIncomingEvent } from "./rows.js";

/**
 * SQLite-backed inbound event table, unique on (source, event_id).
 */
export const createSqliteIncomingEventStore = (db: Database.Database): IncomingEventStore => {
  const insertStmt = db.prepare<[string, string, string, string | null, string, number, number], IncomingEventRow>(
    `INSERT INTO webhook_events (id, source, event_id, event_type, payload, status, received_at, updated_at)
     VALUES (?, ?, ?, ?, ?, 'received', ?, ?)
     ON CONFLICT (source, event_id) DO NOTHING
     RETURNING *`,
  );
  const getStmt = db.prepare<[string, string], IncomingEventRow>(
    "SELECT * FROM webhook_events WHERE source = ? AND event_id = ?",
  );
  const transitionStmt = db.prepare<
    [string, string | null, string, number, number, string, string, string],
    IncomingEventRow
  >(
    `UPDATE webhook_events
     SET status = ?, error_message = ?,
         processed_at = CASE WHEN ? = 'processed' THEN ? ELSE processed_at END,
         updated_at = ?
     WHERE source = ? AND event_id = ? AND status = ?
     RETURNING *`,
  );
  const staleStmt = db.prepare<[number, number], IncomingEventRow>(
    `SELECT * FROM webhook_events
     WHERE status IN ('received', 'processing') AND updated_at < ?
     ORDER BY updated_at ASC, id ASC
     LIMIT ?`,
  );

  return {
    async insertIfAbsent(
      event: NewIncomingEvent,
    ): Promise<Result<{ readonly event: IncomingWebhookEvent; readonly inserted: boolean }, AppError>> {
      try {
        const inserted = insertStmt.get(
          generateId(),
          event.source,
          event.eventId,
          event.eventType,
          event.payload,
          event.now,
          event.now,
        );
        if (inserted) return ok({ event: rowToIncomingEvent(inserted), inserted: true });

        const existing = getStmt.get(event.source, event.eventId);
        if (!existing) return err(internal("Incoming event vanished after conflict"));
        return ok({ event: rowToIncomingEvent(existing), inserted: false });
      } catch (e: unknown) {
        return err(internal("Failed to record incoming event", e));
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
        const row = transitionStmt.get(
          to,
          to === "error" ? (errorMessage ?? null) : null,
          to,
          now,
          now,
          source,
          eventId,
          from,
        );
        return ok(row ? rowToIncomingEvent(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to update incoming event", e));
      }
    },

    async listStale(
      staleBefore: number,
      limit: number,
    ): Promise<Result<readonly IncomingWebhookEvent[], AppError>> {
      try {
        return ok(staleStmt.all(staleBefore, limit).map(rowToIncomingEvent));
      } catch (e: unknown) {
        return err(internal("Failed to list stale incoming events", e));
      }
    },

    async get(source: string, eventId: string): Promise<Result<IncomingWebhookEvent | null, AppError>> {
      try {
        const row = getStmt.get(source, eventId);
        return ok(row ? rowToIncomingEvent(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to read incoming event", e));
      }
    },

    async list(
      options: IncomingEventListOptions,
    ): Promise<Result<PaginatedResult<IncomingWebhookEvent>, AppError>> {
      const clauses: string[] = [];
      const params: (string | number)[] = [];
      if (options.status) {
        clauses.push("status = ?");
        params.push(options.status);
      }
      if (options.source) {
        clauses.push("source = ?");
        params.push(options.source);
      }
      if (options.cursor) {
        const position = decodeCursor(options.cursor);
        if (!position) return err(badRequest("Invalid cursor"));
        clauses.push("(received_at < ? OR (received_at = ? AND id < ?))");
        params.push(position.createdAt, position.createdAt, position.id);
      }
      params.push(options.limit + 1);
      const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

      try {
        const rows = db
          .prepare<(string | number)[], IncomingEventRow>(
            `SELECT * FROM webhook_events ${where} ORDER BY received_at DESC, id DESC LIMIT ?`,
          )
          .all(...params);
        return ok(
          toPage(rows.map(rowToIncomingEvent), options.limit, (e) => ({
            createdAt: e.receivedAt,
            id: e.id,
          })),
        );
      } catch (e: unknown) {
        return err(internal("Failed to list incoming events", e));
      }
    },
  };
};
