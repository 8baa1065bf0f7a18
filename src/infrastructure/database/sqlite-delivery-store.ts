import type Database from "better-sqlite3";
import type { WebhookDelivery } from "../../core/entities/webhook-delivery.entity.js";
import { type AppError, badRequest, internal } from "../../core/errors/app-error.js";
import type {
  AttemptRecord,
  ClaimRequest,
  DeliveryCounts,
  DeliveryListOptions,
  DeliveryStore,
  NewDelivery,
} from "../../core/ports/delivery-store.js";
import type { DeliveryId, EndpointId } from "../../core/types/brand.js";
import { type PaginatedResult, decodeCursor, toPage } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import { type DeliveryRow, emptyDeliveryCounts, isDeliveryStatus, rowToDelivery } from "./rows.js";

/**
 * SQLite-backed delivery queue.
 *
 * A claim is a single UPDATE … WHERE id = (SELECT …) RETURNING statement, so
 * two workers can never hold the same row. Writes that close an attempt are
 * guarded on `version` and discarded when another writer got there first.
 */
export const createSqliteDeliveryStore = (db: Database.Database): DeliveryStore => {
  const insertStmt = db.prepare<[string, string, string, string, string, string, number, number, number], DeliveryRow>(
    `INSERT INTO webhook_deliveries
       (id, endpoint_id, event_id, event_type, payload, queue, status, attempts, next_attempt_at, version, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, 'pending', 0, ?, 0, ?, ?)
     ON CONFLICT (endpoint_id, event_id) DO NOTHING
     RETURNING *`,
  );
  const claimStmt = db.prepare<[string, number, string, number], DeliveryRow>(
    `UPDATE webhook_deliveries
     SET status = 'in_flight', claimed_by = ?, version = version + 1, updated_at = ?
     WHERE id = (
       SELECT d.id FROM webhook_deliveries d
       JOIN webhook_endpoints e ON e.id = d.endpoint_id
       WHERE d.queue = ?
         AND d.status IN ('pending', 'pending_retry')
         AND d.next_attempt_at <= ?
         AND e.enabled = 1
         AND (e.max_concurrency IS NULL OR (
           SELECT COUNT(*) FROM webhook_deliveries f
           WHERE f.endpoint_id = d.endpoint_id AND f.status = 'in_flight'
         ) < e.max_concurrency)
       ORDER BY d.next_attempt_at, d.created_at
       LIMIT 1
     )
     AND status IN ('pending', 'pending_retry')
     RETURNING *`,
  );
  const finishStmt = db.prepare<
    [string, number, number | null, number, number | null, string | null, string | null, number, string, number],
    DeliveryRow
  >(
    `UPDATE webhook_deliveries
     SET status = ?, attempts = ?, next_attempt_at = ?, last_attempt_at = ?,
         last_response_status = ?, last_response_body = ?, last_error = ?,
         claimed_by = NULL, version = version + 1, updated_at = ?
     WHERE id = ? AND status = 'in_flight' AND version = ?
     RETURNING *`,
  );
  const releaseStmt = db.prepare<[number, string, number]>(
    `UPDATE webhook_deliveries
     SET status = 'pending_retry', claimed_by = NULL, version = version + 1, updated_at = ?
     WHERE id = ? AND status = 'in_flight' AND version = ?`,
  );
  const cancelClaimStmt = db.prepare<[number, string, number]>(
    `UPDATE webhook_deliveries
     SET status = 'cancelled', next_attempt_at = NULL, claimed_by = NULL,
         version = version + 1, updated_at = ?
     WHERE id = ? AND status = 'in_flight' AND version = ?`,
  );
  const cancelStmt = db.prepare<[number, string], DeliveryRow>(
    `UPDATE webhook_deliveries
     SET status = 'cancelled', next_attempt_at = NULL, version = version + 1, updated_at = ?
     WHERE id = ? AND status IN ('pending', 'pending_retry')
     RETURNING *`,
  );
  const cancelForEndpointStmt = db.prepare<[number, string]>(
    `UPDATE webhook_deliveries
     SET status = 'cancelled', next_attempt_at = NULL, version = version + 1, updated_at = ?
     WHERE endpoint_id = ? AND status IN ('pending', 'pending_retry')`,
  );
  const cancelOrphanedStmt = db.prepare<[number, number]>(
    `UPDATE webhook_deliveries
     SET status = 'cancelled', next_attempt_at = NULL, claimed_by = NULL,
         version = version + 1, updated_at = ?
     WHERE status = 'in_flight' AND updated_at < ?
       AND NOT EXISTS (SELECT 1 FROM webhook_endpoints e WHERE e.id = webhook_deliveries.endpoint_id)`,
  );
  const reclaimStmt = db.prepare<[number, number]>(
    `UPDATE webhook_deliveries
     SET status = 'pending_retry', claimed_by = NULL, version = version + 1, updated_at = ?
     WHERE status = 'in_flight' AND updated_at < ?`,
  );
  const getStmt = db.prepare<[string], DeliveryRow>("SELECT * FROM webhook_deliveries WHERE id = ?");
  const countStmt = db.prepare<[], { status: string; n: number }>(
    "SELECT status, COUNT(*) AS n FROM webhook_deliveries GROUP BY status",
  );

  const reclaimAll = db.transaction(
    (staleBefore: number, now: number): number =>
      cancelOrphanedStmt.run(now, staleBefore).changes + reclaimStmt.run(now, staleBefore).changes,
  );

  const enqueueAll = db.transaction((deliveries: readonly NewDelivery[], now: number) => {
    const inserted: WebhookDelivery[] = [];
    for (const d of deliveries) {
      const row = insertStmt.get(
        generateId(),
        d.endpointId,
        d.eventId,
        d.eventType,
        d.payload,
        d.queue,
        now,
        now,
        now,
      );
      if (row) inserted.push(rowToDelivery(row));
    }
    return inserted;
  });

  return {
    async enqueue(
      deliveries: readonly NewDelivery[],
      now: number,
    ): Promise<Result<readonly WebhookDelivery[], AppError>> {
      try {
        return ok(enqueueAll(deliveries, now));
      } catch (e: unknown) {
        return err(internal("Failed to enqueue deliveries", e));
      }
    },

    async claimNext(request: ClaimRequest): Promise<Result<WebhookDelivery | null, AppError>> {
      try {
        const row = claimStmt.get(request.workerId, request.now, request.queue, request.now);
        return ok(row ? rowToDelivery(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to claim delivery", e));
      }
    },

    async finishAttempt(
      id: DeliveryId,
      expectedVersion: number,
      record: AttemptRecord,
    ): Promise<Result<WebhookDelivery | null, AppError>> {
      try {
        const row = finishStmt.get(
          record.status,
          record.attempts,
          record.nextAttemptAt,
          record.now,
          record.responseStatus,
          record.responseBody,
          record.error,
          record.now,
          id,
          expectedVersion,
        );
        return ok(row ? rowToDelivery(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to record delivery attempt", e));
      }
    },

    async releaseClaim(
      id: DeliveryId,
      expectedVersion: number,
      now: number,
    ): Promise<Result<boolean, AppError>> {
      try {
        return ok(releaseStmt.run(now, id, expectedVersion).changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to release delivery", e));
      }
    },

    async cancelClaim(
      id: DeliveryId,
      expectedVersion: number,
      now: number,
    ): Promise<Result<boolean, AppError>> {
      try {
        return ok(cancelClaimStmt.run(now, id, expectedVersion).changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to cancel claimed delivery", e));
      }
    },

    async cancel(id: DeliveryId, now: number): Promise<Result<WebhookDelivery | null, AppError>> {
      try {
        const row = cancelStmt.get(now, id);
        return ok(row ? rowToDelivery(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to cancel delivery", e));
      }
    },

    async cancelForEndpoint(endpointId: EndpointId, now: number): Promise<Result<number, AppError>> {
      try {
        return ok(cancelForEndpointStmt.run(now, endpointId).changes);
      } catch (e: unknown) {
        return err(internal("Failed to cancel endpoint deliveries", e));
      }
    },

    async reclaimStale(staleBefore: number, now: number): Promise<Result<number, AppError>> {
      try {
        return ok(reclaimAll(staleBefore, now));
      } catch (e: unknown) {
        return err(internal("Failed to reclaim stale deliveries", e));
      }
    },

    async get(id: DeliveryId): Promise<Result<WebhookDelivery | null, AppError>> {
      try {
        const row = getStmt.get(id);
        return ok(row ? rowToDelivery(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to read delivery", e));
      }
    },

    async listByEndpoint(
      endpointId: EndpointId,
      options: DeliveryListOptions,
    ): Promise<Result<PaginatedResult<WebhookDelivery>, AppError>> {
      const clauses = ["endpoint_id = ?"];
      const params: (string | number)[] = [endpointId];
      if (options.status) {
        clauses.push("status = ?");
        params.push(options.status);
      }
      if (options.cursor) {
        const position = decodeCursor(options.cursor);
        if (!position) return err(badRequest("Invalid cursor"));
        clauses.push("(created_at < ? OR (created_at = ? AND id < ?))");
        params.push(position.createdAt, position.createdAt, position.id);
      }
      params.push(options.limit + 1);

      try {
        const rows = db
          .prepare<(string | number)[], DeliveryRow>(
            `SELECT * FROM webhook_deliveries WHERE ${clauses.join(" AND ")}
             ORDER BY created_at DESC, id DESC LIMIT ?`,
          )
          .all(...params);
        return ok(
          toPage(rows.map(rowToDelivery), options.limit, (d) => ({ createdAt: d.createdAt, id: d.id })),
        );
      } catch (e: unknown) {
        return err(internal("Failed to list deliveries", e));
      }
    },

    async countByStatus(): Promise<Result<DeliveryCounts, AppError>> {
      try {
        const counts = emptyDeliveryCounts();
        for (const row of countStmt.all()) {
          if (isDeliveryStatus(row.status)) counts[row.status] = row.n;
        }
        return ok(counts);
      } catch (e: unknown) {
        return err(internal("Failed to count deliveries", e));
      }
    },
  };
};
