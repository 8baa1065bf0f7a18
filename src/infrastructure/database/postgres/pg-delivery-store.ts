/**
 * PostgreSQL delivery queue adapter.
 *
 * Claims lock the chosen row with FOR UPDATE SKIP LOCKED so concurrent
 * workers in other processes pass over it instead of waiting.
 */

import type { WebhookDelivery } from "../../../core/entities/webhook-delivery.entity.js";
import { type AppError, badRequest, internal } from "../../../core/errors/app-error.js";
import type {
  AttemptRecord,
  ClaimRequest,
  DeliveryCounts,
  DeliveryListOptions,
  DeliveryStore,
  NewDelivery,
} from "../../../core/ports/delivery-store.js";
import type { DeliveryId, EndpointId } from "../../../core/types/brand.js";
import { type PaginatedResult, decodeCursor, toPage } from "../../../core/types/pagination.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { generateId } from "../../../shared/utils/id.js";
import { type DeliveryRow, emptyDeliveryCounts, isDeliveryStatus, rowToDelivery } from "../rows.js";
import { type PgPool, withTransaction } from "./connection.js";

const firstDelivery = (rows: readonly DeliveryRow[]): WebhookDelivery | null => {
  const row = rows[0];
  return row ? rowToDelivery(row) : null;
};

export const createPgDeliveryStore = (pool: PgPool): DeliveryStore => ({
  async enqueue(
    deliveries: readonly NewDelivery[],
    now: number,
  ): Promise<Result<readonly WebhookDelivery[], AppError>> {
    try {
      const inserted = await withTransaction(pool, async (client) => {
        const out: WebhookDelivery[] = [];
        for (const d of deliveries) {
          const { rows } = await client.query<DeliveryRow>(
            `INSERT INTO webhook_deliveries
               (id, endpoint_id, event_id, event_type, payload, queue, status, attempts, next_attempt_at, version, created_at, updated_at)
             VALUES ($1, $2, $3, $4, $5, $6, 'pending', 0, $7, 0, $7, $7)
             ON CONFLICT (endpoint_id, event_id) DO NOTHING
             RETURNING *`,
            [generateId(), d.endpointId, d.eventId, d.eventType, d.payload, d.queue, now],
          );
          const row = firstDelivery(rows);
          if (row) out.push(row);
        }
        return out;
      });
      return ok(inserted);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async claimNext(request: ClaimRequest): Promise<Result<WebhookDelivery | null, AppError>> {
    try {
      const { rows } = await pool.query<DeliveryRow>(
        `UPDATE webhook_deliveries d
         SET status = 'in_flight', claimed_by = $1, version = d.version + 1, updated_at = $2
         FROM (
           SELECT c.id FROM webhook_deliveries c
           JOIN webhook_endpoints e ON e.id = c.endpoint_id
           WHERE c.queue = $3
             AND c.status IN ('pending', 'pending_retry')
             AND c.next_attempt_at <= $2
             AND e.enabled
             AND (e.max_concurrency IS NULL OR (
               SELECT COUNT(*) FROM webhook_deliveries f
               WHERE f.endpoint_id = c.endpoint_id AND f.status = 'in_flight'
             ) < e.max_concurrency)
           ORDER BY c.next_attempt_at, c.created_at
           LIMIT 1
           FOR UPDATE OF c SKIP LOCKED
         ) picked
         WHERE d.id = picked.id
         RETURNING d.*`,
        [request.workerId, request.now, request.queue],
      );
      return ok(firstDelivery(rows));
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async finishAttempt(
    id: DeliveryId,
    expectedVersion: number,
    record: AttemptRecord,
  ): Promise<Result<WebhookDelivery | null, AppError>> {
    try {
      const { rows } = await pool.query<DeliveryRow>(
        `UPDATE webhook_deliveries
         SET status = $1, attempts = $2, next_attempt_at = $3, last_attempt_at = $4,
             last_response_status = $5, last_response_body = $6, last_error = $7,
             claimed_by = NULL, version = version + 1, updated_at = $4
         WHERE id = $8 AND status = 'in_flight' AND version = $9
         RETURNING *`,
        [
          record.status,
          record.attempts,
          record.nextAttemptAt,
          record.now,
          record.responseStatus,
          record.responseBody,
          record.error,
          id,
          expectedVersion,
        ],
      );
      return ok(firstDelivery(rows));
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async releaseClaim(
    id: DeliveryId,
    expectedVersion: number,
    now: number,
  ): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        `UPDATE webhook_deliveries
         SET status = 'pending_retry', claimed_by = NULL, version = version + 1, updated_at = $1
         WHERE id = $2 AND status = 'in_flight' AND version = $3`,
        [now, id, expectedVersion],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async cancelClaim(
    id: DeliveryId,
    expectedVersion: number,
    now: number,
  ): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        `UPDATE webhook_deliveries
         SET status = 'cancelled', next_attempt_at = NULL, claimed_by = NULL,
             version = version + 1, updated_at = $1
         WHERE id = $2 AND status = 'in_flight' AND version = $3`,
        [now, id, expectedVersion],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async cancel(id: DeliveryId, now: number): Promise<Result<WebhookDelivery | null, AppError>> {
    try {
      const { rows } = await pool.query<DeliveryRow>(
        `UPDATE webhook_deliveries
         SET status = 'cancelled', next_attempt_at = NULL, version = version + 1, updated_at = $1
         WHERE id = $2 AND status IN ('pending', 'pending_retry')
         RETURNING *`,
        [now, id],
      );
      return ok(firstDelivery(rows));
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async cancelForEndpoint(endpointId: EndpointId, now: number): Promise<Result<number, AppError>> {
    try {
      const result = await pool.query(
        `UPDATE webhook_deliveries
         SET status = 'cancelled', next_attempt_at = NULL, version = version + 1, updated_at = $1
         WHERE endpoint_id = $2 AND status IN ('pending', 'pending_retry')`,
        [now, endpointId],
      );
      return ok(result.rowCount ?? 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async reclaimStale(staleBefore: number, now: number): Promise<Result<number, AppError>> {
    try {
      const reclaimed = await withTransaction(pool, async (client) => {
        const orphaned = await client.query(
          `UPDATE webhook_deliveries d
           SET status = 'cancelled', next_attempt_at = NULL, claimed_by = NULL,
               version = d.version + 1, updated_at = $1
           WHERE d.status = 'in_flight' AND d.updated_at < $2
             AND NOT EXISTS (SELECT 1 FROM webhook_endpoints e WHERE e.id = d.endpoint_id)`,
          [now, staleBefore],
        );
        const requeued = await client.query(
          `UPDATE webhook_deliveries
           SET status = 'pending_retry', claimed_by = NULL, version = version + 1, updated_at = $1
           WHERE status = 'in_flight' AND updated_at < $2`,
          [now, staleBefore],
        );
        return (orphaned.rowCount ?? 0) + (requeued.rowCount ?? 0);
      });
      return ok(reclaimed);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async get(id: DeliveryId): Promise<Result<WebhookDelivery | null, AppError>> {
    try {
      const { rows } = await pool.query<DeliveryRow>("SELECT * FROM webhook_deliveries WHERE id = $1", [id]);
      return ok(firstDelivery(rows));
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async listByEndpoint(
    endpointId: EndpointId,
    options: DeliveryListOptions,
  ): Promise<Result<PaginatedResult<WebhookDelivery>, AppError>> {
    const params: (string | number)[] = [endpointId];
    const clauses = ["endpoint_id = $1"];
    if (options.status) {
      params.push(options.status);
      clauses.push(`status = $${params.length}`);
    }
    if (options.cursor) {
      const position = decodeCursor(options.cursor);
      if (!position) return err(badRequest("Invalid cursor"));
      params.push(position.createdAt, position.id);
      const at = params.length - 1;
      clauses.push(`(created_at < $${at} OR (created_at = $${at} AND id < $${at + 1}))`);
    }
    params.push(options.limit + 1);

    try {
      const { rows } = await pool.query<DeliveryRow>(
        `SELECT * FROM webhook_deliveries WHERE ${clauses.join(" AND ")}
         ORDER BY created_at DESC, id DESC LIMIT $${params.length}`,
        params,
      );
      return ok(
        toPage(rows.map(rowToDelivery), options.limit, (d) => ({ createdAt: d.createdAt, id: d.id })),
      );
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async countByStatus(): Promise<Result<DeliveryCounts, AppError>> {
    try {
      const { rows } = await pool.query<{ status: string; n: number }>(
        "SELECT status, COUNT(*) AS n FROM webhook_deliveries GROUP BY status",
      );
      const counts = emptyDeliveryCounts();
      for (const row of rows) {
        if (isDeliveryStatus(row.status)) counts[row.status] = Number(row.n);
      }
      return ok(counts);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },
});
