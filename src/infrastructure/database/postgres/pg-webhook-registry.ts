/**
 * PostgreSQL webhook endpoint registry adapter.
 */

import type { WebhookEndpoint, WebhookEventType } from "../../../core/entities/webhook-endpoint.entity.js";
import { isSubscribed } from "../../../core/entities/webhook-endpoint.entity.js";
import { type AppError, internal, notFound } from "../../../core/errors/app-error.js";
import type {
  CreateEndpointData,
  UpdateEndpointData,
  WebhookRegistry,
} from "../../../core/ports/webhook-registry.js";
import type { EndpointId, OwnerId } from "../../../core/types/brand.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { generateId } from "../../../shared/utils/id.js";
import { type EndpointRow, rowToEndpoint } from "../rows.js";
import type { PgPool } from "./connection.js";

export const createPgWebhookRegistry = (pool: PgPool): WebhookRegistry => {
  const get = async (id: EndpointId): Promise<WebhookEndpoint | null> => {
    const { rows } = await pool.query<EndpointRow>("SELECT * FROM webhook_endpoints WHERE id = $1", [id]);
    const row = rows[0];
    return row ? rowToEndpoint(row) : null;
  };

  return {
    async create(data: CreateEndpointData): Promise<Result<WebhookEndpoint, AppError>> {
      try {
        const { rows } = await pool.query<EndpointRow>(
          `INSERT INTO webhook_endpoints
             (id, owner_id, url, secret, events, all_events, enabled, description, max_concurrency, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, TRUE, $7, $8, $9, $9)
           RETURNING *`,
          [
            generateId(),
            data.ownerId,
            data.url,
            data.secret,
            JSON.stringify(data.events),
            data.allEvents,
            data.description,
            data.maxConcurrency,
            data.now,
          ],
        );
        const row = rows[0];
        if (!row) return err(internal("Insert returned no row"));
        return ok(rowToEndpoint(row));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async get(id: EndpointId): Promise<Result<WebhookEndpoint | null, AppError>> {
      try {
        return ok(await get(id));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async listByOwner(ownerId: OwnerId): Promise<Result<readonly WebhookEndpoint[], AppError>> {
      try {
        const { rows } = await pool.query<EndpointRow>(
          "SELECT * FROM webhook_endpoints WHERE owner_id = $1 ORDER BY created_at DESC, id DESC",
          [ownerId],
        );
        return ok(rows.map(rowToEndpoint));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async findSubscribed(
      ownerId: OwnerId,
      type: WebhookEventType,
    ): Promise<Result<readonly WebhookEndpoint[], AppError>> {
      try {
        const { rows } = await pool.query<EndpointRow>(
          "SELECT * FROM webhook_endpoints WHERE owner_id = $1 AND enabled ORDER BY created_at, id",
          [ownerId],
        );
        return ok(rows.map(rowToEndpoint).filter((endpoint) => isSubscribed(endpoint, type)));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async update(
      id: EndpointId,
      changes: UpdateEndpointData,
      now: number,
    ): Promise<Result<WebhookEndpoint, AppError>> {
      try {
        const current = await get(id);
        if (!current) return err(notFound("Webhook endpoint"));
        const { rows } = await pool.query<EndpointRow>(
          `UPDATE webhook_endpoints
           SET url = $1, events = $2, all_events = $3, enabled = $4, description = $5, max_concurrency = $6, updated_at = $7
           WHERE id = $8
           RETURNING *`,
          [
            changes.url ?? current.url,
            JSON.stringify(changes.events ?? current.events),
            changes.allEvents ?? current.allEvents,
            changes.enabled ?? current.enabled,
            changes.description === undefined ? current.description : changes.description,
            changes.maxConcurrency === undefined ? current.maxConcurrency : changes.maxConcurrency,
            now,
            id,
          ],
        );
        const row = rows[0];
        if (!row) return err(notFound("Webhook endpoint"));
        return ok(rowToEndpoint(row));
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async replaceSecret(id: EndpointId, secret: string, now: number): Promise<Result<void, AppError>> {
      try {
        const result = await pool.query(
          "UPDATE webhook_endpoints SET secret = $1, updated_at = $2 WHERE id = $3",
          [secret, now, id],
        );
        if (result.rowCount === 0) return err(notFound("Webhook endpoint"));
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },

    async remove(id: EndpointId): Promise<Result<void, AppError>> {
      try {
        const result = await pool.query("DELETE FROM webhook_endpoints WHERE id = $1", [id]);
        if (result.rowCount === 0) return err(notFound("Webhook endpoint"));
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Database error", e));
      }
    },
  };
};
