import type Database from "better-sqlite3";
import type { WebhookEndpoint, WebhookEventType } from "../../core/entities/webhook-endpoint.entity.js";
import { isSubscribed } from "../../core/entities/webhook-endpoint.entity.js";
import { type AppError, internal, notFound } from "../../core/errors/app-error.js";
import type {
  CreateEndpointData,
  UpdateEndpointData,
  WebhookRegistry,
} from "../../core/ports/webhook-registry.js";
import type { EndpointId, OwnerId } from "../../core/types/brand.js";
import { brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import { type EndpointRow, rowToEndpoint } from "./rows.js";

/**
 * SQLite-backed webhook endpoint registry.
 * Subscriptions are stored as a JSON array plus an `all_events` flag.
 */
export const createSqliteWebhookRegistry = (db: Database.Database): WebhookRegistry => {
  const insertStmt = db.prepare<
    [string, string, string, string, string, number, string | null, number | null, number, number]
  >(
    `INSERT INTO webhook_endpoints
       (id, owner_id, url, secret, events, all_events, enabled, description, max_concurrency, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, 1, ?, ?, ?, ?)`,
  );
  const getStmt = db.prepare<[string], EndpointRow>("SELECT * FROM webhook_endpoints WHERE id = ?");
  const listStmt = db.prepare<[string], EndpointRow>(
    "SELECT * FROM webhook_endpoints WHERE owner_id = ? ORDER BY created_at DESC, id DESC",
  );
  const listEnabledStmt = db.prepare<[string], EndpointRow>(
    "SELECT * FROM webhook_endpoints WHERE owner_id = ? AND enabled = 1 ORDER BY created_at, id",
  );
  const updateStmt = db.prepare<
    [string, string, number, number, string | null, number | null, number, string]
  >(
    `UPDATE webhook_endpoints
     SET url = ?, events = ?, all_events = ?, enabled = ?, description = ?, max_concurrency = ?, updated_at = ?
     WHERE id = ?`,
  );
  const secretStmt = db.prepare<[string, number, string]>(
    "UPDATE webhook_endpoints SET secret = ?, updated_at = ? WHERE id = ?",
  );
  const deleteStmt = db.prepare<[string]>("DELETE FROM webhook_endpoints WHERE id = ?");

  return {
    async create(data: CreateEndpointData): Promise<Result<WebhookEndpoint, AppError>> {
      try {
        const id = generateId();
        insertStmt.run(
          id,
          data.ownerId,
          data.url,
          data.secret,
          JSON.stringify(data.events),
          data.allEvents ? 1 : 0,
          data.description,
          data.maxConcurrency,
          data.now,
          data.now,
        );
        return ok({
          id: brand<string, "EndpointId">(id),
          ownerId: data.ownerId,
          url: data.url,
          secret: data.secret,
          events: [...data.events],
          allEvents: data.allEvents,
          enabled: true,
          description: data.description,
          maxConcurrency: data.maxConcurrency,
          createdAt: data.now,
          updatedAt: data.now,
        });
      } catch (e: unknown) {
        return err(internal("Failed to create webhook endpoint", e));
      }
    },

    async get(id: EndpointId): Promise<Result<WebhookEndpoint | null, AppError>> {
      try {
        const row = getStmt.get(id);
        return ok(row ? rowToEndpoint(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to read webhook endpoint", e));
      }
    },

    async listByOwner(ownerId: OwnerId): Promise<Result<readonly WebhookEndpoint[], AppError>> {
      try {
        return ok(listStmt.all(ownerId).map(rowToEndpoint));
      } catch (e: unknown) {
        return err(internal("Failed to list webhook endpoints", e));
      }
    },

    async findSubscribed(
      ownerId: OwnerId,
      type: WebhookEventType,
    ): Promise<Result<readonly WebhookEndpoint[], AppError>> {
      try {
        const endpoints = listEnabledStmt.all(ownerId).map(rowToEndpoint);
        return ok(endpoints.filter((endpoint) => isSubscribed(endpoint, type)));
      } catch (e: unknown) {
        return err(internal("Failed to match webhook endpoints", e));
      }
    },

    async update(
      id: EndpointId,
      changes: UpdateEndpointData,
      now: number,
    ): Promise<Result<WebhookEndpoint, AppError>> {
      try {
        const row = getStmt.get(id);
        if (!row) return err(notFound("Webhook endpoint"));
        const current = rowToEndpoint(row);
        const next: WebhookEndpoint = {
          ...current,
          url: changes.url ?? current.url,
          events: changes.events ? [...changes.events] : current.events,
          allEvents: changes.allEvents ?? current.allEvents,
          enabled: changes.enabled ?? current.enabled,
          description: changes.description === undefined ? current.description : changes.description,
          maxConcurrency:
            changes.maxConcurrency === undefined ? current.maxConcurrency : changes.maxConcurrency,
          updatedAt: now,
        };
        updateStmt.run(
          next.url,
          JSON.stringify(next.events),
          next.allEvents ? 1 : 0,
          next.enabled ? 1 : 0,
          next.description,
          next.maxConcurrency,
          now,
          id,
        );
        return ok(next);
      } catch (e: unknown) {
        return err(internal("Failed to update webhook endpoint", e));
      }
    },

    async replaceSecret(id: EndpointId, secret: string, now: number): Promise<Result<void, AppError>> {
      try {
        if (secretStmt.run(secret, now, id).changes === 0) return err(notFound("Webhook endpoint"));
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Failed to rotate webhook secret", e));
      }
    },

    async remove(id: EndpointId): Promise<Result<void, AppError>> {
      try {
        if (deleteStmt.run(id).changes === 0) return err(notFound("Webhook endpoint"));
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Failed to delete webhook endpoint", e));
      }
    },
  };
};
