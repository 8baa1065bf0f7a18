/**
 * PostgreSQL idempotency store adapter.
 */

import type { CachedResponse, IdempotencyRecord } from "../../../core/entities/idempotency-record.entity.js";
import { type AppError, internal } from "../../../core/errors/app-error.js";
import type { IdempotencyStore, NewIdempotencyLock } from "../../../core/ports/idempotency-store.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { type IdempotencyRow, rowToIdempotencyRecord, serializeHeaders } from "../rows.js";
import type { PgPool } from "./connection.js";

export const createPgIdempotencyStore = (pool: PgPool): IdempotencyStore => ({
  async insertLocked(lock: NewIdempotencyLock): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        `INSERT INTO idempotency_keys (scope, key, request_hash, status, lock_token, locked_at, created_at, expires_at)
         VALUES ($1, $2, $3, 'locked', $4, $5, $5, $6)
         ON CONFLICT (scope, key) DO NOTHING`,
        [lock.scope, lock.key, lock.requestHash, lock.lockToken, lock.now, lock.expiresAt],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async find(scope: string, key: string): Promise<Result<IdempotencyRecord | null, AppError>> {
    try {
      const { rows } = await pool.query<IdempotencyRow>(
        "SELECT * FROM idempotency_keys WHERE scope = $1 AND key = $2",
        [scope, key],
      );
      const row = rows[0];
      return ok(row ? rowToIdempotencyRecord(row) : null);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async steal(
    scope: string,
    key: string,
    expectedToken: string,
    newToken: string,
    now: number,
  ): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        `UPDATE idempotency_keys SET lock_token = $1, locked_at = $2
         WHERE scope = $3 AND key = $4 AND status = 'locked' AND lock_token = $5`,
        [newToken, now, scope, key, expectedToken],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async complete(
    scope: string,
    key: string,
    lockToken: string,
    response: CachedResponse,
    now: number,
  ): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        `UPDATE idempotency_keys
         SET status = 'completed', response_status = $1, response_body = $2, response_headers = $3, completed_at = $4
         WHERE scope = $5 AND key = $6 AND status = 'locked' AND lock_token = $7`,
        [response.status, response.body, serializeHeaders(response.headers), now, scope, key, lockToken],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async release(scope: string, key: string, lockToken: string): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        "DELETE FROM idempotency_keys WHERE scope = $1 AND key = $2 AND status = 'locked' AND lock_token = $3",
        [scope, key, lockToken],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async evictExpired(scope: string, key: string, now: number): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool.query(
        "DELETE FROM idempotency_keys WHERE scope = $1 AND key = $2 AND expires_at <= $3",
        [scope, key, now],
      );
      return ok(result.rowCount === 1);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async purgeExpired(now: number): Promise<Result<number, AppError>> {
    try {
      const result = await pool.query("DELETE FROM idempotency_keys WHERE expires_at <= $1", [now]);
      return ok(result.rowCount ?? 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },
});
