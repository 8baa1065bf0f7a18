import type Database from "better-sqlite3";
import type { CachedResponse, IdempotencyRecord } from "../../core/entities/idempotency-record.entity.js";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { IdempotencyStore, NewIdempotencyLock } from "../../core/ports/idempotency-store.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { type IdempotencyRow, rowToIdempotencyRecord, serializeHeaders } from "./rows.js";

/**
 * SQLite-backed idempotency store.
 * The (scope, key) primary key makes insert-if-absent atomic; every other
 * write is guarded on status and lock token in its WHERE clause.
 */
export const createSqliteIdempotencyStore = (db: Database.Database): IdempotencyStore => {
  const insertStmt = db.prepare<[string, string, string, string, number, number, number]>(
    `INSERT INTO idempotency_keys (scope, key, request_hash, status, lock_token, locked_at, created_at, expires_at)
     VALUES (?, ?, ?, 'locked', ?, ?, ?, ?)
     ON CONFLICT (scope, key) DO NOTHING`,
  );
  const findStmt = db.prepare<[string, string], IdempotencyRow>(
    "SELECT * FROM idempotency_keys WHERE scope = ? AND key = ?",
  );
  const stealStmt = db.prepare<[string, number, string, string, string]>(
    `UPDATE idempotency_keys SET lock_token = ?, locked_at = ?
     WHERE scope = ? AND key = ? AND status = 'locked' AND lock_token = ?`,
  );
  const completeStmt = db.prepare<[number, string, string, number, string, string, string]>(
    `UPDATE idempotency_keys
     SET status = 'completed', response_status = ?, response_body = ?, response_headers = ?, completed_at = ?
     WHERE scope = ? AND key = ? AND status = 'locked' AND lock_token = ?`,
  );
  const releaseStmt = db.prepare<[string, string, string]>(
    "DELETE FROM idempotency_keys WHERE scope = ? AND key = ? AND status = 'locked' AND lock_token = ?",
  );
  const evictStmt = db.prepare<[string, string, number]>(
    "DELETE FROM idempotency_keys WHERE scope = ? AND key = ? AND expires_at <= ?",
  );
  const purgeStmt = db.prepare<[number]>("DELETE FROM idempotency_keys WHERE expires_at <= ?");

  return {
    async insertLocked(lock: NewIdempotencyLock): Promise<Result<boolean, AppError>> {
      try {
        const result = insertStmt.run(
          lock.scope,
          lock.key,
          lock.requestHash,
          lock.lockToken,
          lock.now,
          lock.now,
          lock.expiresAt,
        );
        return ok(result.changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to insert idempotency key", e));
      }
    },

    async find(scope: string, key: string): Promise<Result<IdempotencyRecord | null, AppError>> {
      try {
        const row = findStmt.get(scope, key);
        return ok(row ? rowToIdempotencyRecord(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to read idempotency key", e));
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
        return ok(stealStmt.run(newToken, now, scope, key, expectedToken).changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to take over idempotency key", e));
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
        const result = completeStmt.run(
          response.status,
          response.body,
          serializeHeaders(response.headers),
          now,
          scope,
          key,
          lockToken,
        );
        return ok(result.changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to complete idempotency key", e));
      }
    },

    async release(scope: string, key: string, lockToken: string): Promise<Result<boolean, AppError>> {
      try {
        return ok(releaseStmt.run(scope, key, lockToken).changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to release idempotency key", e));
      }
    },

    async evictExpired(scope: string, key: string, now: number): Promise<Result<boolean, AppError>> {
      try {
        return ok(evictStmt.run(scope, key, now).changes === 1);
      } catch (e: unknown) {
        return err(internal("Failed to evict idempotency key", e));
      }
    },

    async purgeExpired(now: number): Promise<Result<number, AppError>> {
      try {
        return ok(purgeStmt.run(now).changes);
      } catch (e: unknown) {
        return err(internal("Failed to purge idempotency keys", e));
      }
    },
  };
};
