/**
 * Idempotency store port: durable (scope, key) records backing the gate.
 *
 * Every mutating method is a single compare-and-set statement against the
 * store; callers never hold an application-level lock. Boolean results
 * report whether the guarded write matched a row.
 */

import type { AppError } from "../errors/app-error.js";
import type { CachedResponse, IdempotencyRecord } from "../entities/idempotency-record.entity.js";
import type { Result } from "../types/result.js";

export interface NewIdempotencyLock {
  readonly scope: string;
  readonly key: string;
  readonly requestHash: string;
  readonly lockToken: string;
  readonly now: number;
  readonly expiresAt: number;
}

export interface IdempotencyStore {
  /** Insert a `locked` record unless one exists for (scope, key). true = inserted */
  insertLocked(lock: NewIdempotencyLock): Promise<Result<boolean, AppError>>;

  find(scope: string, key: string): Promise<Result<IdempotencyRecord | null, AppError>>;

  /**
   * Hand a still-`locked` record to a new holder. Matches only while the
   * record carries `expectedToken`, so two stealers cannot both win.
   */
  steal(
    scope: string,
    key: string,
    expectedToken: string,
    newToken: string,
    now: number,
  ): Promise<Result<boolean, AppError>>;

  /** `locked` → `completed` with the response, guarded on the lock token */
  complete(
    scope: string,
    key: string,
    lockToken: string,
    response: CachedResponse,
    now: number,
  ): Promise<Result<boolean, AppError>>;

  /** Delete a `locked` record held by `lockToken` */
  release(scope: string, key: string, lockToken: string): Promise<Result<boolean, AppError>>;

  /** Delete (scope, key) if its expiry has passed, so the key can be reused */
  evictExpired(scope: string, key: string, now: number): Promise<Result<boolean, AppError>>;

  /** Delete every record whose expiry has passed, whatever its status */
  purgeExpired(now: number): Promise<Result<number, AppError>>;
}
