import { createHash } from "node:crypto";
import type { CachedResponse } from "../../core/entities/idempotency-record.entity.js";
import { IdempotencyStatus } from "../../core/entities/idempotency-record.entity.js";
import { type AppError, invalidIdempotencyKey } from "../../core/errors/app-error.js";
import type { IdempotencyStore } from "../../core/ports/idempotency-store.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

export const GateDecisionKind = {
  PROCEED: "proceed",
  REPLAY: "replay",
  CONFLICT: "conflict",
  LOCKED: "locked",
} as const;

export type GateDecisionKind = (typeof GateDecisionKind)[keyof typeof GateDecisionKind];

export type GateDecision =
  | { readonly kind: typeof GateDecisionKind.PROCEED; readonly lockToken: string }
  | { readonly kind: typeof GateDecisionKind.REPLAY; readonly response: CachedResponse }
  | { readonly kind: typeof GateDecisionKind.CONFLICT }
  | { readonly kind: typeof GateDecisionKind.LOCKED };

/**
 * Idempotency gate: decides whether a keyed mutating request may run.
 *
 * Exactly one holder of a (scope, key) is in `proceed` at a time. The holder
 * must end with `complete` (response cached for replay) or `release`
 * (record deleted so the client can retry cleanly).
 */
export interface IdempotencyGate {
  acquire(key: string, scope: string, requestHash: string): Promise<Result<GateDecision, AppError>>;
  /** false when the lock was lost to a stealer; the response is then not cached */
  complete(
    scope: string,
    key: string,
    lockToken: string,
    response: CachedResponse,
  ): Promise<Result<boolean, AppError>>;
  release(scope: string, key: string, lockToken: string): Promise<Result<boolean, AppError>>;
  /** Delete every expired record; returns how many went */
  sweep(): Promise<Result<number, AppError>>;
}

interface Deps {
  readonly store: IdempotencyStore;
  readonly logger: Logger;
  /** Record lifetime from creation (24h) */
  readonly ttlMs: number;
  /** Age after which a `locked` record is considered abandoned */
  readonly staleLockMs: number;
  readonly now?: (() => number) | undefined;
}

/** Insert/steal races are retried this many times before reporting `locked` */
const MAX_ACQUIRE_ROUNDS = 3;

const KEY_PATTERN = /^[\x21-\x7e]{1,255}$/;

export const validateIdempotencyKey = (raw: string): Result<string, AppError> => {
  const key = raw.trim();
  if (!KEY_PATTERN.test(key)) {
    return err(invalidIdempotencyKey("Idempotency-Key must be 1-255 printable ASCII characters"));
  }
  return ok(key);
};

/** Request fingerprint: SHA-256 over method, path and raw body */
export const hashRequest = (method: string, path: string, body: string): string =>
  createHash("sha256").update(`${method.toUpperCase()}\n${path}\n${body}`).digest("hex");

export const createIdempotencyGate = (deps: Deps): IdempotencyGate => {
  const { store, ttlMs, staleLockMs } = deps;
  const now = deps.now ?? Date.now;
  const logger = deps.logger.child({ service: "idempotency" });

  const acquire = async (
    key: string,
    scope: string,
    requestHash: string,
  ): Promise<Result<GateDecision, AppError>> => {
    for (let round = 0; round < MAX_ACQUIRE_ROUNDS; round++) {
      const at = now();
      const lockToken = generateId();

      const inserted = await store.insertLocked({
        scope,
        key,
        requestHash,
        lockToken,
        now: at,
        expiresAt: at + ttlMs,
      });
      if (!inserted.ok) return inserted;
      if (inserted.value) return ok({ kind: GateDecisionKind.PROCEED, lockToken });

      const found = await store.find(scope, key);
      if (!found.ok) return found;
      const record = found.value;
      if (!record) continue; // released between insert and read

      if (record.expiresAt <= at) {
        const evicted = await store.evictExpired(scope, key, at);
        if (!evicted.ok) return evicted;
        continue;
      }

      if (record.requestHash !== requestHash) {
        logger.warn("Idempotency key reused with a different request", { scope, key });
        return ok({ kind: GateDecisionKind.CONFLICT });
      }

      if (record.status === IdempotencyStatus.COMPLETED && record.response) {
        return ok({ kind: GateDecisionKind.REPLAY, response: record.response });
      }

      if (at - record.lockedAt < staleLockMs) {
        return ok({ kind: GateDecisionKind.LOCKED });
      }

      const stolen = await store.steal(scope, key, record.lockToken, lockToken, at);
      if (!stolen.ok) return stolen;
      if (stolen.value) {
        logger.warn("Took over abandoned idempotency lock", {
          scope,
          key,
          lockedForMs: at - record.lockedAt,
        });
        return ok({ kind: GateDecisionKind.PROCEED, lockToken });
      }
    }

    return ok({ kind: GateDecisionKind.LOCKED });
  };

  return {
    acquire,

    async complete(scope, key, lockToken, response) {
      const result = await store.complete(scope, key, lockToken, response, now());
      if (result.ok && !result.value) {
        logger.warn("Idempotency lock lost before completion; response not cached", { scope, key });
      }
      return result;
    },

    async release(scope, key, lockToken) {
      return store.release(scope, key, lockToken);
    },

    async sweep() {
      const result = await store.purgeExpired(now());
      if (result.ok && result.value > 0) {
        logger.info("Swept expired idempotency keys", { count: result.value });
      }
      return result;
    },
  };
};
