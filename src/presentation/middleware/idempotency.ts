import {
  type GateDecision,
  GateDecisionKind,
  type IdempotencyGate,
  hashRequest,
  validateIdempotencyKey,
} from "../../application/services/idempotency.service.js";
import type { CachedResponse } from "../../core/entities/idempotency-record.entity.js";
import {
  errorMessage,
  idempotencyKeyInUse,
  idempotencyKeyReused,
} from "../../core/errors/app-error.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { OwnerId } from "../../core/types/brand.js";
import type { RequestContext } from "../context.js";
import { errorResponse } from "../handlers/response.js";

export const IDEMPOTENCY_HEADER = "idempotency-key";
export const REPLAYED_HEADER = "Idempotent-Replayed";

const GATED_METHODS: ReadonlySet<string> = new Set(["POST", "PUT", "PATCH", "DELETE"]);

/** Only these response headers are stored and replayed */
const CACHED_HEADERS = ["content-type", "location"] as const;

export type AccountHandler = (
  req: Request,
  ctx: RequestContext,
  accountId: OwnerId,
) => Promise<Response>;

const replay = (cached: CachedResponse, requestId: string): Response => {
  const headers = new Headers(cached.headers);
  headers.set(REPLAYED_HEADER, "true");
  headers.set("X-Request-Id", requestId);
  return new Response(cached.status === 204 ? null : cached.body, {
    status: cached.status,
    headers,
  });
};

const pickHeaders = (headers: Headers): Record<string, string> => {
  const picked: Record<string, string> = {};
  for (const name of CACHED_HEADERS) {
    const value = headers.get(name);
    if (value !== null) picked[name] = value;
  }
  return picked;
};

/**
 * Idempotency-Key gate around a mutating handler.
 *
 * The key is scoped to the caller and the path. A handler that answers
 * below 500 has its response cached for replay; a 5xx or a throw releases
 * the key so the client can retry with the same key.
 */
export const createIdempotencyMiddleware = (gate: IdempotencyGate, metrics: MetricsCollector) => {
  const record = (decision: GateDecision["kind"] | "bypass") =>
    metrics.idempotencyDecisionsTotal.inc({ outcome: decision });

  return (handler: AccountHandler): AccountHandler =>
    async (req, ctx, accountId) => {
      const rawKey = req.headers.get(IDEMPOTENCY_HEADER);
      if (rawKey === null || !GATED_METHODS.has(req.method)) {
        record("bypass");
        return handler(req, ctx, accountId);
      }

      const key = validateIdempotencyKey(rawKey);
      if (!key.ok) return errorResponse(key.error, ctx.requestId);

      const body = await req.clone().text();
      const scope = `${accountId}:${ctx.path}`;
      const decision = await gate.acquire(
        key.value,
        scope,
        hashRequest(req.method, ctx.path, body),
      );
      if (!decision.ok) return errorResponse(decision.error, ctx.requestId);
      const outcome = decision.value;
      record(outcome.kind);

      switch (outcome.kind) {
        case GateDecisionKind.CONFLICT:
          return errorResponse(idempotencyKeyReused(), ctx.requestId);
        case GateDecisionKind.LOCKED:
          return errorResponse(idempotencyKeyInUse(), ctx.requestId);
        case GateDecisionKind.REPLAY:
          ctx.logger.debug("Replaying idempotent response", { key: key.value });
          return replay(outcome.response, ctx.requestId);
        case GateDecisionKind.PROCEED:
          break;
      }

      const { lockToken } = outcome;
      let response: Response;
      try {
        response = await handler(req, ctx, accountId);
      } catch (e: unknown) {
        await gate.release(scope, key.value, lockToken);
        throw e;
      }

      if (response.status >= 500) {
        const released = await gate.release(scope, key.value, lockToken);
        if (!released.ok) {
          ctx.logger.error("Failed to release idempotency key", { error: released.error.message });
        }
        return response;
      }

      const responseBody = await response.text();
      const completed = await gate.complete(scope, key.value, lockToken, {
        status: response.status,
        body: responseBody,
        headers: pickHeaders(response.headers),
      });
      if (!completed.ok) {
        ctx.logger.error("Failed to store idempotent response", {
          error: errorMessage(completed.error.cause ?? completed.error.message),
        });
      }

      return new Response(response.status === 204 ? null : responseBody, {
        status: response.status,
        headers: response.headers,
      });
    };
};

export type IdempotencyMiddleware = ReturnType<typeof createIdempotencyMiddleware>;
