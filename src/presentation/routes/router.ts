import type { HealthService } from "../../application/services/health.service.js";
import type { IdempotencyGate } from "../../application/services/idempotency.service.js";
import type { IncomingWebhookService } from "../../application/services/incoming-webhook.service.js";
import type { WebhookService } from "../../application/services/webhook.service.js";
import { notFound } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { RequestContext } from "../context.js";
import { deliveryHandlers } from "../handlers/delivery.handler.js";
import { eventHandlers } from "../handlers/event.handler.js";
import { healthHandler } from "../handlers/health.handler.js";
import { incomingHandlers } from "../handlers/incoming.handler.js";
import { metricsHandler } from "../handlers/metrics.handler.js";
import { errorResponse } from "../handlers/response.js";
import { webhookHandlers } from "../handlers/webhook.handler.js";
import { resolveAccount } from "../middleware/account.js";
import { type AccountHandler, createIdempotencyMiddleware } from "../middleware/idempotency.js";

/**
 * Router.
 * Static routes use O(1) map lookup; parametric routes are matched segment
 * by segment in declaration order.
 */
export type RouteHandler = (req: Request, ctx: RequestContext) => Promise<Response>;

export interface RouteMatch {
  /** Route pattern, used as the metrics label */
  readonly route: string;
  readonly params: Readonly<Record<string, string>>;
  readonly handler: RouteHandler;
}

interface ParamRoute {
  readonly method: string;
  readonly pattern: string;
  readonly segments: readonly string[];
  readonly handler: RouteHandler;
}

interface RouterDeps {
  readonly webhookService: WebhookService;
  readonly incomingService: IncomingWebhookService;
  readonly healthService: HealthService;
  readonly gate: IdempotencyGate;
  readonly metrics: MetricsCollector;
  readonly logger: Logger;
}

const split = (path: string): string[] => path.split("/").filter((s) => s.length > 0);

const matchSegments = (
  pattern: readonly string[],
  actual: readonly string[],
): Record<string, string> | null => {
  if (pattern.length !== actual.length) return null;
  const params: Record<string, string> = {};
  for (const [i, segment] of pattern.entries()) {
    const value = actual[i];
    if (value === undefined) return null;
    if (segment.startsWith(":")) {
      try {
        params[segment.substring(1)] = decodeURIComponent(value);
      } catch {
        return null; // malformed escape never matches
      }
    } else if (segment !== value) {
      return null;
    }
  }
  return params;
};

export const createRouter = (deps: RouterDeps) => {
  const { logger } = deps;
  const handlerLogger = (handler: string) => logger.child({ layer: "handler", handler });

  const health = healthHandler(deps.healthService);
  const metrics = metricsHandler(deps.metrics);
  const events = eventHandlers(deps.webhookService, handlerLogger("events"));
  const webhooks = webhookHandlers(deps.webhookService, handlerLogger("webhooks"));
  const deliveries = deliveryHandlers(deps.webhookService, handlerLogger("deliveries"));
  const incoming = incomingHandlers(deps.incomingService);
  const idempotent = createIdempotencyMiddleware(deps.gate, deps.metrics);

  /** Resolve the caller before running an account-scoped handler */
  const account =
    (handler: AccountHandler): RouteHandler =>
    async (req, ctx) => {
      const accountId = resolveAccount(req);
      if (!accountId.ok) return errorResponse(accountId.error, ctx.requestId);
      return handler(req, ctx, accountId.value);
    };

  const staticRoutes = new Map<string, RouteHandler>([
    ["GET /health", async () => health.shallowCheck()],
    ["GET /readiness", async () => health.deepCheck()],
    ["GET /metrics", async () => metrics.serve()],

    ["POST /api/v1/events", account(idempotent(events.publish))],

    ["POST /api/v1/webhooks", account(idempotent(webhooks.create))],
    ["GET /api/v1/webhooks", account(webhooks.list)],

    ["GET /api/v1/incoming-events", incoming.list],
  ]);

  const paramRoutes: readonly ParamRoute[] = (
    [
      ["GET", "/api/v1/webhooks/:id", account(webhooks.get)],
      ["PATCH", "/api/v1/webhooks/:id", account(idempotent(webhooks.update))],
      ["DELETE", "/api/v1/webhooks/:id", account(idempotent(webhooks.remove))],
      ["POST", "/api/v1/webhooks/:id/rotate-secret", account(idempotent(webhooks.rotateSecret))],
      ["GET", "/api/v1/webhooks/:id/deliveries", account(webhooks.listDeliveries)],
      ["POST", "/api/v1/deliveries/:id/cancel", account(idempotent(deliveries.cancel))],
      ["POST", "/webhooks/incoming/:source", incoming.receive],
      ["POST", "/api/v1/incoming-events/:source/:eventId/retry", incoming.retry],
    ] as const
  ).map(([method, pattern, handler]) => ({ method, pattern, segments: split(pattern), handler }));

  const match = (method: string, path: string): RouteMatch | null => {
    const handler = staticRoutes.get(`${method} ${path}`);
    if (handler) return { route: path, params: {}, handler };

    const actual = split(path);
    for (const route of paramRoutes) {
      if (route.method !== method) continue;
      const params = matchSegments(route.segments, actual);
      if (params) return { route: route.pattern, params, handler: route.handler };
    }
    return null;
  };

  const notFoundResponse = (method: string, path: string, requestId: string): Response => {
    logger.debug("Route not found", { method, path });
    return errorResponse(notFound(`${method} ${path}`), requestId);
  };

  return { match, notFoundResponse };
};

export type Router = ReturnType<typeof createRouter>;
