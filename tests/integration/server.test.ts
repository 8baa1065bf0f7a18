import { beforeEach, describe, expect, it } from "vitest";
import { createHealthService } from "../../src/application/services/health.service.js";
import {
  type IdempotencyGate,
  createIdempotencyGate,
  hashRequest,
} from "../../src/application/services/idempotency.service.js";
import {
  type IncomingWebhookService,
  createIncomingWebhookService,
} from "../../src/application/services/incoming-webhook.service.js";
import { createWebhookService } from "../../src/application/services/webhook.service.js";
import { type AppConfig, parseConfig } from "../../src/infrastructure/config/config.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";
import { createMetricsCollector } from "../../src/infrastructure/metrics/prometheus.js";
import { createSignatureVerifier, signPayload } from "../../src/infrastructure/security/signature.js";
import { createRouter } from "../../src/presentation/routes/router.js";
import { type AppServer, createServer } from "../../src/presentation/server.js";
import { createRecordingAlertSink, openTestStorage } from "../support/fixtures.js";

const testConfig = (): AppConfig => {
  const parsed = parseConfig({
    NODE_ENV: "test",
    LOG_LEVEL: "fatal",
    DATABASE_PATH: ":memory:",
    DELIVERY_QUEUES: "default:1,bulk:1",
    INCOMING_SOURCES: "payments:timestamped:X-Webhook-Signature:test-secret",
  });
  if (!parsed.success) throw new Error(parsed.error.message);
  return parsed.data;
};

interface Harness {
  readonly server: AppServer;
  readonly gate: IdempotencyGate;
  readonly incoming: IncomingWebhookService;
}

const buildHarness = async (): Promise<Harness> => {
  const config = testConfig();
  const logger = createSilentLogger();
  const metrics = createMetricsCollector();
  const storage = await openTestStorage();

  const gate = createIdempotencyGate({
    store: storage.idempotency,
    logger,
    ttlMs: config.idempotency.ttlMs,
    staleLockMs: config.idempotency.staleLockMs,
  });
  const webhookService = createWebhookService({
    registry: storage.registry,
    deliveries: storage.deliveries,
    logger,
    queues: Object.keys(config.delivery.queues),
  });
  const incoming = createIncomingWebhookService({
    store: storage.incoming,
    sources: config.incoming.sources,
    verifier: createSignatureVerifier({ toleranceSeconds: config.signature.toleranceSeconds }),
    alertSink: createRecordingAlertSink(),
    metrics,
    logger,
  });
  const healthService = createHealthService({
    logger,
    version: "test",
    probes: [
      {
        name: "database",
        critical: true,
        async check() {
          await storage.ping();
          return { status: "ok", details: storage.kind };
        },
      },
    ],
  });
  const router = createRouter({ webhookService, incomingService: incoming, healthService, gate, metrics, logger });
  return { server: createServer({ config, logger, router, metrics }), gate, incoming };
};

interface RequestOptions {
  readonly body?: unknown;
  readonly headers?: Record<string, string>;
}

interface ErrorBody {
  readonly error: { code: string; message: string; details?: Record<string, unknown> };
  readonly requestId: string;
}

interface EndpointBody {
  readonly id: string;
  readonly enabled: boolean;
}

interface Page<T> {
  readonly items: T[];
  readonly nextCursor: string | null;
}

interface DeliveryBody {
  readonly id: string;
  readonly eventId: string;
  readonly status: string;
  readonly attempts: number;
}

const dataOf = async <T>(res: Response): Promise<T> => ((await res.json()) as { data: T }).data;
const errorOf = async (res: Response): Promise<ErrorBody["error"]> => ((await res.json()) as ErrorBody).error;

describe("HTTP server", () => {
  let h: Harness;

  const call = (method: string, path: string, options: RequestOptions = {}): Promise<Response> => {
    const body =
      options.body === undefined
        ? undefined
        : typeof options.body === "string"
          ? options.body
          : JSON.stringify(options.body);
    const init: RequestInit = { method, headers: { "x-account-id": "acct_1", ...options.headers } };
    if (body !== undefined) init.body = body;
    return h.server.handle(new Request(`http://localhost${path}`, init));
  };

  const endpointInput = {
    url: "https://receiver.test/hook",
    events: ["order.created"],
  };

  const createEndpoint = async (headers: Record<string, string> = {}): Promise<string> => {
    const res = await call("POST", "/api/v1/webhooks", { body: endpointInput, headers });
    expect(res.status).toBe(201);
    return (await dataOf<{ endpoint: EndpointBody }>(res)).endpoint.id;
  };

  beforeEach(async () => {
    h = await buildHarness();
  });

  describe("health and metrics", () => {
    it("GET /health answers ok with a request id", async () => {
      const res = await call("GET", "/health");
      expect(res.status).toBe(200);
      expect((await dataOf<{ status: string }>(res)).status).toBe("ok");
      expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("echoes a well-formed incoming request id and replaces a malformed one", async () => {
      const echoed = await call("GET", "/health", { headers: { "x-request-id": "trace-123" } });
      expect(echoed.headers.get("x-request-id")).toBe("trace-123");

      const replaced = await call("GET", "/health", { headers: { "x-request-id": "bad id!" } });
      expect(replaced.headers.get("x-request-id")).not.toBe("bad id!");
    });

    it("GET /readiness runs the database probe", async () => {
      const res = await call("GET", "/readiness");
      expect(res.status).toBe(200);
      const health = await dataOf<{ status: string; checks: Record<string, unknown> }>(res);
      expect(health.status).toBe("ok");
      expect(health.checks["database"]).toMatchObject({ status: "ok", details: "sqlite" });
    });

    it("GET /metrics counts requests by route", async () => {
      await call("GET", "/health");
      await call("GET", "/nope");

      const res = await call("GET", "/metrics");
      expect(res.headers.get("content-type")).toBe("text/plain; version=0.0.4; charset=utf-8");
      const text = await res.text();
      expect(text).toContain('http_requests_total{method="GET",route="/health",status="200"} 1');
      expect(text).toContain('http_requests_total{method="GET",route="unmatched",status="404"} 1');
    });
  });

  it("unknown routes return 404 in the error envelope", async () => {
    const res = await call("GET", "/nope", { headers: { "x-request-id": "req-404" } });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "not_found", message: "GET /nope not found" },
      requestId: "req-404",
    });
  });

  describe("endpoint management", () => {
    it("creates an endpoint, returning the secret once and a Location", async () => {
      const res = await call("POST", "/api/v1/webhooks", { body: endpointInput });
      expect(res.status).toBe(201);
      const created = await dataOf<{ endpoint: EndpointBody; secret: string }>(res);
      expect(created.secret).toMatch(/^whsec_[0-9a-f]{64}$/);
      expect(created.endpoint).not.toHaveProperty("secret");
      expect(res.headers.get("location")).toBe(`/api/v1/webhooks/${created.endpoint.id}`);

      const fetched = await call("GET", `/api/v1/webhooks/${created.endpoint.id}`);
      expect(fetched.status).toBe(200);
      expect(await dataOf<EndpointBody>(fetched)).not.toHaveProperty("secret");
    });

    it("rejects invalid input with field errors", async () => {
      const res = await call("POST", "/api/v1/webhooks", {
        body: { url: "http://receiver.test/hook", events: ["order.created"] },
      });
      expect(res.status).toBe(422);
      const error = await errorOf(res);
      expect(error.code).toBe("validation");
      expect(error.details?.["fieldErrors"]).toMatchObject({ url: ["Endpoint URL must use https"] });
    });

    it("rejects a body that is not JSON", async () => {
      const res = await call("POST", "/api/v1/webhooks", { body: "{nope" });
      expect(res.status).toBe(400);
      expect((await errorOf(res)).message).toBe("Request body must be valid JSON");
    });

    it("rejects a malformed account header", async () => {
      const res = await call("GET", "/api/v1/webhooks", { headers: { "x-account-id": "a b" } });
      expect(res.status).toBe(400);
    });

    it("scopes endpoints to the calling account", async () => {
      const id = await createEndpoint();

      const other = await call("GET", `/api/v1/webhooks/${id}`, { headers: { "x-account-id": "acct_2" } });
      expect(other.status).toBe(404);

      const mine = await call("GET", "/api/v1/webhooks");
      expect((await dataOf<{ endpoints: EndpointBody[] }>(mine)).endpoints).toHaveLength(1);
    });

    it("updates, rotates and deletes", async () => {
      const id = await createEndpoint();

      const updated = await call("PATCH", `/api/v1/webhooks/${id}`, { body: { enabled: false } });
      expect((await dataOf<EndpointBody>(updated)).enabled).toBe(false);

      const rotated = await call("POST", `/api/v1/webhooks/${id}/rotate-secret`);
      expect((await dataOf<{ secret: string }>(rotated)).secret).toMatch(/^whsec_/);

      const removed = await call("DELETE", `/api/v1/webhooks/${id}`);
      expect(removed.status).toBe(204);
      expect((await call("GET", `/api/v1/webhooks/${id}`)).status).toBe(404);
    });
  });

  describe("idempotency keys", () => {
    it("replays the first response for a retried request", async () => {
      const headers = { "idempotency-key": "create-1" };
      const first = await call("POST", "/api/v1/webhooks", { body: endpointInput, headers });
      const firstBody = await first.text();

      const retry = await call("POST", "/api/v1/webhooks", { body: endpointInput, headers });
      expect(retry.status).toBe(201);
      expect(retry.headers.get("idempotent-replayed")).toBe("true");
      expect(retry.headers.get("location")).toBe(first.headers.get("location"));
      expect(await retry.text()).toBe(firstBody);

      const list = await call("GET", "/api/v1/webhooks");
      expect((await dataOf<{ endpoints: EndpointBody[] }>(list)).endpoints).toHaveLength(1);
    });

    it("rejects the same key with a different body", async () => {
      const headers = { "idempotency-key": "create-1" };
      await call("POST", "/api/v1/webhooks", { body: endpointInput, headers });

      const reused = await call("POST", "/api/v1/webhooks", {
        body: { ...endpointInput, url: "https://receiver.test/other" },
        headers,
      });
      expect(reused.status).toBe(422);
      expect((await errorOf(reused)).code).toBe("idempotency_key_reused");
    });

    it("reports a key whose first request is still running", async () => {
      const body = JSON.stringify(endpointInput);
      const held = await h.gate.acquire(
        "create-1",
        "acct_1:/api/v1/webhooks",
        hashRequest("POST", "/api/v1/webhooks", body),
      );
      expect(held.ok && held.value.kind).toBe("proceed");

      const res = await call("POST", "/api/v1/webhooks", { body, headers: { "idempotency-key": "create-1" } });
      expect(res.status).toBe(409);
      expect((await errorOf(res)).code).toBe("idempotency_key_in_use");
    });

    it("keys are scoped per account", async () => {
      const key = { "idempotency-key": "create-1" };
      await call("POST", "/api/v1/webhooks", { body: endpointInput, headers: key });
      const other = await call("POST", "/api/v1/webhooks", {
        body: endpointInput,
        headers: { ...key, "x-account-id": "acct_2" },
      });
      expect(other.status).toBe(201);
      expect(other.headers.get("idempotent-replayed")).toBeNull();
    });

    it("rejects a malformed key", async () => {
      const res = await call("POST", "/api/v1/webhooks", {
        body: endpointInput,
        headers: { "idempotency-key": "has space" },
      });
      expect(res.status).toBe(400);
      expect((await errorOf(res)).code).toBe("invalid_idempotency_key");
    });

    it("caches client errors too", async () => {
      const headers = { "idempotency-key": "bad-create" };
      const bad = { url: "not a url", events: ["order.created"] };
      expect((await call("POST", "/api/v1/webhooks", { body: bad, headers })).status).toBe(422);

      const retry = await call("POST", "/api/v1/webhooks", { body: bad, headers });
      expect(retry.status).toBe(422);
      expect(retry.headers.get("idempotent-replayed")).toBe("true");
    });

    it("replays a 204 without a body", async () => {
      const id = await createEndpoint();
      const headers = { "idempotency-key": "delete-1" };
      expect((await call("DELETE", `/api/v1/webhooks/${id}`, { headers })).status).toBe(204);

      const retry = await call("DELETE", `/api/v1/webhooks/${id}`, { headers });
      expect(retry.status).toBe(204);
      expect(retry.headers.get("idempotent-replayed")).toBe("true");
      expect(await retry.text()).toBe("");
    });
  });

  describe("publishing and deliveries", () => {
    it("queues one delivery per subscribed endpoint and lists it", async () => {
      const id = await createEndpoint();

      const published = await call("POST", "/api/v1/events", {
        body: { id: "evt_1", type: "order.created", data: { orderId: "O1" } },
      });
      expect(published.status).toBe(201);
      expect(await dataOf<unknown>(published)).toMatchObject({ id: "evt_1", type: "order.created", deliveries: 1 });

      const log = await call("GET", `/api/v1/webhooks/${id}/deliveries`);
      const page = await dataOf<Page<DeliveryBody>>(log);
      expect(page.nextCursor).toBeNull();
      expect(page.items).toHaveLength(1);
      expect(page.items[0]).toMatchObject({ eventId: "evt_1", status: "pending", attempts: 0 });
    });

    it("rejects unknown event types and queues", async () => {
      const badType = await call("POST", "/api/v1/events", { body: { type: "order.exploded" } });
      expect(badType.status).toBe(422);

      const badQueue = await call("POST", "/api/v1/events", { body: { type: "order.created", queue: "nope" } });
      expect(badQueue.status).toBe(400);
    });

    it("cancels a pending delivery once", async () => {
      const id = await createEndpoint();
      await call("POST", "/api/v1/events", { body: { id: "evt_1", type: "order.created" } });
      const page = await dataOf<Page<DeliveryBody>>(await call("GET", `/api/v1/webhooks/${id}/deliveries`));
      const deliveryId = page.items[0]?.id ?? "";

      const cancelled = await call("POST", `/api/v1/deliveries/${deliveryId}/cancel`);
      expect(cancelled.status).toBe(200);
      expect((await dataOf<DeliveryBody>(cancelled)).status).toBe("cancelled");

      const again = await call("POST", `/api/v1/deliveries/${deliveryId}/cancel`);
      expect(again.status).toBe(409);
    });
  });

  describe("inbound webhooks", () => {
    const body = '{"id":"evt_in_1","type":"charge.succeeded"}';
    const signed = () => ({
      "content-type": "application/json",
      "x-webhook-signature": signPayload(body, "test-secret", Math.floor(Date.now() / 1000)),
    });

    it("acknowledges, deduplicates and processes", async () => {
      const first = await call("POST", "/webhooks/incoming/payments", { body, headers: signed() });
      expect(first.status).toBe(200);
      expect(await dataOf<unknown>(first)).toEqual({ received: true, eventId: "evt_in_1", duplicate: false });

      const second = await call("POST", "/webhooks/incoming/payments", { body, headers: signed() });
      expect((await dataOf<{ duplicate: boolean }>(second)).duplicate).toBe(true);

      await h.incoming.drain();
      const list = await call("GET", "/api/v1/incoming-events?source=payments");
      const page = await dataOf<Page<{ eventId: string; status: string }>>(list);
      expect(page.items).toHaveLength(1);
      expect(page.items[0]).toMatchObject({ eventId: "evt_in_1", status: "processed" });
    });

    it("rejects a bad signature", async () => {
      const res = await call("POST", "/webhooks/incoming/payments", {
        body,
        headers: { "x-webhook-signature": "t=1767225600,v1=00" },
      });
      expect(res.status).toBe(400);
      expect(await errorOf(res)).toMatchObject({ code: "signature_invalid", details: { reason: "mismatch" } });
    });

    it("returns 404 for an unknown source", async () => {
      const res = await call("POST", "/webhooks/incoming/unknown", { body, headers: signed() });
      expect(res.status).toBe(404);
    });

    it("refuses to retry an event that did not fail", async () => {
      await call("POST", "/webhooks/incoming/payments", { body, headers: signed() });
      await h.incoming.drain();

      const res = await call("POST", "/api/v1/incoming-events/payments/evt_in_1/retry");
      expect(res.status).toBe(409);
    });

    it("rejects an invalid status filter", async () => {
      const res = await call("GET", "/api/v1/incoming-events?status=lost");
      expect(res.status).toBe(422);
    });
  });
});
