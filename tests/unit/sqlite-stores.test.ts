import { beforeEach, describe, expect, it } from "vitest";
import { IncomingEventStatus } from "../../src/core/entities/incoming-event.entity.js";
import { DeliveryStatus, type WebhookDelivery } from "../../src/core/entities/webhook-delivery.entity.js";
import { WebhookEventType, type WebhookEndpoint } from "../../src/core/entities/webhook-endpoint.entity.js";
import type { NewDelivery } from "../../src/core/ports/delivery-store.js";
import { type OwnerId, brand } from "../../src/core/types/brand.js";
import type { Storage } from "../../src/infrastructure/database/storage.js";
import { T0, openTestStorage, unwrap } from "../support/fixtures.js";

const OWNER = brand<string, "OwnerId">("acct_1");

describe("SQLite stores", () => {
  let storage: Storage;

  const createEndpoint = async (
    overrides: { ownerId?: OwnerId; maxConcurrency?: number | null; allEvents?: boolean } = {},
  ): Promise<WebhookEndpoint> =>
    unwrap(
      await storage.registry.create({
        ownerId: overrides.ownerId ?? OWNER,
        url: "https://receiver.test/hook",
        secret: "test-secret",
        events: [WebhookEventType.ORDER_CREATED],
        allEvents: overrides.allEvents ?? false,
        description: null,
        maxConcurrency: overrides.maxConcurrency ?? null,
        now: T0,
      }),
    );

  const newDelivery = (endpoint: WebhookEndpoint, eventId: string): NewDelivery => ({
    endpointId: endpoint.id,
    eventId,
    eventType: WebhookEventType.ORDER_CREATED,
    payload: `{"id":"${eventId}"}`,
    queue: "default",
  });

  const enqueue = async (endpoint: WebhookEndpoint, eventId: string, at = T0) =>
    unwrap(await storage.deliveries.enqueue([newDelivery(endpoint, eventId)], at));

  const claim = async (at = T0, queue = "default"): Promise<WebhookDelivery | null> =>
    unwrap(await storage.deliveries.claimNext({ queue, workerId: "w1", now: at }));

  beforeEach(async () => {
    storage = await openTestStorage();
  });

  describe("deliveries", () => {
    it("enqueues pending rows due immediately and skips duplicates", async () => {
      const endpoint = await createEndpoint();
      const [first] = await enqueue(endpoint, "evt_1");
      expect(first).toMatchObject({
        status: DeliveryStatus.PENDING,
        attempts: 0,
        nextAttemptAt: T0,
        version: 0,
        payload: '{"id":"evt_1"}',
      });

      expect(await enqueue(endpoint, "evt_1", T0 + 5)).toEqual([]);
    });

    it("claims a due row once, bumping its version", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");

      const claimed = await claim();
      expect(claimed).toMatchObject({ status: DeliveryStatus.IN_FLIGHT, claimedBy: "w1", version: 1 });
      expect(await claim()).toBeNull();
    });

    it("does not claim rows that are not yet due or belong to another queue", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1", T0 + 1_000);

      expect(await claim(T0)).toBeNull();
      expect(await claim(T0 + 1_000, "bulk")).toBeNull();
      expect((await claim(T0 + 1_000))?.eventId).toBe("evt_1");
    });

    it("skips rows of disabled endpoints", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      unwrap(await storage.registry.update(endpoint.id, { enabled: false }, T0));

      expect(await claim()).toBeNull();
    });

    it("respects the per-endpoint concurrency cap", async () => {
      const capped = await createEndpoint({ maxConcurrency: 1 });
      await enqueue(capped, "evt_1");
      await enqueue(capped, "evt_2", T0 + 1);

      const first = await claim(T0 + 1);
      expect(first?.eventId).toBe("evt_1");
      expect(await claim(T0 + 1)).toBeNull();

      if (!first) throw new Error("expected a claim");
      unwrap(
        await storage.deliveries.finishAttempt(first.id, first.version, {
          status: DeliveryStatus.DELIVERED,
          attempts: 1,
          nextAttemptAt: null,
          responseStatus: 200,
          responseBody: "ok",
          error: null,
          now: T0 + 1,
        }),
      );
      expect((await claim(T0 + 1))?.eventId).toBe("evt_2");
    });

    it("discards an attempt written against a stale version", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      const claimed = await claim();
      if (!claimed) throw new Error("expected a claim");

      const record = {
        status: DeliveryStatus.PENDING_RETRY,
        attempts: 1,
        nextAttemptAt: T0 + 60_000,
        responseStatus: 500,
        responseBody: "boom",
        error: "HTTP 500",
        now: T0,
      } as const;

      expect(unwrap(await storage.deliveries.finishAttempt(claimed.id, claimed.version - 1, record))).toBeNull();

      const finished = unwrap(await storage.deliveries.finishAttempt(claimed.id, claimed.version, record));
      expect(finished).toMatchObject({
        status: DeliveryStatus.PENDING_RETRY,
        attempts: 1,
        nextAttemptAt: T0 + 60_000,
        lastResponseStatus: 500,
        lastError: "HTTP 500",
        claimedBy: null,
        version: 2,
      });

      expect(unwrap(await storage.deliveries.finishAttempt(claimed.id, claimed.version, record))).toBeNull();
    });

    it("cancels only rows that are not in flight or terminal", async () => {
      const endpoint = await createEndpoint();
      const [pending] = await enqueue(endpoint, "evt_1");
      if (!pending) throw new Error("expected a row");

      const cancelled = unwrap(await storage.deliveries.cancel(pending.id, T0 + 1));
      expect(cancelled).toMatchObject({ status: DeliveryStatus.CANCELLED, nextAttemptAt: null });
      expect(unwrap(await storage.deliveries.cancel(pending.id, T0 + 2))).toBeNull();

      await enqueue(endpoint, "evt_2");
      const inFlight = await claim();
      if (!inFlight) throw new Error("expected a claim");
      expect(unwrap(await storage.deliveries.cancel(inFlight.id, T0 + 3))).toBeNull();
    });

    it("cancels every outstanding row of an endpoint", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      await enqueue(endpoint, "evt_2");
      await enqueue(endpoint, "evt_3");
      await claim();

      expect(unwrap(await storage.deliveries.cancelForEndpoint(endpoint.id, T0))).toBe(2);
    });

    it("returns abandoned in-flight rows to pending_retry", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      const claimed = await claim(T0);
      if (!claimed) throw new Error("expected a claim");

      expect(unwrap(await storage.deliveries.reclaimStale(T0, T0 + 10))).toBe(0);
      expect(unwrap(await storage.deliveries.reclaimStale(T0 + 1, T0 + 10))).toBe(1);

      const row = unwrap(await storage.deliveries.get(claimed.id));
      expect(row).toMatchObject({ status: DeliveryStatus.PENDING_RETRY, attempts: 0, claimedBy: null });
    });

    it("cancels stale in-flight rows whose endpoint was deleted", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      const claimed = await claim(T0);
      if (!claimed) throw new Error("expected a claim");
      unwrap(await storage.registry.remove(endpoint.id));

      expect(unwrap(await storage.deliveries.reclaimStale(T0 + 1, T0 + 10))).toBe(1);
      expect(unwrap(await storage.deliveries.get(claimed.id))).toMatchObject({
        status: DeliveryStatus.CANCELLED,
        claimedBy: null,
        nextAttemptAt: null,
      });
    });

    it("cancels a claimed row only at the claimed version", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      const claimed = await claim();
      if (!claimed) throw new Error("expected a claim");

      expect(unwrap(await storage.deliveries.cancelClaim(claimed.id, claimed.version - 1, T0))).toBe(false);
      expect(unwrap(await storage.deliveries.cancelClaim(claimed.id, claimed.version, T0))).toBe(true);
      expect(unwrap(await storage.deliveries.get(claimed.id))?.status).toBe(DeliveryStatus.CANCELLED);
    });

    it("releases a claim without spending an attempt", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      const claimed = await claim();
      if (!claimed) throw new Error("expected a claim");

      expect(unwrap(await storage.deliveries.releaseClaim(claimed.id, claimed.version, T0))).toBe(true);
      expect(unwrap(await storage.deliveries.releaseClaim(claimed.id, claimed.version, T0))).toBe(false);
      expect((await claim())?.attempts).toBe(0);
    });

    it("pages an endpoint's deliveries newest first", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1", T0);
      await enqueue(endpoint, "evt_2", T0 + 1);
      await enqueue(endpoint, "evt_3", T0 + 2);

      const first = unwrap(await storage.deliveries.listByEndpoint(endpoint.id, { limit: 2 }));
      expect(first.items.map((d) => d.eventId)).toEqual(["evt_3", "evt_2"]);
      expect(first.nextCursor).not.toBeNull();

      const second = unwrap(
        await storage.deliveries.listByEndpoint(endpoint.id, {
          limit: 2,
          cursor: first.nextCursor ?? undefined,
        }),
      );
      expect(second.items.map((d) => d.eventId)).toEqual(["evt_1"]);
      expect(second.nextCursor).toBeNull();
    });

    it("filters by status and rejects a cursor it did not issue", async () => {
      const endpoint = await createEndpoint();
      const [row] = await enqueue(endpoint, "evt_1");
      await enqueue(endpoint, "evt_2", T0 + 1);
      if (!row) throw new Error("expected a row");
      await storage.deliveries.cancel(row.id, T0 + 2);

      const cancelled = unwrap(
        await storage.deliveries.listByEndpoint(endpoint.id, { limit: 10, status: DeliveryStatus.CANCELLED }),
      );
      expect(cancelled.items.map((d) => d.eventId)).toEqual(["evt_1"]);

      const bad = await storage.deliveries.listByEndpoint(endpoint.id, { limit: 10, cursor: "garbage" });
      expect(bad.ok).toBe(false);
      if (!bad.ok) expect(bad.error.code).toBe("bad_request");
    });

    it("counts rows by status", async () => {
      const endpoint = await createEndpoint();
      await enqueue(endpoint, "evt_1");
      await enqueue(endpoint, "evt_2");
      await claim();

      const counts = unwrap(await storage.deliveries.countByStatus());
      expect(counts).toEqual({
        pending: 1,
        in_flight: 1,
        delivered: 0,
        pending_retry: 0,
        failed_exhausted: 0,
        cancelled: 0,
      });
    });
  });

  describe("registry", () => {
    it("round-trips an endpoint", async () => {
      const created = await createEndpoint({ maxConcurrency: 4 });
      expect(unwrap(await storage.registry.get(created.id))).toEqual(created);
    });

    it("lists only the owner's endpoints", async () => {
      await createEndpoint();
      await createEndpoint({ ownerId: brand<string, "OwnerId">("acct_2") });

      const mine = unwrap(await storage.registry.listByOwner(OWNER));
      expect(mine.map((e) => e.ownerId)).toEqual([OWNER]);
    });

    it("matches subscriptions by event type, wildcard and enabled flag", async () => {
      const explicit = await createEndpoint();
      const wildcard = await createEndpoint({ allEvents: true });
      const disabled = await createEndpoint();
      unwrap(await storage.registry.update(disabled.id, { enabled: false }, T0));

      const orders = unwrap(await storage.registry.findSubscribed(OWNER, WebhookEventType.ORDER_CREATED));
      expect(orders.map((e) => e.id).sort()).toEqual([explicit.id, wildcard.id].sort());

      const invoices = unwrap(await storage.registry.findSubscribed(OWNER, WebhookEventType.INVOICE_PAID));
      expect(invoices.map((e) => e.id)).toEqual([wildcard.id]);
    });

    it("applies partial updates, and null clears nullable fields", async () => {
      const endpoint = await createEndpoint({ maxConcurrency: 2 });
      const updated = unwrap(
        await storage.registry.update(
          endpoint.id,
          { url: "https://receiver.test/v2", maxConcurrency: null },
          T0 + 1,
        ),
      );
      expect(updated).toMatchObject({
        url: "https://receiver.test/v2",
        maxConcurrency: null,
        events: [WebhookEventType.ORDER_CREATED],
        updatedAt: T0 + 1,
      });
    });

    it("replaces the secret and reports missing endpoints", async () => {
      const endpoint = await createEndpoint();
      unwrap(await storage.registry.replaceSecret(endpoint.id, "test-secret-2", T0 + 1));
      expect(unwrap(await storage.registry.get(endpoint.id))?.secret).toBe("test-secret-2");

      const missing = brand<string, "EndpointId">("missing");
      const rotated = await storage.registry.replaceSecret(missing, "x", T0);
      expect(!rotated.ok && rotated.error.code).toBe("not_found");
      const removed = await storage.registry.remove(missing);
      expect(!removed.ok && removed.error.code).toBe("not_found");
    });
  });

  describe("incoming events", () => {
    const event = { source: "stripe", eventId: "evt_1", eventType: "charge.succeeded", payload: "{}", now: T0 };

    it("inserts once and returns the existing row afterwards", async () => {
      const first = unwrap(await storage.incoming.insertIfAbsent(event));
      expect(first.inserted).toBe(true);
      expect(first.event.status).toBe(IncomingEventStatus.RECEIVED);

      const second = unwrap(await storage.incoming.insertIfAbsent({ ...event, now: T0 + 1 }));
      expect(second.inserted).toBe(false);
      expect(second.event.id).toBe(first.event.id);
    });

    it("transitions only from the expected status", async () => {
      await storage.incoming.insertIfAbsent(event);

      const wrong = unwrap(
        await storage.incoming.transition("stripe", "evt_1", "processing", "processed", T0 + 1),
      );
      expect(wrong).toBeNull();

      unwrap(await storage.incoming.transition("stripe", "evt_1", "received", "processing", T0 + 1));
      const failed = unwrap(
        await storage.incoming.transition("stripe", "evt_1", "processing", "error", T0 + 2, "boom"),
      );
      expect(failed).toMatchObject({ status: "error", errorMessage: "boom", processedAt: null });

      unwrap(await storage.incoming.transition("stripe", "evt_1", "error", "processing", T0 + 3));
      const done = unwrap(
        await storage.incoming.transition("stripe", "evt_1", "processing", "processed", T0 + 4),
      );
      expect(done).toMatchObject({ status: "processed", errorMessage: null, processedAt: T0 + 4 });
    });

    it("lists newest first with source and status filters", async () => {
      await storage.incoming.insertIfAbsent(event);
      await storage.incoming.insertIfAbsent({ ...event, eventId: "evt_2", now: T0 + 1 });
      await storage.incoming.insertIfAbsent({ ...event, source: "github", eventId: "evt_3", now: T0 + 2 });
      await storage.incoming.transition("stripe", "evt_1", "received", "processing", T0 + 3);

      const all = unwrap(await storage.incoming.list({ limit: 10 }));
      expect(all.items.map((e) => e.eventId)).toEqual(["evt_3", "evt_2", "evt_1"]);

      const stripe = unwrap(await storage.incoming.list({ limit: 10, source: "stripe" }));
      expect(stripe.items.map((e) => e.eventId)).toEqual(["evt_2", "evt_1"]);

      const processing = unwrap(await storage.incoming.list({ limit: 10, status: "processing" }));
      expect(processing.items.map((e) => e.eventId)).toEqual(["evt_1"]);
    });
  });
});
