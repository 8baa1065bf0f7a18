import { beforeEach, describe, expect, it } from "vitest";
import {
  SECRET_PREFIX,
  type WebhookService,
  createWebhookService,
} from "../../src/application/services/webhook.service.js";
import { DeliveryStatus } from "../../src/core/entities/webhook-delivery.entity.js";
import { WebhookEventType, type WebhookEndpointView } from "../../src/core/entities/webhook-endpoint.entity.js";
import { brand } from "../../src/core/types/brand.js";
import type { Storage } from "../../src/infrastructure/database/storage.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";
import { T0, createClock, openTestStorage, unwrap } from "../support/fixtures.js";

const ALICE = brand<string, "OwnerId">("acct_alice");
const BOB = brand<string, "OwnerId">("acct_bob");

describe("WebhookService", () => {
  let storage: Storage;
  let service: WebhookService;

  const create = async (
    owner = ALICE,
    events: WebhookEventType[] = [WebhookEventType.ORDER_CREATED],
  ): Promise<WebhookEndpointView> =>
    unwrap(
      await service.createEndpoint(owner, {
        url: "https://receiver.test/hook",
        events,
        allEvents: false,
        description: null,
        maxConcurrency: null,
      }),
    ).endpoint;

  beforeEach(async () => {
    storage = await openTestStorage();
    service = createWebhookService({
      registry: storage.registry,
      deliveries: storage.deliveries,
      logger: createSilentLogger(),
      queues: ["default", "bulk"],
      now: createClock().now,
    });
  });

  it("returns the secret once and never in the endpoint view", async () => {
    const created = unwrap(
      await service.createEndpoint(ALICE, {
        url: "https://receiver.test/hook",
        events: [],
        allEvents: true,
        description: "orders",
        maxConcurrency: 2,
      }),
    );

    expect(created.secret.startsWith(SECRET_PREFIX)).toBe(true);
    expect(created.endpoint).not.toHaveProperty("secret");
    expect(created.endpoint).toMatchObject({ ownerId: ALICE, allEvents: true, enabled: true, createdAt: T0 });

    const stored = unwrap(await storage.registry.get(created.endpoint.id));
    expect(stored?.secret).toBe(created.secret);
  });

  it("hides other owners' endpoints", async () => {
    const endpoint = await create(ALICE);

    const asBob = await service.getEndpoint(BOB, endpoint.id);
    expect(!asBob.ok && asBob.error.message).toBe("Webhook endpoint not found");
    expect(unwrap(await service.listEndpoints(BOB))).toEqual([]);
    expect(unwrap(await service.listEndpoints(ALICE)).map((e) => e.id)).toEqual([endpoint.id]);
  });

  it("fans an event out to every subscribed endpoint", async () => {
    const orders = await create(ALICE, [WebhookEventType.ORDER_CREATED]);
    await create(ALICE, [WebhookEventType.INVOICE_PAID]);
    await create(BOB, [WebhookEventType.ORDER_CREATED]);

    const published = unwrap(
      await service.publish(ALICE, { id: "evt_1", type: WebhookEventType.ORDER_CREATED, data: { total: 42 } }),
    );
    expect(published).toEqual({
      id: "evt_1",
      type: "order.created",
      createdAt: "2026-01-01T00:00:00.000Z",
      deliveries: 1,
    });

    const page = unwrap(await storage.deliveries.listByEndpoint(orders.id, { limit: 10 }));
    expect(page.items).toHaveLength(1);
    expect(page.items[0]?.payload).toBe(
      '{"id":"evt_1","type":"order.created","created_at":"2026-01-01T00:00:00.000Z","data":{"total":42}}',
    );
    expect(page.items[0]?.queue).toBe("default");
  });

  it("queues nothing new when the same event id is published again", async () => {
    await create();
    const event = { id: "evt_1", type: WebhookEventType.ORDER_CREATED, data: {} };

    expect(unwrap(await service.publish(ALICE, event)).deliveries).toBe(1);
    expect(unwrap(await service.publish(ALICE, event)).deliveries).toBe(0);
  });

  it("generates an event id when none is given", async () => {
    const published = unwrap(await service.publish(ALICE, { type: WebhookEventType.ORDER_CREATED, data: {} }));
    expect(published.id).toMatch(/^evt_[0-9a-f]{32}$/);
    expect(published.deliveries).toBe(0);
  });

  it("routes to a named queue and rejects unknown ones", async () => {
    const endpoint = await create();
    unwrap(await service.publish(ALICE, { id: "evt_1", type: WebhookEventType.ORDER_CREATED, data: {}, queue: "bulk" }));
    const [row] = unwrap(await storage.deliveries.listByEndpoint(endpoint.id, { limit: 1 })).items;
    expect(row?.queue).toBe("bulk");

    const unknown = await service.publish(ALICE, {
      type: WebhookEventType.ORDER_CREATED,
      data: {},
      queue: "priority",
    });
    expect(!unknown.ok && unknown.error.message).toBe('Unknown delivery queue "priority"');
  });

  it("rotates the secret", async () => {
    const endpoint = await create();
    const before = unwrap(await storage.registry.get(endpoint.id))?.secret;

    const rotated = unwrap(await service.rotateSecret(ALICE, endpoint.id));
    expect(rotated.secret).not.toBe(before);
    expect(unwrap(await storage.registry.get(endpoint.id))?.secret).toBe(rotated.secret);
  });

  it("deleting an endpoint cancels its outstanding deliveries", async () => {
    const endpoint = await create();
    await service.publish(ALICE, { id: "evt_1", type: WebhookEventType.ORDER_CREATED, data: {} });

    unwrap(await service.deleteEndpoint(ALICE, endpoint.id));

    expect(unwrap(await storage.registry.get(endpoint.id))).toBeNull();
    const counts = unwrap(await storage.deliveries.countByStatus());
    expect(counts.cancelled).toBe(1);
  });

  it("cancels a pending delivery once, and only for its owner", async () => {
    const endpoint = await create();
    await service.publish(ALICE, { id: "evt_1", type: WebhookEventType.ORDER_CREATED, data: {} });
    const [row] = unwrap(await service.listDeliveries(ALICE, endpoint.id, { limit: 20 })).items;
    if (!row) throw new Error("expected a delivery");

    const asBob = await service.cancelDelivery(BOB, row.id);
    expect(!asBob.ok && asBob.error.code).toBe("not_found");

    expect(unwrap(await service.cancelDelivery(ALICE, row.id)).status).toBe(DeliveryStatus.CANCELLED);

    const again = await service.cancelDelivery(ALICE, row.id);
    expect(!again.ok && again.error.message).toBe("Delivery is already cancelled");
  });

  it("refuses to cancel a delivery that is being attempted", async () => {
    const endpoint = await create();
    await service.publish(ALICE, { id: "evt_1", type: WebhookEventType.ORDER_CREATED, data: {} });
    const claimed = unwrap(await storage.deliveries.claimNext({ queue: "default", workerId: "w1", now: T0 }));
    if (!claimed) throw new Error("expected a claim");

    const result = await service.cancelDelivery(ALICE, claimed.id);
    expect(!result.ok && result.error.code).toBe("conflict");
    expect(claimed.endpointId).toBe(endpoint.id);
  });
});
