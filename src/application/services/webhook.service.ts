import type { WebhookDelivery } from "../../core/entities/webhook-delivery.entity.js";
import { isTerminal } from "../../core/entities/webhook-delivery.entity.js";
import {
  type WebhookEndpoint,
  type WebhookEndpointView,
  toEndpointView,
} from "../../core/entities/webhook-endpoint.entity.js";
import { type AppError, badRequest, conflict, notFound } from "../../core/errors/app-error.js";
import type { DeliveryStore } from "../../core/ports/delivery-store.js";
import type { Logger } from "../../core/ports/logger.js";
import type { WebhookRegistry } from "../../core/ports/webhook-registry.js";
import type { DeliveryId, EndpointId, OwnerId } from "../../core/types/brand.js";
import type { PaginatedResult } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId, generateToken } from "../../shared/utils/id.js";
import type {
  CreateEndpointDto,
  ListDeliveriesQuery,
  PublishEventDto,
  UpdateEndpointDto,
} from "../dtos/webhook.dto.js";

export const SECRET_PREFIX = "whsec_";

export interface EndpointWithSecret {
  readonly endpoint: WebhookEndpointView;
  /** Shown once, on creation and on rotation */
  readonly secret: string;
}

export interface PublishedEvent {
  readonly id: string;
  readonly type: string;
  readonly createdAt: string;
  /** Deliveries newly queued by this call; 0 on a repeated event id */
  readonly deliveries: number;
}

/**
 * Webhook service: endpoint lifecycle and event fan-out.
 * Every operation is scoped to the calling owner; another owner's endpoint
 * is reported as not found.
 */
export interface WebhookService {
  createEndpoint(ownerId: OwnerId, input: CreateEndpointDto): Promise<Result<EndpointWithSecret, AppError>>;
  listEndpoints(ownerId: OwnerId): Promise<Result<readonly WebhookEndpointView[], AppError>>;
  getEndpoint(ownerId: OwnerId, id: EndpointId): Promise<Result<WebhookEndpointView, AppError>>;
  updateEndpoint(
    ownerId: OwnerId,
    id: EndpointId,
    changes: UpdateEndpointDto,
  ): Promise<Result<WebhookEndpointView, AppError>>;
  /** Cancels outstanding deliveries, then removes the endpoint */
  deleteEndpoint(ownerId: OwnerId, id: EndpointId): Promise<Result<void, AppError>>;
  rotateSecret(ownerId: OwnerId, id: EndpointId): Promise<Result<EndpointWithSecret, AppError>>;
  publish(ownerId: OwnerId, event: PublishEventDto): Promise<Result<PublishedEvent, AppError>>;
  listDeliveries(
    ownerId: OwnerId,
    endpointId: EndpointId,
    query: ListDeliveriesQuery,
  ): Promise<Result<PaginatedResult<WebhookDelivery>, AppError>>;
  cancelDelivery(ownerId: OwnerId, id: DeliveryId): Promise<Result<WebhookDelivery, AppError>>;
}

interface Deps {
  readonly registry: WebhookRegistry;
  readonly deliveries: DeliveryStore;
  readonly logger: Logger;
  /** Configured queue names; the first is the default */
  readonly queues: readonly string[];
  readonly now?: (() => number) | undefined;
}

export const createWebhookService = (deps: Deps): WebhookService => {
  const { registry, deliveries } = deps;
  const now = deps.now ?? Date.now;
  const logger = deps.logger.child({ service: "webhooks" });
  const defaultQueue = deps.queues[0] ?? "default";

  const ownedEndpoint = async (
    ownerId: OwnerId,
    id: EndpointId,
  ): Promise<Result<WebhookEndpoint, AppError>> => {
    const found = await registry.get(id);
    if (!found.ok) return found;
    if (!found.value || found.value.ownerId !== ownerId) return err(notFound("Webhook endpoint"));
    return ok(found.value);
  };

  return {
    async createEndpoint(ownerId, input) {
      const secret = generateToken(SECRET_PREFIX);
      const created = await registry.create({
        ownerId,
        url: input.url,
        secret,
        events: input.allEvents ? [] : input.events,
        allEvents: input.allEvents,
        description: input.description,
        maxConcurrency: input.maxConcurrency,
        now: now(),
      });
      if (!created.ok) return created;

      logger.info("Webhook endpoint created", { ownerId, endpointId: created.value.id });
      return ok({ endpoint: toEndpointView(created.value), secret });
    },

    async listEndpoints(ownerId) {
      const listed = await registry.listByOwner(ownerId);
      if (!listed.ok) return listed;
      return ok(listed.value.map(toEndpointView));
    },

    async getEndpoint(ownerId, id) {
      const found = await ownedEndpoint(ownerId, id);
      if (!found.ok) return found;
      return ok(toEndpointView(found.value));
    },

    async updateEndpoint(ownerId, id, changes) {
      const found = await ownedEndpoint(ownerId, id);
      if (!found.ok) return found;

      const updated = await registry.update(id, changes, now());
      if (!updated.ok) return updated;

      if (changes.enabled !== undefined && changes.enabled !== found.value.enabled) {
        logger.info(changes.enabled ? "Webhook endpoint enabled" : "Webhook endpoint disabled", {
          endpointId: id,
        });
      }
      return ok(toEndpointView(updated.value));
    },

    async deleteEndpoint(ownerId, id) {
      const found = await ownedEndpoint(ownerId, id);
      if (!found.ok) return found;

      const cancelled = await deliveries.cancelForEndpoint(id, now());
      if (!cancelled.ok) return cancelled;

      const removed = await registry.remove(id);
      if (!removed.ok) return removed;

      logger.info("Webhook endpoint deleted", { endpointId: id, cancelledDeliveries: cancelled.value });
      return ok(undefined);
    },

    async rotateSecret(ownerId, id) {
      const found = await ownedEndpoint(ownerId, id);
      if (!found.ok) return found;

      const secret = generateToken(SECRET_PREFIX);
      const at = now();
      const replaced = await registry.replaceSecret(id, secret, at);
      if (!replaced.ok) return replaced;

      logger.info("Webhook secret rotated", { endpointId: id });
      return ok({ endpoint: toEndpointView({ ...found.value, secret, updatedAt: at }), secret });
    },

    async publish(ownerId, event) {
      const queue = event.queue ?? defaultQueue;
      if (!deps.queues.includes(queue)) {
        return err(badRequest(`Unknown delivery queue "${queue}"`, { queues: deps.queues }));
      }

      const at = now();
      const id = event.id ?? `evt_${generateId().replace(/-/g, "")}`;
      const createdAt = new Date(at).toISOString();
      const payload = JSON.stringify({ id, type: event.type, created_at: createdAt, data: event.data });

      const matched = await registry.findSubscribed(ownerId, event.type);
      if (!matched.ok) return matched;

      const queued = await deliveries.enqueue(
        matched.value.map((endpoint) => ({
          endpointId: endpoint.id,
          eventId: id,
          eventType: event.type,
          payload,
          queue,
        })),
        at,
      );
      if (!queued.ok) return queued;

      logger.info("Event published", {
        eventId: id,
        type: event.type,
        matched: matched.value.length,
        queued: queued.value.length,
      });
      return ok({ id, type: event.type, createdAt, deliveries: queued.value.length });
    },

    async listDeliveries(ownerId, endpointId, query) {
      const found = await ownedEndpoint(ownerId, endpointId);
      if (!found.ok) return found;
      return deliveries.listByEndpoint(endpointId, query);
    },

    async cancelDelivery(ownerId, id) {
      const found = await deliveries.get(id);
      if (!found.ok) return found;
      const delivery = found.value;
      if (!delivery) return err(notFound("Delivery"));

      const endpoint = await registry.get(delivery.endpointId);
      if (!endpoint.ok) return endpoint;
      // A deleted endpoint has no owner left to match.
      if (!endpoint.value || endpoint.value.ownerId !== ownerId) return err(notFound("Delivery"));

      const cancelled = await deliveries.cancel(id, now());
      if (!cancelled.ok) return cancelled;
      if (!cancelled.value) {
        return err(
          conflict(
            isTerminal(delivery.status)
              ? `Delivery is already ${delivery.status}`
              : "Delivery is being attempted; cancel it after the attempt completes",
          ),
        );
      }

      logger.info("Delivery cancelled", { deliveryId: id, endpointId: delivery.endpointId });
      return ok(cancelled.value);
    },
  };
};
