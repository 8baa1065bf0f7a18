/**
 * Webhook registry port: durable configuration of outbound endpoints.
 */

import type { AppError } from "../errors/app-error.js";
import type {
  WebhookEndpoint,
  WebhookEventType,
} from "../entities/webhook-endpoint.entity.js";
import type { EndpointId, OwnerId } from "../types/brand.js";
import type { Result } from "../types/result.js";

export interface CreateEndpointData {
  readonly ownerId: OwnerId;
  readonly url: string;
  readonly secret: string;
  readonly events: readonly WebhookEventType[];
  readonly allEvents: boolean;
  readonly description: string | null;
  readonly maxConcurrency: number | null;
  readonly now: number;
}

export interface UpdateEndpointData {
  readonly url?: string | undefined;
  readonly events?: readonly WebhookEventType[] | undefined;
  readonly allEvents?: boolean | undefined;
  readonly enabled?: boolean | undefined;
  readonly description?: string | null | undefined;
  readonly maxConcurrency?: number | null | undefined;
}

export interface WebhookRegistry {
  create(data: CreateEndpointData): Promise<Result<WebhookEndpoint, AppError>>;

  get(id: EndpointId): Promise<Result<WebhookEndpoint | null, AppError>>;

  listByOwner(ownerId: OwnerId): Promise<Result<readonly WebhookEndpoint[], AppError>>;

  /** Enabled endpoints of an owner subscribed to `type` (explicitly or by wildcard) */
  findSubscribed(
    ownerId: OwnerId,
    type: WebhookEventType,
  ): Promise<Result<readonly WebhookEndpoint[], AppError>>;

  update(
    id: EndpointId,
    changes: UpdateEndpointData,
    now: number,
  ): Promise<Result<WebhookEndpoint, AppError>>;

  replaceSecret(id: EndpointId, secret: string, now: number): Promise<Result<void, AppError>>;

  remove(id: EndpointId): Promise<Result<void, AppError>>;
}
