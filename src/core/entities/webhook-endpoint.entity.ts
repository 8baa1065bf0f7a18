import type { EndpointId, OwnerId } from "../types/brand.js";

/**
 * Business event types an endpoint can subscribe to. Producers publish only
 * these; anything else is rejected at the edge.
 */
export const WebhookEventType = {
  ORDER_CREATED: "order.created",
  ORDER_UPDATED: "order.updated",
  ORDER_CANCELLED: "order.cancelled",
  INVOICE_CREATED: "invoice.created",
  INVOICE_PAID: "invoice.paid",
  INVOICE_PAYMENT_FAILED: "invoice.payment_failed",
  SUBSCRIPTION_CREATED: "subscription.created",
  SUBSCRIPTION_UPDATED: "subscription.updated",
  SUBSCRIPTION_CANCELLED: "subscription.cancelled",
  CUSTOMER_CREATED: "customer.created",
  CUSTOMER_DELETED: "customer.deleted",
} as const;

export type WebhookEventType = (typeof WebhookEventType)[keyof typeof WebhookEventType];

export const WEBHOOK_EVENT_TYPES: readonly WebhookEventType[] = Object.freeze(
  Object.values(WebhookEventType),
);

export const isWebhookEventType = (value: string): value is WebhookEventType =>
  (WEBHOOK_EVENT_TYPES as readonly string[]).includes(value);

/**
 * Outbound webhook endpoint owned by a tenant.
 * `allEvents` is the wildcard flag; when set, `events` is ignored.
 */
export interface WebhookEndpoint {
  readonly id: EndpointId;
  readonly ownerId: OwnerId;
  readonly url: string;
  readonly secret: string;
  readonly events: readonly WebhookEventType[];
  readonly allEvents: boolean;
  readonly enabled: boolean;
  readonly description: string | null;
  /** Max concurrent in-flight deliveries to this endpoint; null = unbounded */
  readonly maxConcurrency: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** Endpoint as exposed after creation; the secret is not shown again. */
export type WebhookEndpointView = Omit<WebhookEndpoint, "secret">;

export const toEndpointView = (endpoint: WebhookEndpoint): WebhookEndpointView => {
  const { secret: _secret, ...view } = endpoint;
  return view;
};

/** Pure subscription matcher. Disabled endpoints match nothing. */
export const isSubscribed = (
  endpoint: Pick<WebhookEndpoint, "enabled" | "allEvents" | "events">,
  type: WebhookEventType,
): boolean => endpoint.enabled && (endpoint.allEvents || endpoint.events.includes(type));
