import { z } from "zod";
import { DeliveryStatus } from "../../core/entities/webhook-delivery.entity.js";
import { IncomingEventStatus } from "../../core/entities/incoming-event.entity.js";
import { WebhookEventType } from "../../core/entities/webhook-endpoint.entity.js";

/** Request bodies, validated at the edge via Zod */

const httpsUrl = z
  .string()
  .url()
  .max(2048)
  .refine((u) => u.startsWith("https://"), { message: "Endpoint URL must use https" });

const eventTypes = z.array(z.nativeEnum(WebhookEventType)).max(50);

export const createEndpointDto = z
  .object({
    url: httpsUrl,
    events: eventTypes.default([]),
    allEvents: z.boolean().default(false),
    description: z.string().trim().max(500).nullable().default(null),
    maxConcurrency: z.number().int().min(1).max(100).nullable().default(null),
  })
  .refine((v) => v.allEvents || v.events.length > 0, {
    message: "Subscribe to at least one event type or set allEvents",
    path: ["events"],
  });

export const updateEndpointDto = z
  .object({
    url: httpsUrl.optional(),
    events: eventTypes.optional(),
    allEvents: z.boolean().optional(),
    enabled: z.boolean().optional(),
    description: z.string().trim().max(500).nullable().optional(),
    maxConcurrency: z.number().int().min(1).max(100).nullable().optional(),
  })
  .refine((v) => Object.values(v).some((field) => field !== undefined), {
    message: "At least one field must be provided",
  });

export const publishEventDto = z.object({
  /** Business event id, the outbound dedup key; generated when absent */
  id: z.string().trim().min(1).max(255).optional(),
  type: z.nativeEnum(WebhookEventType),
  data: z.record(z.unknown()).default({}),
  queue: z.string().min(1).max(64).optional(),
});

const limit = z.coerce.number().int().min(1).max(100).default(20);

export const listDeliveriesQuery = z.object({
  status: z.nativeEnum(DeliveryStatus).optional(),
  cursor: z.string().min(1).optional(),
  limit,
});

export const listIncomingEventsQuery = z.object({
  status: z.nativeEnum(IncomingEventStatus).optional(),
  source: z.string().min(1).optional(),
  cursor: z.string().min(1).optional(),
  limit,
});

export type CreateEndpointDto = z.infer<typeof createEndpointDto>;
export type UpdateEndpointDto = z.infer<typeof updateEndpointDto>;
export type PublishEventDto = z.infer<typeof publishEventDto>;
export type ListDeliveriesQuery = z.infer<typeof listDeliveriesQuery>;
export type ListIncomingEventsQuery = z.infer<typeof listIncomingEventsQuery>;
