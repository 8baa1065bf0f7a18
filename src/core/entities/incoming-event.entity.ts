export const IncomingEventStatus = {
  RECEIVED: "received",
  PROCESSING: "processing",
  PROCESSED: "processed",
  ERROR: "error",
} as const;

export type IncomingEventStatus = (typeof IncomingEventStatus)[keyof typeof IncomingEventStatus];

/** Inbound webhook event, unique per (source, eventId). */
export interface IncomingWebhookEvent {
  readonly id: string;
  readonly source: string;
  readonly eventId: string;
  readonly eventType: string | null;
  /** Raw body as received */
  readonly payload: string;
  readonly status: IncomingEventStatus;
  readonly errorMessage: string | null;
  readonly receivedAt: number;
  readonly processedAt: number | null;
  readonly updatedAt: number;
}
