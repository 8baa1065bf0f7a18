/**
 * PostgreSQL adapters.
 */

export { createPgPool, withTransaction, type PgPool } from "./connection.js";
export { createPgIdempotencyStore } from "./pg-idempotency-store.js";
export { createPgWebhookRegistry } from "./pg-webhook-registry.js";
export { createPgDeliveryStore } from "./pg-delivery-store.js";
export { createPgIncomingEventStore } from "./pg-incoming-event-store.js";
export { pgMigrateUp, pgMigrateDown } from "./migrations.js";
