import type { DeliveryStore } from "../../core/ports/delivery-store.js";
import type { IdempotencyStore } from "../../core/ports/idempotency-store.js";
import type { IncomingEventStore } from "../../core/ports/incoming-event-store.js";
import type { Logger } from "../../core/ports/logger.js";
import type { WebhookRegistry } from "../../core/ports/webhook-registry.js";
import { migrateUp } from "./migrations/runner.js";
import {
  createPgDeliveryStore,
  createPgIdempotencyStore,
  createPgIncomingEventStore,
  createPgPool,
  createPgWebhookRegistry,
  pgMigrateUp,
} from "./postgres/index.js";
import { createSqliteDeliveryStore } from "./sqlite-delivery-store.js";
import { createSqliteIdempotencyStore } from "./sqlite-idempotency-store.js";
import { createSqliteIncomingEventStore } from "./sqlite-incoming-event-store.js";
import { createSqliteWebhookRegistry } from "./sqlite-webhook-registry.js";
import { openSqliteDatabase } from "./sqlite.js";

export type StorageKind = "sqlite" | "postgres";

/** Every durable store, opened and migrated, behind one handle */
export interface Storage {
  readonly kind: StorageKind;
  readonly idempotency: IdempotencyStore;
  readonly registry: WebhookRegistry;
  readonly deliveries: DeliveryStore;
  readonly incoming: IncomingEventStore;
  /** Round-trip to the database; throws when it is unreachable */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface StorageOptions {
  /** Postgres connection string; SQLite is used when absent */
  readonly url?: string | undefined;
  readonly path: string;
}

/** Open the configured database and bring its schema up to date */
export const openStorage = async (options: StorageOptions, logger: Logger): Promise<Storage> => {
  const log = logger.child({ service: "storage" });

  if (options.url) {
    const pool = createPgPool(options.url);
    await pgMigrateUp(pool, log);
    log.info("PostgreSQL pool ready");
    return {
      kind: "postgres",
      idempotency: createPgIdempotencyStore(pool),
      registry: createPgWebhookRegistry(pool),
      deliveries: createPgDeliveryStore(pool),
      incoming: createPgIncomingEventStore(pool),
      async ping() {
        await pool.query("SELECT 1");
      },
      async close() {
        await pool.end();
      },
    };
  }

  const db = openSqliteDatabase(options.path);
  await migrateUp(db, log);
  log.info("SQLite database opened", { path: options.path });
  return {
    kind: "sqlite",
    idempotency: createSqliteIdempotencyStore(db),
    registry: createSqliteWebhookRegistry(db),
    deliveries: createSqliteDeliveryStore(db),
    incoming: createSqliteIncomingEventStore(db),
    async ping() {
      db.prepare("SELECT 1").get();
    },
    async close() {
      db.close();
    },
  };
};
