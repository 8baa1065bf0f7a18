import type Database from "better-sqlite3";

/**
 * Migration 002: outbound webhooks
 * - webhook_endpoints: tenant-owned endpoint configuration
 * - webhook_deliveries: durable delivery queue, unique per (endpoint, event)
 *
 * Deliveries carry no foreign key: removing an endpoint keeps its delivery
 * history (outstanding rows are cancelled first).
 */
export const up = (db: Database.Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS webhook_endpoints (
      id               TEXT PRIMARY KEY,
      owner_id         TEXT NOT NULL,
      url              TEXT NOT NULL,
      secret           TEXT NOT NULL,
      events           TEXT NOT NULL DEFAULT '[]',
      all_events       INTEGER NOT NULL DEFAULT 0,
      enabled          INTEGER NOT NULL DEFAULT 1,
      description      TEXT,
      max_concurrency  INTEGER CHECK (max_concurrency IS NULL OR max_concurrency > 0),
      created_at       INTEGER NOT NULL,
      updated_at       INTEGER NOT NULL
    )
  `);
  db.exec("CREATE INDEX IF NOT EXISTS idx_webhook_endpoints_owner ON webhook_endpoints(owner_id)");

  db.exec(`
    CREATE TABLE IF NOT EXISTS webhook_deliveries (
      id                    TEXT PRIMARY KEY,
      endpoint_id           TEXT NOT NULL,
      event_id              TEXT NOT NULL,
      event_type            TEXT NOT NULL,
      payload               TEXT NOT NULL,
      queue                 TEXT NOT NULL DEFAULT 'default',
      status                TEXT NOT NULL CHECK (status IN
                              ('pending', 'in_flight', 'delivered', 'pending_retry', 'failed_exhausted', 'cancelled')),
      attempts              INTEGER NOT NULL DEFAULT 0 CHECK (attempts BETWEEN 0 AND 5),
      next_attempt_at       INTEGER,
      last_attempt_at       INTEGER,
      last_response_status  INTEGER,
      last_response_body    TEXT,
      last_error            TEXT,
      claimed_by            TEXT,
      version               INTEGER NOT NULL DEFAULT 0,
      created_at            INTEGER NOT NULL,
      updated_at            INTEGER NOT NULL,
      UNIQUE (endpoint_id, event_id)
    )
  `);
  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_due ON webhook_deliveries(queue, status, next_attempt_at)",
  );
  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_endpoint ON webhook_deliveries(endpoint_id, created_at)",
  );
};

export const down = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS webhook_deliveries");
  db.exec("DROP TABLE IF EXISTS webhook_endpoints");
};
