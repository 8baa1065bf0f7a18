/**
 * Postgres migration runner.
 *
 * Mirrors the SQLite migration runner but uses PostgreSQL DDL.
 * Each migration runs in its own transaction.
 */

import type { Logger } from "../../../core/ports/logger.js";
import { type PgPool, withTransaction } from "./connection.js";

interface PgMigration {
  readonly version: string;
  readonly name: string;
  readonly up: string;
  readonly down: string;
}

/**
 * BIGINT for timestamps (ms since epoch), TEXT for ids,
 * BOOLEAN instead of INTEGER 0/1.
 */
const migrations: readonly PgMigration[] = [
  {
    version: "001",
    name: "create_idempotency_keys",
    up: `
      CREATE TABLE IF NOT EXISTS idempotency_keys (
        scope             TEXT NOT NULL,
        key               TEXT NOT NULL,
        request_hash      TEXT NOT NULL,
        status            TEXT NOT NULL CHECK (status IN ('locked', 'completed')),
        lock_token        TEXT NOT NULL,
        response_status   INTEGER,
        response_body     TEXT,
        response_headers  TEXT,
        locked_at         BIGINT NOT NULL,
        completed_at      BIGINT,
        created_at        BIGINT NOT NULL,
        expires_at        BIGINT NOT NULL,
        PRIMARY KEY (scope, key)
      );
      CREATE INDEX IF NOT EXISTS idx_idempotency_keys_expires ON idempotency_keys(expires_at);
    `,
    down: `
      DROP INDEX IF EXISTS idx_idempotency_keys_expires;
      DROP TABLE IF EXISTS idempotency_keys;
    `,
  },
  {
    version: "002",
    name: "create_webhooks",
    up: `
      CREATE TABLE IF NOT EXISTS webhook_endpoints (
        id               TEXT PRIMARY KEY,
        owner_id         TEXT NOT NULL,
        url              TEXT NOT NULL,
        secret           TEXT NOT NULL,
        events           TEXT NOT NULL DEFAULT '[]',
        all_events       BOOLEAN NOT NULL DEFAULT FALSE,
        enabled          BOOLEAN NOT NULL DEFAULT TRUE,
        description      TEXT,
        max_concurrency  INTEGER CHECK (max_concurrency IS NULL OR max_concurrency > 0),
        created_at       BIGINT NOT NULL,
        updated_at       BIGINT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_webhook_endpoints_owner ON webhook_endpoints(owner_id);
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
        next_attempt_at       BIGINT,
        last_attempt_at       BIGINT,
        last_response_status  INTEGER,
        last_response_body    TEXT,
        last_error            TEXT,
        claimed_by            TEXT,
        version               INTEGER NOT NULL DEFAULT 0,
        created_at            BIGINT NOT NULL,
        updated_at            BIGINT NOT NULL,
        UNIQUE (endpoint_id, event_id)
      );
      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_due ON webhook_deliveries(queue, status, next_attempt_at);
      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_endpoint ON webhook_deliveries(endpoint_id, created_at);
    `,
    down: `
      DROP TABLE IF EXISTS webhook_deliveries;
      DROP TABLE IF EXISTS webhook_endpoints;
    `,
  },
  {
    version: "003",
    name: "create_webhook_events",
    up: `
      CREATE TABLE IF NOT EXISTS webhook_events (
        id             TEXT PRIMARY KEY,
        source         TEXT NOT NULL,
        event_id       TEXT NOT NULL,
        event_type     TEXT,
        payload        TEXT NOT NULL,
        status         TEXT NOT NULL CHECK (status IN ('received', 'processing', 'processed', 'error')),
        error_message  TEXT,
        received_at    BIGINT NOT NULL,
        processed_at   BIGINT,
        updated_at     BIGINT NOT NULL,
        UNIQUE (source, event_id)
      );
      CREATE INDEX IF NOT EXISTS idx_webhook_events_status ON webhook_events(status, received_at);
    `,
    down: `
      DROP INDEX IF EXISTS idx_webhook_events_status;
      DROP TABLE IF EXISTS webhook_events;
    `,
  },
];

const ensureMigrationsTable = async (pool: PgPool): Promise<void> => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version     TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  BIGINT NOT NULL
    )
  `);
};

const getAppliedVersions = async (pool: PgPool): Promise<Set<string>> => {
  const { rows } = await pool.query<{ version: string }>(
    "SELECT version FROM _migrations ORDER BY version",
  );
  return new Set(rows.map((r) => r.version));
};

const statements = (script: string): string[] =>
  script
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

export const pgMigrateUp = async (pool: PgPool, logger: Logger): Promise<number> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    await withTransaction(pool, async (client) => {
      for (const stmt of statements(migration.up)) {
        await client.query(stmt);
      }
      await client.query("INSERT INTO _migrations (version, name, applied_at) VALUES ($1, $2, $3)", [
        migration.version,
        migration.name,
        Date.now(),
      ]);
    });

    logger.info("Migration applied", { version: migration.version, name: migration.name });
    count++;
  }

  if (count > 0) {
    logger.info("Postgres migrations complete", { applied: count });
  }

  return count;
};

export const pgMigrateDown = async (pool: PgPool, logger: Logger): Promise<string | null> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);

  for (const migration of [...migrations].reverse()) {
    if (!applied.has(migration.version)) continue;

    await withTransaction(pool, async (client) => {
      for (const stmt of statements(migration.down)) {
        await client.query(stmt);
      }
      await client.query("DELETE FROM _migrations WHERE version = $1", [migration.version]);
    });

    logger.info("Migration rolled back", { version: migration.version, name: migration.name });
    return migration.version;
  }

  return null;
};
