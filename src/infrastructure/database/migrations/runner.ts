import type Database from "better-sqlite3";
import type { Logger } from "../../../core/ports/logger.js";

/**
 * SQLite migration runner.
 * Tracks applied migrations in a `_migrations` table.
 * Supports up/down with versioned TypeScript migration files.
 */

interface Migration {
  readonly version: string;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
  readonly down: (db: Database.Database) => void;
}

const ensureMigrationsTable = (db: Database.Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version     TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  INTEGER NOT NULL
    )
  `);
};

const getAppliedVersions = (db: Database.Database): Set<string> => {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM _migrations ORDER BY version")
    .all();
  return new Set(rows.map((r) => r.version));
};

const loadMigrations = async (): Promise<Migration[]> => {
  const m001 = await import("./001_create_idempotency_keys.js");
  const m002 = await import("./002_create_webhooks.js");
  const m003 = await import("./003_create_webhook_events.js");

  return [
    { version: "001", name: "create_idempotency_keys", up: m001.up, down: m001.down },
    { version: "002", name: "create_webhooks", up: m002.up, down: m002.down },
    { version: "003", name: "create_webhook_events", up: m003.up, down: m003.down },
  ];
};

/**
 * Run all pending migrations (up).
 * Returns the number of migrations applied.
 */
export const migrateUp = async (db: Database.Database, logger: Logger): Promise<number> => {
  ensureMigrationsTable(db);
  const applied = getAppliedVersions(db);
  const migrations = await loadMigrations();
  const record = db.prepare("INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)");
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    logger.info(`Applying migration ${migration.version}: ${migration.name}`);
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name, Date.now());
    })();
    count++;
  }

  if (count === 0) {
    logger.debug("No pending migrations");
  } else {
    logger.info(`Applied ${count} migration(s)`);
  }

  return count;
};

/**
 * Rollback the last applied migration (down).
 * Returns the version that was rolled back, or null if nothing to rollback.
 */
export const migrateDown = async (
  db: Database.Database,
  logger: Logger,
): Promise<string | null> => {
  ensureMigrationsTable(db);
  const migrations = await loadMigrations();

  const lastApplied = db
    .prepare<[], { version: string }>(
      "SELECT version FROM _migrations ORDER BY version DESC LIMIT 1",
    )
    .get();

  if (!lastApplied) {
    logger.info("No migrations to rollback");
    return null;
  }

  const migration = migrations.find((m) => m.version === lastApplied.version);
  if (!migration) {
    logger.error(`Migration ${lastApplied.version} not found in migration files`);
    return null;
  }

  logger.info(`Rolling back migration ${migration.version}: ${migration.name}`);
  db.transaction(() => {
    migration.down(db);
    db.prepare("DELETE FROM _migrations WHERE version = ?").run(migration.version);
  })();

  return migration.version;
};
