import type Database from "better-sqlite3";

/**
 * Migration 003: inbound webhook events, deduplicated on (source, event_id)
 */
export const up = (db: Database.Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS webhook_events (
      id             TEXT PRIMARY KEY,
      source         TEXT NOT NULL,
      event_id       TEXT NOT NULL,
      event_type     TEXT,
      payload        TEXT NOT NULL,
      status         TEXT NOT NULL CHECK (status IN ('received', 'processing', 'processed', 'error')),
      error_message  TEXT,
      received_at    INTEGER NOT NULL,
      processed_at   INTEGER,
      updated_at     INTEGER NOT NULL,
      UNIQUE (source, event_id)
    )
  `);
  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_webhook_events_status ON webhook_events(status, received_at)",
  );
};

export const down = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS webhook_events");
};
