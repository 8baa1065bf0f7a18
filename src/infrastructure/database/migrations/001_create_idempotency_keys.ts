import type Database from "better-sqlite3";

/**
 * Migration 001: idempotency keys
 * One row per (scope, key); the primary key is what makes insert-if-absent atomic.
 */
export const up = (db: Database.Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS idempotency_keys (
      scope             TEXT NOT NULL,
      key               TEXT NOT NULL,
      request_hash      TEXT NOT NULL,
      status            TEXT NOT NULL CHECK (status IN ('locked', 'completed')),
      lock_token        TEXT NOT NULL,
      response_status   INTEGER,
      response_body     TEXT,
      response_headers  TEXT,
      locked_at         INTEGER NOT NULL,
      completed_at      INTEGER,
      created_at        INTEGER NOT NULL,
      expires_at        INTEGER NOT NULL,
      PRIMARY KEY (scope, key)
    )
  `);
  db.exec("CREATE INDEX IF NOT EXISTS idx_idempotency_keys_expires ON idempotency_keys(expires_at)");
};

export const down = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS idempotency_keys");
};
