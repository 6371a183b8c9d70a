/**
 * Island Warden — src/db/ensure.ts
 * WHAT: Idempotent schema bootstrap for flight alerts and moderation history.
 * FLOWS: ensureSchema(db) → CREATE TABLE/INDEX/TRIGGER IF NOT EXISTS
 * DOCS:
 *  - SQLite partial indexes: https://sqlite.org/partialindex.html
 *  - SQLite triggers / RAISE: https://sqlite.org/lang_createtrigger.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type Database from "better-sqlite3";

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    -- flight_alert: one staff decision request per unknown arrival
    CREATE TABLE IF NOT EXISTS flight_alert (
      id TEXT PRIMARY KEY,
      identity_id TEXT NOT NULL,
      display_name TEXT NOT NULL,
      origin_island TEXT NOT NULL,
      island_key TEXT NOT NULL,
      channel_id TEXT,
      message_id TEXT,
      status TEXT NOT NULL DEFAULT 'pending',
      outcome TEXT,
      resolver_id TEXT,
      created_at INTEGER NOT NULL,
      resolved_at INTEGER
    );

    -- At most one pending alert per traveler
    CREATE UNIQUE INDEX IF NOT EXISTS ux_flight_alert_pending
      ON flight_alert(identity_id) WHERE status = 'pending';

    CREATE INDEX IF NOT EXISTS idx_flight_alert_status_time
      ON flight_alert(status, created_at);

    -- moderation_record: append-only history, one row per resolving alert
    CREATE TABLE IF NOT EXISTS moderation_record (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      alert_id TEXT NOT NULL UNIQUE,
      identity_id TEXT NOT NULL,
      action TEXT NOT NULL CHECK (action IN ('warn', 'kick', 'ban')),
      staff_id TEXT NOT NULL,
      reason TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_moderation_record_identity
      ON moderation_record(identity_id, id);

    CREATE TRIGGER IF NOT EXISTS trg_moderation_record_no_update
      BEFORE UPDATE ON moderation_record
      BEGIN SELECT RAISE(ABORT, 'moderation_record is append-only'); END;

    CREATE TRIGGER IF NOT EXISTS trg_moderation_record_no_delete
      BEFORE DELETE ON moderation_record
      BEGIN SELECT RAISE(ABORT, 'moderation_record is append-only'); END;
  `);
}
