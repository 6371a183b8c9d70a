/**
 * Island Warden — src/db/db.ts
 * WHAT: SQLite connection bootstrap.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs; the process opens exactly one connection.
 * FLOWS:
 *  - openDatabase(path) → set PRAGMAs → ensureSchema → return handle
 *  - closeDatabase(db) on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";
import { ensureSchema } from "./ensure.js";

const DB_BUSY_TIMEOUT_MS = 5000;

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, { fileMustExist: false });
  // WAL lets status reads proceed while a moderation write is in progress
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  ensureSchema(db);
  logger.info({ dbPath }, "SQLite opened");
  return db;
}

export function closeDatabase(db: Database.Database): void {
  try {
    db.close();
    logger.info("[db] closed");
  } catch (err) {
    logger.error({ err }, "[db] close failed");
  }
}
