/**
 * Island Warden — src/features/flight/registry.ts
 * WHAT: Known-entity registry. Owns the known-traveler set, flight alerts and
 *       the append-only moderation history.
 * WHY: Single owner for every structure the arrival path and the decision path
 *      both touch; nothing else writes these tables.
 * FLOWS:
 *  - replaceRoster(members) / syncMember(id, keys) / dropMember(id) / admit(id) → known set
 *  - openAlert(arrival) → pending alert (deduplicated per traveler)
 *  - resolveAlert / resolveWithRecord → pending → resolved (+ moderation_record)
 *  - historyOf(id) → records oldest first
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { ulid } from "ulid";
import { logger } from "../../lib/logger.js";
import { nowUtc } from "../../lib/time.js";
import { AlreadyResolvedError, ConflictError, classifyError } from "../../lib/errors.js";
import type {
  Alert,
  AlertOutcome,
  AlertRow,
  ArrivalEvent,
  ModerationKind,
  ModerationRecord,
  ModerationRecordRow,
} from "./types.js";

interface AdmitEntry {
  clearedBy: string;
  since: number;
}

/** Roster keys per member id, as built from each member's nickname. */
export type RosterSnapshot = ReadonlyMap<string, ReadonlySet<string>>;

export interface RegistryOptions {
  now?: () => number;
}

const ALERT_COLUMNS = `id, identity_id, display_name, origin_island, island_key, channel_id, message_id,
  status, outcome, resolver_id, created_at, resolved_at`;

function toAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    identityId: row.identity_id,
    displayName: row.display_name,
    originIsland: row.origin_island,
    islandKey: row.island_key,
    channelId: row.channel_id,
    messageId: row.message_id,
    status: row.status,
    outcome: row.outcome,
    resolverId: row.resolver_id,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  };
}

function toRecord(row: ModerationRecordRow): ModerationRecord {
  return {
    id: row.id,
    alertId: row.alert_id,
    identityId: row.identity_id,
    kind: row.action,
    staffId: row.staff_id,
    reason: row.reason,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  const classified = classifyError(err);
  return (
    classified.kind === "db_error" &&
    (classified.code === "SQLITE_CONSTRAINT_UNIQUE" || classified.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

export class KnownEntityRegistry {
  // Known travelers live in memory. Roster keys belong to the member whose
  // nickname lists them and are counted, so one member renaming or leaving
  // does not clear a key another member still holds. Admits last for the
  // process session.
  private readonly admitted = new Map<string, AdmitEntry>();
  private rosterByMember = new Map<string, ReadonlySet<string>>();
  private rosterHolders = new Map<string, number>();
  private readonly now: () => number;

  constructor(
    private readonly db: Database.Database,
    options: RegistryOptions = {}
  ) {
    this.now = options.now ?? nowUtc;
  }

  // ===== Known set =====

  /** Pure lookup. */
  isKnown(identityId: string): boolean {
    return this.admitted.has(identityId) || this.rosterHolders.has(identityId);
  }

  /** Admit clears a traveler for the rest of the session. No history record. */
  admit(identityId: string, staffId: string): void {
    this.admitted.set(identityId, { clearedBy: staffId, since: this.now() });
  }

  /**
   * Swap in a fresh roster. Admitted travelers are kept even when they are not
   * (yet) on the roster.
   * @returns number of distinct roster keys now known
   */
  replaceRoster(roster: RosterSnapshot): number {
    this.rosterByMember = new Map();
    this.rosterHolders = new Map();
    for (const [memberId, keys] of roster) this.syncMember(memberId, keys);
    logger.debug(
      { members: this.rosterByMember.size, rosterKeys: this.rosterHolders.size },
      "[registry] roster replaced"
    );
    return this.rosterHolders.size;
  }

  /** A member joined or renamed: their keys become exactly `keys`. */
  syncMember(memberId: string, keys: Iterable<string>): void {
    this.dropMember(memberId);
    const held = new Set([...keys].filter((key) => key.length > 0));
    if (held.size === 0) return;
    this.rosterByMember.set(memberId, held);
    for (const key of held) this.rosterHolders.set(key, (this.rosterHolders.get(key) ?? 0) + 1);
  }

  /** A member left: keys nobody else holds stop being known. */
  dropMember(memberId: string): void {
    const held = this.rosterByMember.get(memberId);
    if (!held) return;
    this.rosterByMember.delete(memberId);
    for (const key of held) {
      const remaining = (this.rosterHolders.get(key) ?? 1) - 1;
      if (remaining > 0) this.rosterHolders.set(key, remaining);
      else this.rosterHolders.delete(key);
    }
  }

  knownCount(): number {
    let count = this.rosterHolders.size;
    for (const key of this.admitted.keys()) {
      if (!this.rosterHolders.has(key)) count++;
    }
    return count;
  }

  // ===== Alerts =====

  /**
   * Open a pending alert for an arrival. Returns null when the traveler
   * already has one pending (the partial unique index backs this up).
   */
  openAlert(event: ArrivalEvent): Alert | null {
    if (this.pendingAlertFor(event.identityId)) return null;

    const row: AlertRow = {
      id: ulid(),
      identity_id: event.identityId,
      display_name: event.displayName,
      origin_island: event.originIsland,
      island_key: event.islandKey,
      channel_id: null,
      message_id: null,
      status: "pending",
      outcome: null,
      resolver_id: null,
      created_at: this.now(),
      resolved_at: null,
    };

    try {
      this.db
        .prepare(
          `INSERT INTO flight_alert (id, identity_id, display_name, origin_island, island_key, status, created_at)
           VALUES (?, ?, ?, ?, ?, 'pending', ?)`
        )
        .run(row.id, row.identity_id, row.display_name, row.origin_island, row.island_key, row.created_at);
    } catch (err) {
      if (isUniqueViolation(err)) return null;
      throw err;
    }
    return toAlert(row);
  }

  getAlert(alertId: string): Alert | null {
    const row = this.db
      .prepare<[string], AlertRow>(`SELECT ${ALERT_COLUMNS} FROM flight_alert WHERE id = ?`)
      .get(alertId);
    return row ? toAlert(row) : null;
  }

  pendingAlertFor(identityId: string): Alert | null {
    const row = this.db
      .prepare<[string], AlertRow>(
        `SELECT ${ALERT_COLUMNS} FROM flight_alert WHERE identity_id = ? AND status = 'pending' LIMIT 1`
      )
      .get(identityId);
    return row ? toAlert(row) : null;
  }

  /** Pending alerts created at or before `createdBefore` (Unix seconds), oldest first. */
  listPendingAlerts(createdBefore?: number): Alert[] {
    const rows =
      createdBefore === undefined
        ? this.db
            .prepare<[], AlertRow>(
              `SELECT ${ALERT_COLUMNS} FROM flight_alert WHERE status = 'pending' ORDER BY created_at, id`
            )
            .all()
        : this.db
            .prepare<[number], AlertRow>(
              `SELECT ${ALERT_COLUMNS} FROM flight_alert
               WHERE status = 'pending' AND created_at <= ? ORDER BY created_at, id`
            )
            .all(createdBefore);
    return rows.map(toAlert);
  }

  /** Remember where the staff prompt for an alert was posted. */
  attachAlertMessage(alertId: string, channelId: string, messageId: string | null): void {
    this.db
      .prepare(`UPDATE flight_alert SET channel_id = ?, message_id = ? WHERE id = ?`)
      .run(channelId, messageId, alertId);
  }

  /**
   * Move a pending alert to resolved without a moderation record
   * (admit, departed, expired, undelivered).
   * @throws AlreadyResolvedError when the alert is not pending
   */
  resolveAlert(alertId: string, outcome: AlertOutcome, resolverId: string | null): Alert {
    return this.db.transaction(() => {
      this.markResolved(alertId, outcome, resolverId);
      const alert = this.getAlert(alertId);
      if (!alert) throw new Error(`Alert ${alertId} vanished during resolve`);
      return alert;
    })();
  }

  /**
   * Append a moderation record. Fails with ConflictError when the alert
   * already has one.
   */
  recordAction(
    alertId: string,
    identityId: string,
    kind: ModerationKind,
    staffId: string,
    reason?: string | null
  ): ModerationRecord {
    const createdAt = this.now();
    try {
      const info = this.db
        .prepare(
          `INSERT INTO moderation_record (alert_id, identity_id, action, staff_id, reason, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(alertId, identityId, kind, staffId, reason ?? null, createdAt);
      return {
        id: Number(info.lastInsertRowid),
        alertId,
        identityId,
        kind,
        staffId,
        reason: reason ?? null,
        createdAt,
      };
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(alertId);
      throw err;
    }
  }

  /**
   * Record the action and resolve its alert in one transaction, so history
   * and alert state never disagree.
   */
  resolveWithRecord(
    alertId: string,
    kind: ModerationKind,
    staffId: string,
    reason?: string | null
  ): { alert: Alert; record: ModerationRecord } {
    return this.db.transaction(() => {
      const current = this.getAlert(alertId);
      if (!current) throw new Error(`Alert ${alertId} not found`);
      this.markResolved(alertId, kind, staffId);
      const record = this.recordAction(alertId, current.identityId, kind, staffId, reason);
      const alert = this.getAlert(alertId);
      if (!alert) throw new Error(`Alert ${alertId} vanished during resolve`);
      return { alert, record };
    })();
  }

  /** Moderation history, oldest first. Empty for travelers never acted upon. */
  historyOf(identityId: string): ModerationRecord[] {
    return this.db
      .prepare<[string], ModerationRecordRow>(
        `SELECT id, alert_id, identity_id, action, staff_id, reason, created_at
         FROM moderation_record WHERE identity_id = ? ORDER BY id ASC`
      )
      .all(identityId)
      .map(toRecord);
  }

  private markResolved(alertId: string, outcome: AlertOutcome, resolverId: string | null): void {
    const info = this.db
      .prepare(
        `UPDATE flight_alert SET status = 'resolved', outcome = ?, resolver_id = ?, resolved_at = ?
         WHERE id = ? AND status = 'pending'`
      )
      .run(outcome, resolverId, this.now(), alertId);

    if (info.changes === 0) {
      const existing = this.getAlert(alertId);
      if (!existing) throw new Error(`Alert ${alertId} not found`);
      throw new AlreadyResolvedError(alertId, existing.outcome, existing.resolverId);
    }
  }
}
