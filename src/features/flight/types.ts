/**
 * Island Warden — src/features/flight/types.ts
 * WHAT: Shared types for the flight logger: travelers, alerts, decisions, history.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Staff decisions offered on an alert card, in button order. */
export const DECISIONS = ["admit", "warn", "kick", "ban"] as const;
export type Decision = (typeof DECISIONS)[number];

/** Decisions that produce a moderation record. Admit is not a moderation action. */
export type ModerationKind = Exclude<Decision, "admit">;

/**
 * How an alert left the pending state. Beyond staff decisions:
 * - departed: traveler left before anyone decided
 * - expired: decision window elapsed
 * - undelivered: the staff prompt could not be posted
 */
export type AlertOutcome = Decision | "departed" | "expired" | "undelivered";

export type AlertStatus = "pending" | "resolved";

/** A visiting traveler. `id` is the normalized traveler key (see feed.ts). */
export interface Identity {
  id: string;
  displayName: string;
  originIsland: string;
  /** Unix seconds */
  arrivedAt: number;
}

export interface ArrivalEvent {
  identityId: string;
  displayName: string;
  originIsland: string;
  /** Destination island key (cleaned) */
  islandKey: string;
  /** Unix seconds */
  timestamp: number;
}

export interface DepartureEvent {
  identityId: string;
  islandKey: string;
  timestamp: number;
}

export interface Alert {
  id: string;
  identityId: string;
  displayName: string;
  originIsland: string;
  islandKey: string;
  channelId: string | null;
  messageId: string | null;
  status: AlertStatus;
  outcome: AlertOutcome | null;
  resolverId: string | null;
  createdAt: number;
  resolvedAt: number | null;
}

export interface ModerationRecord {
  id: number;
  alertId: string;
  identityId: string;
  kind: ModerationKind;
  staffId: string;
  reason: string | null;
  createdAt: number;
}

/** Row shapes as stored in SQLite */
export interface AlertRow {
  id: string;
  identity_id: string;
  display_name: string;
  origin_island: string;
  island_key: string;
  channel_id: string | null;
  message_id: string | null;
  status: AlertStatus;
  outcome: AlertOutcome | null;
  resolver_id: string | null;
  created_at: number;
  resolved_at: number | null;
}

export interface ModerationRecordRow {
  id: number;
  alert_id: string;
  identity_id: string;
  action: ModerationKind;
  staff_id: string;
  reason: string | null;
  created_at: number;
}

export function isDecision(value: string): value is Decision {
  return DECISIONS.some((d) => d === value);
}

export function identityOf(alert: Alert): Identity {
  return {
    id: alert.identityId,
    displayName: alert.displayName,
    originIsland: alert.originIsland,
    arrivedAt: alert.createdAt,
  };
}
