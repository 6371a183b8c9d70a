/**
 * Island Warden — src/features/islandStatus/types.ts
 * WHAT: Island states, monitored-island config shape, snapshots and transition events.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const ISLAND_STATES = ["online", "offline", "refreshing", "unknown"] as const;
export type IslandState = (typeof ISLAND_STATES)[number];

/** States a probe can actually observe. "unknown" means the probe told us nothing. */
export type ObservedState = Exclude<IslandState, "unknown">;

export interface MonitoredIsland {
  /** cleanText() of the display name */
  key: string;
  displayName: string;
  /** Channel that receives this island's up/down notices */
  channelId: string;
}

export interface ProbeResult {
  state: IslandState;
}

/**
 * Internal debounce state. Only `confirmedState` leaves the tracker.
 */
export interface StatusSnapshot {
  islandKey: string;
  rawState: IslandState;
  confirmedState: IslandState;
  /** Consecutive observations of rawState */
  consecutive: number;
  /** Unix seconds of the last confirmed change; null until the first one */
  lastTransitionAt: number | null;
}

/** The externally visible view of a snapshot. */
export interface ConfirmedStatus {
  islandKey: string;
  state: IslandState;
  since: number | null;
}

export interface TransitionEvent {
  islandKey: string;
  previous: IslandState;
  next: ObservedState;
  /** Unix seconds */
  timestamp: number;
}
