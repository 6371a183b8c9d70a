/**
 * Island Warden — src/features/islandStatus/tracker.ts
 * WHAT: Debounced status per island.
 * WHY: A single noisy probe must not flip an island up/down and spam its channel.
 * FLOWS:
 *  - observe(key, raw) → counter bookkeeping → TransitionEvent once `threshold`
 *    identical observations disagree with the confirmed state
 *  - snapshot(key) / confirmedStates() → confirmed state only
 * NOTES:
 *  - observe() is synchronous, so one observation is applied atomically even
 *    when probes for many islands complete concurrently.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { nowUtc } from "../../lib/time.js";
import type { ConfirmedStatus, IslandState, StatusSnapshot, TransitionEvent } from "./types.js";

export interface StatusTrackerOptions {
  /** Consecutive identical observations needed to confirm a change (default: 2) */
  debounceThreshold?: number;
  /** Confirmed state to start from, e.g. restored after a restart */
  seed?: Iterable<readonly [string, IslandState]>;
  now?: () => number;
}

export class StatusTracker {
  private readonly snapshots = new Map<string, StatusSnapshot>();
  private readonly threshold: number;
  private readonly now: () => number;

  constructor(options: StatusTrackerOptions = {}) {
    this.threshold = Math.max(1, options.debounceThreshold ?? 2);
    this.now = options.now ?? nowUtc;
    for (const [islandKey, state] of options.seed ?? []) {
      this.snapshots.set(islandKey, {
        islandKey,
        rawState: "unknown",
        confirmedState: state,
        consecutive: 0,
        lastTransitionAt: null,
      });
    }
  }

  get debounceThreshold(): number {
    return this.threshold;
  }

  /**
   * Apply one raw observation. "unknown" is no information: it neither counts
   * toward nor clears the current run.
   */
  observe(islandKey: string, rawState: IslandState): TransitionEvent | null {
    if (rawState === "unknown") return null;

    const snap = this.snapshotFor(islandKey);
    if (rawState === snap.rawState) {
      snap.consecutive++;
    } else {
      snap.rawState = rawState;
      snap.consecutive = 1;
    }

    if (snap.consecutive < this.threshold || rawState === snap.confirmedState) return null;

    const event: TransitionEvent = {
      islandKey,
      previous: snap.confirmedState,
      next: rawState,
      timestamp: this.now(),
    };
    snap.confirmedState = rawState;
    snap.lastTransitionAt = event.timestamp;
    return event;
  }

  snapshot(islandKey: string): ConfirmedStatus {
    const snap = this.snapshots.get(islandKey);
    return {
      islandKey,
      state: snap?.confirmedState ?? "unknown",
      since: snap?.lastTransitionAt ?? null,
    };
  }

  confirmedStates(): Map<string, IslandState> {
    const out = new Map<string, IslandState>();
    for (const [key, snap] of this.snapshots) out.set(key, snap.confirmedState);
    return out;
  }

  private snapshotFor(islandKey: string): StatusSnapshot {
    let snap = this.snapshots.get(islandKey);
    if (!snap) {
      snap = {
        islandKey,
        rawState: "unknown",
        confirmedState: "unknown",
        consecutive: 0,
        lastTransitionAt: null,
      };
      this.snapshots.set(islandKey, snap);
    }
    return snap;
  }
}
