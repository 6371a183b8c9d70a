/**
 * Island Warden — src/lib/schedulerHealth.ts
 * WHAT: Run/failure bookkeeping for the background loops (status polling, roster refresh, alert expiry).
 * WHY: A loop that fails quietly looks exactly like a quiet fleet. /islands shows the
 *      status loop's line so staff can tell the two apart.
 * FLOWS:
 *  - recordSchedulerRun(name, ok) → counters → error log every FAILURE_ESCALATION failures in a row
 *  - schedulerHealth(name) → copy of the counters, null if the loop never ran
 *  - describeSchedulerHealth(health) → one line for status embeds
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { discordRelative, nowUtc } from "./time.js";

export type SchedulerName = "islandStatus" | "roster" | "alertExpiry";

export interface SchedulerHealth {
  name: SchedulerName;
  runs: number;
  failures: number;
  /** Failures since the last successful run */
  consecutiveFailures: number;
  /** Unix seconds */
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
}

const FAILURE_ESCALATION = 3;

const book = new Map<SchedulerName, SchedulerHealth>();

export function recordSchedulerRun(name: SchedulerName, ok: boolean, now: number = nowUtc()): void {
  const entry = book.get(name) ?? {
    name,
    runs: 0,
    failures: 0,
    consecutiveFailures: 0,
    lastSuccessAt: null,
    lastFailureAt: null,
  };
  entry.runs += 1;

  if (ok) {
    entry.consecutiveFailures = 0;
    entry.lastSuccessAt = now;
  } else {
    entry.failures += 1;
    entry.consecutiveFailures += 1;
    entry.lastFailureAt = now;
    if (entry.consecutiveFailures % FAILURE_ESCALATION === 0) {
      logger.error(
        { evt: "scheduler_failing", scheduler: name, consecutiveFailures: entry.consecutiveFailures },
        `[scheduler] ${name} has failed ${entry.consecutiveFailures} runs in a row`
      );
    }
  }

  book.set(name, entry);
}

export function schedulerHealth(name: SchedulerName): SchedulerHealth | null {
  const entry = book.get(name);
  return entry ? { ...entry } : null;
}

export function describeSchedulerHealth(health: SchedulerHealth | null): string {
  if (!health) return "Monitor: not run yet";
  const failed = health.consecutiveFailures;
  if (health.lastSuccessAt === null) return `Monitor: ${failed} failed, none succeeded yet`;
  const last = discordRelative(health.lastSuccessAt);
  return failed === 0 ? `Monitor: last run ${last}` : `Monitor: last good run ${last}, ${failed} failed since`;
}

/** Test-only: forget every loop. */
export function _resetSchedulerHealth(): void {
  book.clear();
}
