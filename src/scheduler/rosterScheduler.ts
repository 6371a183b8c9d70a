/**
 * Island Warden — src/scheduler/rosterScheduler.ts
 * WHAT: Rebuilds the cleared-traveler roster from member nicknames.
 * WHY: Member events keep the roster current between runs; the periodic rebuild
 *      repairs anything an event missed (gateway reconnects drop events).
 * FLOWS:
 *  - start → refreshRoster() until one succeeds (startup retry) → resolve
 *  - every N minutes → refreshRoster() → registry.replaceRoster()
 * NOTES:
 *  - The promise from startRosterScheduler() resolves on the first successful
 *    load. Arrivals are held until then: an empty roster alerts on everyone.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { buildRoster, type RosterMember } from "../features/flight/roster.js";
import type { KnownEntityRegistry } from "../features/flight/registry.js";

/** Supplies current members (guild.members.fetch() in production). */
export type MemberSource = () => Promise<Iterable<RosterMember>>;

export interface RosterSchedulerOptions {
  intervalMinutes: number;
  /** Pause between failed startup loads (default: 30s) */
  startupRetryMs?: number;
}

let _activeInterval: NodeJS.Timeout | null = null;
let _startupRetry: NodeJS.Timeout | null = null;
// Bumped by stop() so a pending startup retry never fires into a stopped scheduler
let _generation = 0;

export async function refreshRoster(source: MemberSource, registry: KnownEntityRegistry): Promise<number> {
  const members = await source();
  const count = registry.replaceRoster(buildRoster(members));
  logger.info({ rosterKeys: count }, "[roster] roster refreshed");
  return count;
}

async function runRefresh(source: MemberSource, registry: KnownEntityRegistry): Promise<boolean> {
  try {
    await refreshRoster(source, registry);
    recordSchedulerRun("roster", true);
    return true;
  } catch (err) {
    recordSchedulerRun("roster", false);
    // Keep serving the previous roster
    logger.error({ err }, "[roster] refresh failed");
    return false;
  }
}

/**
 * @returns resolves once a roster has loaded; never rejects
 */
export function startRosterScheduler(
  source: MemberSource,
  registry: KnownEntityRegistry,
  options: RosterSchedulerOptions
): Promise<void> {
  stopRosterScheduler();
  const generation = _generation;
  const retryMs = options.startupRetryMs ?? 30_000;

  _activeInterval = setInterval(() => void runRefresh(source, registry), options.intervalMinutes * 60_000);
  _activeInterval.unref();
  logger.info({ intervalMinutes: options.intervalMinutes }, "[roster] scheduler started");

  return new Promise<void>((resolve) => {
    const attempt = async (): Promise<void> => {
      if (generation !== _generation) return;
      if (await runRefresh(source, registry)) {
        resolve();
        return;
      }
      if (generation !== _generation) return;
      logger.warn({ retryMs }, "[roster] initial load failed; retrying");
      _startupRetry = setTimeout(() => void attempt(), retryMs);
      _startupRetry.unref();
    };
    void attempt();
  });
}

export function stopRosterScheduler(): void {
  _generation++;
  if (_startupRetry) {
    clearTimeout(_startupRetry);
    _startupRetry = null;
  }
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[roster] scheduler stopped");
  }
}
