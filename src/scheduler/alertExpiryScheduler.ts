/**
 * Island Warden — src/scheduler/alertExpiryScheduler.ts
 * WHAT: Closes flight alerts nobody decided within the configured window.
 * FLOWS: every minute → flightLogger.expireStale()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import type { FlightLogger } from "../features/flight/flightLogger.js";

const CHECK_INTERVAL_MS = 60_000;

let _activeInterval: NodeJS.Timeout | null = null;

type ExpiryTarget = Pick<FlightLogger, "expireStale">;

async function runExpiry(flightLogger: ExpiryTarget): Promise<void> {
  try {
    await flightLogger.expireStale();
    recordSchedulerRun("alertExpiry", true);
  } catch (err) {
    recordSchedulerRun("alertExpiry", false);
    logger.error({ err }, "[flight:expiry] expiry pass failed");
  }
}

/** No-op when ttlMinutes is 0: alerts then stay pending until decided or departed. */
export function startAlertExpiryScheduler(flightLogger: ExpiryTarget, ttlMinutes: number): void {
  if (ttlMinutes <= 0) {
    logger.debug("[flight:expiry] alert expiry disabled");
    return;
  }
  if (_activeInterval) return;

  _activeInterval = setInterval(() => void runExpiry(flightLogger), CHECK_INTERVAL_MS);
  _activeInterval.unref();
  logger.info({ ttlMinutes }, "[flight:expiry] scheduler started");
}

export function stopAlertExpiryScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[flight:expiry] scheduler stopped");
  }
}
