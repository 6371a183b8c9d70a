/**
 * Island Warden — src/features/flight/flightLogger.ts
 * WHAT: Flight logger state machine: Observed → (KnownAdmit | PendingAlert) → Resolved.
 * WHY: Platform-agnostic core behind the feed listener and the alert buttons.
 *      Nothing here knows about discord.js; adapters call in with plain events.
 * FLOWS:
 *  - handleArrival(event) → known (silent) | alerted (prompt posted) | deduplicated
 *  - resolve(alertId, decision, staffId, reason?) → ActionExecutor → card revised
 *  - handleDeparture(event) → pending alert resolved as "departed"
 *  - expireStale(now) → pending alerts past the decision window resolved as "expired"
 * NOTES:
 *  - Every operation on one traveler runs under that traveler's lock, so arrivals
 *    are handled in order and a decision never interleaves with a re-arrival.
 *    An alert belongs to exactly one traveler, which makes this the per-alert lock too.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact } from "../../lib/logger.js";
import { KeyedMutex } from "../../lib/keyedMutex.js";
import { AlreadyResolvedError, type ActionError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import { titleCase } from "../../lib/text.js";
import { nowUtc } from "../../lib/time.js";
import type { NotificationDispatcher } from "../notify/dispatcher.js";
import type { ActionExecutor, Applied } from "./executor.js";
import type { KnownEntityRegistry } from "./registry.js";
import { identityOf, type Alert, type ArrivalEvent, type Decision, type DepartureEvent } from "./types.js";

export type ArrivalOutcome =
  | { kind: "known" }
  | { kind: "deduplicated"; alert: Alert }
  | { kind: "alerted"; alert: Alert; delivered: boolean };

export interface FlightLoggerOptions {
  /** Staff channel receiving alert prompts */
  alertChannel: string;
  /** Decision window in seconds; 0 keeps alerts pending until decided or departed */
  alertTtlSeconds?: number;
  /** How an island key reads in messages (channel mention, display name) */
  islandLabel?: (islandKey: string) => string;
}

export class AlertNotFoundError extends Error {
  readonly kind = "alert_not_found" as const;
  constructor(readonly alertId: string) {
    super(`Alert ${alertId} not found`);
    this.name = "AlertNotFoundError";
  }
}

export class FlightLogger {
  private readonly locks = new KeyedMutex();
  private readonly alertTtlSeconds: number;
  private readonly islandLabel: (islandKey: string) => string;

  constructor(
    private readonly registry: KnownEntityRegistry,
    private readonly executor: ActionExecutor,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: FlightLoggerOptions
  ) {
    this.alertTtlSeconds = options.alertTtlSeconds ?? 0;
    this.islandLabel = options.islandLabel ?? ((key) => titleCase(key));
  }

  async handleArrival(event: ArrivalEvent): Promise<ArrivalOutcome> {
    return this.locks.runExclusive(event.identityId, async () => {
      if (this.registry.isKnown(event.identityId)) {
        logger.debug({ evt: "flight_known", identityId: event.identityId }, "[flight] known traveler");
        return { kind: "known" } as const;
      }

      const existing = this.registry.pendingAlertFor(event.identityId);
      if (existing) {
        logger.debug({ evt: "flight_dedup", alertId: existing.id }, "[flight] arrival absorbed by pending alert");
        return { kind: "deduplicated", alert: existing } as const;
      }

      const alert = this.registry.openAlert(event);
      if (!alert) {
        const pending = this.registry.pendingAlertFor(event.identityId);
        if (!pending) throw new Error(`Alert for ${event.identityId} neither opened nor pending`);
        return { kind: "deduplicated", alert: pending } as const;
      }

      logger.warn(
        {
          evt: "flight_unknown",
          alertId: alert.id,
          traveler: redact(event.displayName),
          origin: redact(event.originIsland),
          island: event.islandKey,
        },
        "[flight] unknown traveler"
      );

      const posted = await this.dispatcher.notify(this.options.alertChannel, {
        kind: "arrival-alert",
        alert,
        islandLabel: this.islandLabel(alert.islandKey),
        history: this.registry.historyOf(alert.identityId),
      });

      if (!posted.ok) {
        // Staff never saw it; close it so the next arrival can alert again
        const closed = this.registry.resolveAlert(alert.id, "undelivered", null);
        return { kind: "alerted", alert: closed, delivered: false } as const;
      }

      this.registry.attachAlertMessage(alert.id, posted.value.channelRef, posted.value.messageId);
      const attached = this.registry.getAlert(alert.id) ?? alert;
      return { kind: "alerted", alert: attached, delivered: true } as const;
    });
  }

  /**
   * Single entry point for staff decisions.
   * @throws AlreadyResolvedError when another decision (or departure/expiry) got there first
   * @throws AlertNotFoundError for an id that was never issued
   */
  async resolve(
    alertId: string,
    decision: Decision,
    staffId: string,
    reason?: string | null
  ): Promise<Result<Applied, ActionError>> {
    const initial = this.registry.getAlert(alertId);
    if (!initial) throw new AlertNotFoundError(alertId);

    return this.locks.runExclusive(initial.identityId, async () => {
      const alert = this.registry.getAlert(alertId);
      if (!alert) throw new AlertNotFoundError(alertId);
      if (alert.status !== "pending") {
        logger.info(
          { evt: "flight_late_decision", alertId, decision, staffId, outcome: alert.outcome },
          "[flight] decision on resolved alert"
        );
        throw new AlreadyResolvedError(alert.id, alert.outcome, alert.resolverId);
      }

      const result = await this.executor.apply(decision, identityOf(alert), staffId, { alertId, reason });
      if (result.ok) await this.reviseCard(result.value.alert);
      return result;
    });
  }

  /** Traveler left before anyone decided. Returns the closed alert, if any. */
  async handleDeparture(event: DepartureEvent): Promise<Alert | null> {
    return this.locks.runExclusive(event.identityId, async () => {
      const pending = this.registry.pendingAlertFor(event.identityId);
      if (!pending) return null;
      if (event.islandKey && pending.islandKey && event.islandKey !== pending.islandKey) return null;

      const closed = this.registry.resolveAlert(pending.id, "departed", null);
      logger.info({ evt: "flight_departed", alertId: closed.id }, "[flight] traveler left before a decision");
      await this.reviseCard(closed);
      return closed;
    });
  }

  /** Close alerts older than the decision window. No-op when the window is 0. */
  async expireStale(now: number = nowUtc()): Promise<Alert[]> {
    if (this.alertTtlSeconds <= 0) return [];

    const expired: Alert[] = [];
    for (const stale of this.registry.listPendingAlerts(now - this.alertTtlSeconds)) {
      const closed = await this.locks.runExclusive(stale.identityId, async () => {
        // A decision may have landed while we waited for the lock
        const current = this.registry.getAlert(stale.id);
        if (!current || current.status !== "pending") return null;
        return this.registry.resolveAlert(stale.id, "expired", null);
      });
      if (closed) {
        await this.reviseCard(closed);
        expired.push(closed);
      }
    }

    if (expired.length > 0) {
      logger.info({ evt: "flight_expired", count: expired.length }, "[flight] expired stale alerts");
    }
    return expired;
  }

  private async reviseCard(alert: Alert): Promise<void> {
    if (!alert.channelId || !alert.messageId) return;
    await this.dispatcher.revise(alert.channelId, alert.messageId, {
      kind: "alert-resolved",
      alert,
      islandLabel: this.islandLabel(alert.islandKey),
    });
  }
}
