/**
 * Island Warden — src/features/flight/executor.ts
 * WHAT: Applies a staff decision against the platform and records the outcome.
 * WHY: Keeps platform side effects, history writes and the moderation-log echo
 *      in one fixed order per decision.
 * FLOWS:
 *  - admit: registry.admit → resolve alert
 *  - warn:  revokeAccess → record + resolve → DM (best-effort) → mod-log summary
 *  - kick/ban: canRemove → DM (best-effort, once per alert) → removeFromSpace → record + resolve → summary
 * NOTES:
 *  - Kick/Ban DM first: once removed, a member shares no server with the bot and
 *    Discord refuses the DM. canRemove runs before it so no notice goes out for
 *    a removal the bot has no rights to perform.
 *  - identity_gone on check/revoke/removal still records the action (targetPresent: false).
 *  - Other ActionErrors leave the alert pending so staff can retry.
 *  - Errors that are not platform failures propagate to the caller.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { ActionError, AlreadyResolvedError } from "../../lib/errors.js";
import { err, ok, type Result } from "../../lib/result.js";
import { platformCallBudgetMs, retryPlatformCall, DEFAULT_RETRY_DELAY_MS } from "../../lib/retry.js";
import type { NotificationDispatcher } from "../notify/dispatcher.js";
import { directNotice } from "../notify/templates.js";
import type { KnownEntityRegistry } from "./registry.js";
import type { Alert, Decision, Identity, ModerationKind, ModerationRecord } from "./types.js";

/**
 * Platform operations the executor needs. Implementations throw; the executor
 * maps whatever they throw through toActionError().
 * Repeating a call whose first outcome is unknown must be harmless
 * (removing an already-removed role is not an error).
 */
export interface PlatformActions {
  /** Whether the bot may kick (or ban, when permanent) this member right now */
  canRemove(identityId: string, permanent: boolean): Promise<boolean>;
  revokeAccess(identityId: string, reason?: string): Promise<void>;
  removeFromSpace(identityId: string, permanent: boolean, reason?: string): Promise<void>;
  sendDirectMessage(identityId: string, text: string): Promise<void>;
}

export interface Applied {
  decision: Decision;
  alert: Alert;
  /** Null for admit */
  record: ModerationRecord | null;
  targetPresent: boolean;
  dmDelivered: boolean;
  summaryPosted: boolean;
}

export interface ApplyContext {
  alertId: string;
  reason?: string | null;
}

export interface ExecutorOptions {
  modLogChannel: string;
  /** Deadline per platform call (default: 10s) */
  callTimeoutMs?: number;
  /** Pause before the single retry of a transient failure (default: 250ms) */
  retryDelayMs?: number;
}

/**
 * Longest apply() can run: three platform calls (check, DM, removal), each
 * tried twice, plus the summary post.
 */
export function decisionBudgetMs(callTimeoutMs: number, retryDelayMs: number = DEFAULT_RETRY_DELAY_MS): number {
  return 3 * platformCallBudgetMs(callTimeoutMs, 2, retryDelayMs) + callTimeoutMs;
}

export class ActionExecutor {
  private readonly callTimeoutMs: number;
  private readonly retryDelayMs: number;
  // Alerts whose removal notice already went out, so a staff retry does not DM twice
  private readonly noticesSent = new Map<string, ModerationKind>();

  constructor(
    private readonly registry: KnownEntityRegistry,
    private readonly platform: PlatformActions,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: ExecutorOptions
  ) {
    this.callTimeoutMs = options.callTimeoutMs ?? 10_000;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  /**
   * Apply a decision to the alert's identity.
   * @throws AlreadyResolvedError if the alert is no longer pending; no platform call is made
   */
  async apply(
    decision: Decision,
    identity: Identity,
    staffId: string,
    ctx: ApplyContext
  ): Promise<Result<Applied, ActionError>> {
    const alert = this.registry.getAlert(ctx.alertId);
    if (!alert) throw new Error(`Alert ${ctx.alertId} not found`);
    if (alert.status !== "pending") {
      this.noticesSent.delete(alert.id);
      throw new AlreadyResolvedError(alert.id, alert.outcome, alert.resolverId);
    }

    const reason = ctx.reason ?? null;

    if (decision === "admit") {
      this.registry.admit(identity.id, staffId);
      const resolved = this.registry.resolveAlert(alert.id, "admit", staffId);
      logger.info({ evt: "flight_admit", alertId: alert.id, identityId: identity.id, staffId }, "[flight] admitted");
      return ok({
        decision,
        alert: resolved,
        record: null,
        targetPresent: true,
        dmDelivered: false,
        summaryPosted: false,
      });
    }

    return decision === "warn"
      ? this.warn(identity, staffId, alert.id, reason)
      : this.remove(decision, identity, staffId, alert.id, reason);
  }

  private async warn(
    identity: Identity,
    staffId: string,
    alertId: string,
    reason: string | null
  ): Promise<Result<Applied, ActionError>> {
    const revoked = await this.platformCall("revokeAccess", () =>
      this.platform.revokeAccess(identity.id, reason ?? undefined)
    );
    if (!revoked.ok && revoked.error.kind !== "identity_gone") {
      return this.failed("warn", identity, alertId, revoked.error);
    }
    const targetPresent = revoked.ok;

    // Revocation is complete (or moot) before anything is recorded or announced
    const { alert, record } = this.registry.resolveWithRecord(alertId, "warn", staffId, reason);
    const dmDelivered = targetPresent ? await this.notice(identity, "warn", reason) : false;
    const summaryPosted = await this.summarize("warn", identity, staffId, reason, targetPresent, dmDelivered);

    return ok({ decision: "warn", alert, record, targetPresent, dmDelivered, summaryPosted });
  }

  private async remove(
    kind: "kick" | "ban",
    identity: Identity,
    staffId: string,
    alertId: string,
    reason: string | null
  ): Promise<Result<Applied, ActionError>> {
    const permanent = kind === "ban";
    const check = await this.platformCall("canRemove", () => this.platform.canRemove(identity.id, permanent));
    if (!check.ok && check.error.kind !== "identity_gone") {
      return this.failed(kind, identity, alertId, check.error);
    }
    if (check.ok && !check.value) {
      const denied = new ActionError("permission_denied", `Missing rights to ${kind} this member`);
      return this.failed(kind, identity, alertId, denied);
    }

    let targetPresent = check.ok;
    let dmDelivered = false;
    if (targetPresent) {
      dmDelivered = await this.removalNotice(alertId, identity, kind, reason);
      const removed = await this.platformCall(kind, () =>
        this.platform.removeFromSpace(identity.id, permanent, reason ?? undefined)
      );
      if (!removed.ok && removed.error.kind !== "identity_gone") {
        return this.failed(kind, identity, alertId, removed.error);
      }
      targetPresent = removed.ok;
    }

    const { alert, record } = this.registry.resolveWithRecord(alertId, kind, staffId, reason);
    this.noticesSent.delete(alertId);
    const summaryPosted = await this.summarize(kind, identity, staffId, reason, targetPresent, dmDelivered);

    return ok({ decision: kind, alert, record, targetPresent, dmDelivered, summaryPosted });
  }

  /**
   * One platform call: bounded by a timeout, retried once when transient.
   * Platform failures come back as Err; anything else is rethrown.
   */
  private async platformCall<T>(label: string, fn: () => Promise<T>): Promise<Result<T, ActionError>> {
    try {
      return ok(
        await retryPlatformCall(fn, { label, timeoutMs: this.callTimeoutMs, retryDelayMs: this.retryDelayMs })
      );
    } catch (e) {
      if (e instanceof ActionError) return err(e);
      throw e;
    }
  }

  /** Best-effort DM. A platform failure is logged, never propagated. */
  private async notice(identity: Identity, kind: ModerationKind, reason: string | null): Promise<boolean> {
    const sent = await this.platformCall("sendDirectMessage", () =>
      this.platform.sendDirectMessage(identity.id, directNotice(kind, reason))
    );
    if (!sent.ok) {
      logger.info(
        { evt: "flight_dm_failed", identityId: identity.id, kind, errorKind: sent.error.kind },
        `[flight] direct notice not delivered: ${sent.error.message}`
      );
    }
    return sent.ok;
  }

  /** The removal notice goes out at most once per alert and decision. */
  private async removalNotice(
    alertId: string,
    identity: Identity,
    kind: ModerationKind,
    reason: string | null
  ): Promise<boolean> {
    if (this.noticesSent.get(alertId) === kind) return true;
    const delivered = await this.notice(identity, kind, reason);
    if (delivered) this.noticesSent.set(alertId, kind);
    return delivered;
  }

  private async summarize(
    kind: ModerationKind,
    identity: Identity,
    staffId: string,
    reason: string | null,
    targetPresent: boolean,
    dmDelivered: boolean
  ): Promise<boolean> {
    const result = await this.dispatcher.notify(this.options.modLogChannel, {
      kind: "action-summary",
      summary: { kind, identity, staffId, reason, targetPresent, dmDelivered },
    });
    logger.info(
      { evt: `flight_${kind}`, identityId: identity.id, staffId, targetPresent, dmDelivered, summaryPosted: result.ok },
      `[flight] ${kind} applied`
    );
    return result.ok;
  }

  private failed(
    kind: ModerationKind,
    identity: Identity,
    alertId: string,
    actionErr: ActionError
  ): Result<Applied, ActionError> {
    logger.warn(
      { evt: "flight_action_failed", kind, alertId, identityId: identity.id, errorKind: actionErr.kind },
      `[flight] ${kind} failed: ${actionErr.message}`
    );
    return err(actionErr);
  }
}
