/**
 * Island Warden — src/features/notify/templates.ts
 * WHAT: Message templates keyed by notification kind.
 * WHY: Both subsystems describe what happened; only this file decides how it reads.
 * FLOWS: renderNotification(notification) → OutboundMessage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { discordRelative } from "../../lib/time.js";
import { titleCase } from "../../lib/text.js";
import { DECISIONS } from "../flight/types.js";
import type { Alert, AlertOutcome, Decision, Identity, ModerationKind, ModerationRecord } from "../flight/types.js";

/** Interactive part of a message: one button per decision. */
export interface DecisionPrompt {
  alertId: string;
  decisions: readonly Decision[];
}

/** Platform-neutral message. Adapters decide how title and prompt render. */
export interface OutboundMessage {
  text: string;
  title?: string;
  /** Embed accent; adapters may ignore it */
  tone?: "alert" | "success" | "neutral";
  prompt?: DecisionPrompt;
  /** Explicitly strip any prompt left on an edited message */
  clearPrompt?: boolean;
}

export interface ActionSummary {
  kind: ModerationKind;
  identity: Identity;
  staffId: string;
  reason: string | null;
  /** False when the target had already left and only the record was written */
  targetPresent: boolean;
  dmDelivered: boolean;
}

export type Notification =
  | { kind: "arrival-alert"; alert: Alert; islandLabel: string; history: readonly ModerationRecord[] }
  | { kind: "alert-resolved"; alert: Alert; islandLabel: string }
  | { kind: "action-summary"; summary: ActionSummary }
  | { kind: "island-down"; island: string }
  | { kind: "island-up"; island: string }
  | { kind: "island-refreshing"; island: string };

export type NotificationKind = Notification["kind"];

const MODERATION_KINDS: readonly ModerationKind[] = ["warn", "kick", "ban"];

const ACTION_VERB: Record<ModerationKind, string> = {
  warn: "warned",
  kick: "kicked",
  ban: "banned",
};

const OUTCOME_LABEL: Record<AlertOutcome, string> = {
  admit: "Admitted",
  warn: "Warned",
  kick: "Kicked",
  ban: "Banned",
  departed: "Left before a decision",
  expired: "Expired without a decision",
  undelivered: "Prompt could not be posted",
};

function travelerLine(displayName: string, originIsland: string): string {
  const origin = originIsland ? titleCase(originIsland) : "an unknown island";
  return `Traveler **\`${displayName}\`** from **\`${origin}\`**`;
}

/** "2 warns, 1 kick" */
function historyLine(history: readonly ModerationRecord[]): string | null {
  if (history.length === 0) return null;
  const counts: Record<ModerationKind, number> = { warn: 0, kick: 0, ban: 0 };
  for (const record of history) counts[record.kind]++;
  const parts = MODERATION_KINDS.filter((k) => counts[k] > 0).map(
    (k) => `${counts[k]} ${k}${counts[k] === 1 ? "" : "s"}`
  );
  return `Prior actions: ${parts.join(", ")}`;
}

export function renderNotification(notification: Notification): OutboundMessage {
  switch (notification.kind) {
    case "arrival-alert": {
      const { alert, islandLabel, history } = notification;
      const lines = [
        `${travelerLine(alert.displayName, alert.originIsland)} is not linked. ` +
          `Check if this is a member or they didn't change their nickname.`,
        `Arrived ${discordRelative(alert.createdAt)}`,
      ];
      const prior = historyLine(history);
      if (prior) lines.push(prior);
      return {
        title: `Unknown traveler in ${islandLabel}`,
        text: lines.join("\n"),
        tone: "alert",
        prompt: { alertId: alert.id, decisions: DECISIONS },
      };
    }

    case "alert-resolved": {
      const { alert, islandLabel } = notification;
      const outcome = alert.outcome ? OUTCOME_LABEL[alert.outcome] : "Resolved";
      const by = alert.resolverId ? ` by <@${alert.resolverId}>` : "";
      return {
        title: `Traveler in ${islandLabel}: ${outcome}`,
        text: `${travelerLine(alert.displayName, alert.originIsland)}\n${outcome}${by}`,
        tone: alert.outcome === "admit" ? "success" : "neutral",
        clearPrompt: true,
      };
    }

    case "action-summary": {
      const { kind, identity, staffId, reason, targetPresent, dmDelivered } = notification.summary;
      const who = travelerLine(identity.displayName, identity.originIsland);
      const lines = [`${who} was ${ACTION_VERB[kind]} by <@${staffId}>.`];
      if (reason) lines.push(`Reason: ${reason}`);
      if (!targetPresent) lines.push("Target had already left; recorded only.");
      else if (!dmDelivered) lines.push("Direct notice could not be delivered.");
      return { title: `Flight ${kind}`, text: lines.join("\n"), tone: "neutral" };
    }

    case "island-down":
      return { text: `${notification.island} island is currently down.` };

    case "island-up":
      return { text: `${notification.island} island is back online!` };

    case "island-refreshing":
      return { text: `${notification.island} island is refreshing.` };
  }
}

/** Direct notice sent to a traveler after a moderation action. */
export function directNotice(kind: ModerationKind, reason: string | null): string {
  const base: Record<ModerationKind, string> = {
    warn: "You have been warned by island staff and your island access has been removed.",
    kick: "You have been removed from the server by island staff.",
    ban: "You have been banned from the server by island staff.",
  };
  return reason ? `${base[kind]}\nReason: ${reason}` : base[kind];
}
