/**
 * Island Warden — src/features/flight/card.ts
 * WHAT: Discord rendering of outbound messages (alert cards, summaries) and the
 *       component ids used by their buttons and reason modals.
 * WHY: The core speaks OutboundMessage; this is the only place that knows about
 *      embeds and buttons.
 * FLOWS:
 *  - toMessagePayload(message) → { content, embeds, components, allowedMentions }
 *  - flightButtonId / parseFlightButton: v1:flight:<decision>:<alertId>
 *  - flightModalId / parseFlightModal:  v1:modal:flight:<kind>:<alertId>
 * DOCS:
 *  - Discord Embeds: https://discord.js.org/#/docs/discord.js/main/class/EmbedBuilder
 *  - Action Rows: https://discord.js.org/#/docs/discord.js/main/class/ActionRowBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from "discord.js";
import type { OutboundMessage } from "../notify/templates.js";
import type { Decision, ModerationKind } from "./types.js";

// Alert ids are ULIDs (Crockford base32, 26 chars)
const ULID = "[0-9A-HJKMNP-TV-Z]{26}";

export const BTN_FLIGHT_RE = new RegExp(`^v1:flight:(admit|warn|kick|ban):(${ULID})$`);
export const MODAL_FLIGHT_RE = new RegExp(`^v1:modal:flight:(warn|kick|ban):(${ULID})$`);

const TONE_COLOR = {
  alert: 0xff0000,
  success: 0x57f287,
  neutral: 0x5865f2,
} as const;

const BUTTONS: Record<Decision, { label: string; style: ButtonStyle }> = {
  admit: { label: "Admit", style: ButtonStyle.Success },
  warn: { label: "Warn", style: ButtonStyle.Primary },
  kick: { label: "Kick", style: ButtonStyle.Secondary },
  ban: { label: "Ban", style: ButtonStyle.Danger },
};

export function flightButtonId(decision: Decision, alertId: string): string {
  return `v1:flight:${decision}:${alertId}`;
}

export function flightModalId(kind: ModerationKind, alertId: string): string {
  return `v1:modal:flight:${kind}:${alertId}`;
}

function isModerationKind(value: string): value is ModerationKind {
  return value === "warn" || value === "kick" || value === "ban";
}

export function parseFlightButton(customId: string): { decision: Decision; alertId: string } | null {
  const match = BTN_FLIGHT_RE.exec(customId);
  if (!match) return null;
  const [, decision, alertId] = match;
  if (decision === "admit") return { decision, alertId };
  return isModerationKind(decision) ? { decision, alertId } : null;
}

export function parseFlightModal(customId: string): { kind: ModerationKind; alertId: string } | null {
  const match = MODAL_FLIGHT_RE.exec(customId);
  if (!match) return null;
  const [, kind, alertId] = match;
  return isModerationKind(kind) ? { kind, alertId } : null;
}

export interface MessagePayload {
  content: string | undefined;
  embeds: EmbedBuilder[];
  components?: ActionRowBuilder<ButtonBuilder>[];
  allowedMentions: { parse: [] };
}

/**
 * Titled messages become embeds; plain ones (island notices) stay text.
 * Mentions in the text never ping.
 */
export function toMessagePayload(message: OutboundMessage): MessagePayload {
  const payload: MessagePayload = {
    content: undefined,
    embeds: [],
    allowedMentions: { parse: [] },
  };

  if (message.title) {
    payload.embeds.push(
      new EmbedBuilder()
        .setTitle(message.title.slice(0, 256))
        .setDescription(message.text.slice(0, 4096))
        .setColor(TONE_COLOR[message.tone ?? "neutral"])
        .setTimestamp()
    );
  } else {
    payload.content = message.text;
  }

  if (message.prompt) {
    const { alertId, decisions } = message.prompt;
    const buttons = decisions.map((d) =>
      new ButtonBuilder().setCustomId(flightButtonId(d, alertId)).setLabel(BUTTONS[d].label).setStyle(BUTTONS[d].style)
    );
    payload.components = [new ActionRowBuilder<ButtonBuilder>().addComponents(buttons)];
  } else if (message.clearPrompt) {
    payload.components = [];
  }

  return payload;
}
