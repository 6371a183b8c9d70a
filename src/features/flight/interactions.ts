/**
 * Island Warden — src/features/flight/interactions.ts
 * WHAT: Button and modal handlers for flight alert cards.
 * WHY: Thin adapter: parse the component id, collect an optional reason,
 *      call FlightLogger.resolve(), report the outcome privately to the clicker.
 * FLOWS:
 *  - Admit button → resolve immediately
 *  - Warn/Kick/Ban button → reason modal → resolve on submit
 *  - Late click → ephemeral "already handled"
 * DOCS:
 *  - ModalSubmitInteraction: https://discord.js.org/#/docs/discord.js/main/class/ModalSubmitInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  MessageFlags,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
  type ButtonInteraction,
  type ModalSubmitInteraction,
} from "discord.js";
import { logger } from "../../lib/logger.js";
import { captureException } from "../../lib/sentry.js";
import { ActionError, AlreadyResolvedError, actionErrorMessage } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import { flightModalId, parseFlightButton, parseFlightModal } from "./card.js";
import { decisionBudgetMs, type Applied } from "./executor.js";
import { AlertNotFoundError, type FlightLogger } from "./flightLogger.js";
import type { KnownEntityRegistry } from "./registry.js";
import type { Decision, ModerationKind } from "./types.js";

const REASON_INPUT_ID = "v1:modal:flight:reason";
const MAX_REASON = 500;

export interface FlightInteractionDeps {
  flightLogger: FlightLogger;
  registry: KnownEntityRegistry;
}

/**
 * Event deadline for a flight interaction: the decision itself plus the
 * deferred reply, the card revise and the final reply.
 */
export function flightInteractionBudgetMs(callTimeoutMs: number): number {
  return decisionBudgetMs(callTimeoutMs) + 3 * callTimeoutMs;
}

const PAST_TENSE: Record<Decision, string> = {
  admit: "Admitted",
  warn: "Warned",
  kick: "Kicked",
  ban: "Banned",
};

const MODAL_TITLE: Record<ModerationKind, string> = {
  warn: "Warn",
  kick: "Kick",
  ban: "Ban",
};

/** Private confirmation shown to the staff member who decided. */
export function describeApplied(applied: Applied): string {
  const lines = [`${PAST_TENSE[applied.decision]} \`${applied.alert.displayName}\`.`];
  if (applied.decision !== "admit") {
    if (!applied.targetPresent) {
      lines.push("No matching member is in the server; the action was recorded only.");
    } else if (!applied.dmDelivered) {
      lines.push("Their DMs are closed, so no notice was delivered.");
    }
    if (!applied.summaryPosted) lines.push("The moderation log post failed; check the log channel.");
  }
  return lines.join("\n");
}

export function describeAlreadyResolved(err: AlreadyResolvedError): string {
  const by = err.resolverId ? ` by <@${err.resolverId}>` : "";
  return `Already handled (${err.outcome ?? "resolved"}${by}).`;
}

function describeResult(result: Result<Applied, ActionError>): string {
  return result.ok ? describeApplied(result.value) : actionErrorMessage(result.error);
}

async function runDecision(
  interaction: ButtonInteraction | ModalSubmitInteraction,
  deps: FlightInteractionDeps,
  alertId: string,
  decision: Decision,
  reason: string | null
): Promise<void> {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral }).catch((err) => {
    logger.debug({ err, alertId }, "[flight] deferReply failed");
  });

  let content: string;
  try {
    const result = await deps.flightLogger.resolve(alertId, decision, interaction.user.id, reason);
    content = describeResult(result);
  } catch (err) {
    if (err instanceof AlreadyResolvedError) {
      content = describeAlreadyResolved(err);
    } else if (err instanceof AlertNotFoundError) {
      content = "This alert no longer exists.";
    } else {
      const traceId = interaction.id.slice(-8).toUpperCase();
      logger.error({ err, alertId, decision, traceId }, "[flight] decision handling failed");
      captureException(err, { area: "flightDecision", alertId, decision, traceId });
      content = `Failed to process action (trace: ${traceId}). Try again or check logs.`;
    }
  }

  await interaction.editReply({ content, allowedMentions: { parse: [] } }).catch((err) => {
    logger.debug({ err, alertId }, "[flight] decision reply failed");
  });
}

async function openReasonModal(interaction: ButtonInteraction, kind: ModerationKind, alertId: string): Promise<void> {
  const modal = new ModalBuilder()
    .setCustomId(flightModalId(kind, alertId))
    .setTitle(`${MODAL_TITLE[kind]} traveler`);
  const reasonInput = new TextInputBuilder()
    .setCustomId(REASON_INPUT_ID)
    .setLabel(`Reason (optional, max ${MAX_REASON} chars)`)
    .setRequired(false)
    .setMaxLength(MAX_REASON)
    .setStyle(TextInputStyle.Paragraph);
  modal.addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(reasonInput));

  await interaction.showModal(modal).catch((err) => {
    logger.warn({ err, alertId, kind }, "[flight] failed to show reason modal");
  });
}

export async function handleFlightButton(interaction: ButtonInteraction, deps: FlightInteractionDeps): Promise<void> {
  const parsed = parseFlightButton(interaction.customId);
  if (!parsed) return;
  const { decision, alertId } = parsed;

  if (decision === "admit") {
    await runDecision(interaction, deps, alertId, decision, null);
    return;
  }

  // Skip the modal when the decision can no longer apply
  const alert = deps.registry.getAlert(alertId);
  if (!alert || alert.status !== "pending") {
    const content = alert
      ? describeAlreadyResolved(new AlreadyResolvedError(alert.id, alert.outcome, alert.resolverId))
      : "This alert no longer exists.";
    await interaction
      .reply({ content, flags: MessageFlags.Ephemeral, allowedMentions: { parse: [] } })
      .catch((err) => {
        logger.debug({ err, alertId }, "[flight] already-resolved reply failed");
      });
    return;
  }

  await openReasonModal(interaction, decision, alertId);
}

export async function handleFlightModal(
  interaction: ModalSubmitInteraction,
  deps: FlightInteractionDeps
): Promise<void> {
  const parsed = parseFlightModal(interaction.customId);
  if (!parsed) return;

  const reasonRaw = interaction.fields.getTextInputValue(REASON_INPUT_ID) ?? "";
  const reason = reasonRaw.trim().slice(0, MAX_REASON) || null;

  await runDecision(interaction, deps, parsed.alertId, parsed.kind, reason);
}
