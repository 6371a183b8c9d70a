/**
 * Island Warden — src/commands/flighthistory.ts
 * WHAT: /flighthistory slash command showing a traveler's moderation records.
 * FLOWS:
 *  - /flighthistory traveler:<ign> [origin:<island>]
 *  - travelerKey() → registry.historyOf() → ephemeral embed (oldest first)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  SlashCommandBuilder,
  EmbedBuilder,
  MessageFlags,
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
} from "discord.js";
import { travelerKey } from "../features/flight/feed.js";
import type { KnownEntityRegistry } from "../features/flight/registry.js";
import type { ModerationRecord } from "../features/flight/types.js";
import { discordRelative } from "../lib/time.js";

// Discord embed descriptions cap at 4096 chars; 25 lines stays well under
const MAX_LINES = 25;

export const data = new SlashCommandBuilder()
  .setName("flighthistory")
  .setDescription("Show warn/kick/ban history for a traveler")
  .addStringOption((opt) => opt.setName("traveler").setDescription("In-game name").setRequired(true))
  .addStringOption((opt) => opt.setName("origin").setDescription("Origin island"))
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers) // UI hint only
  .setDMPermission(false);

export interface FlightHistoryDeps {
  registry: KnownEntityRegistry;
}

export function formatHistory(records: readonly ModerationRecord[]): string {
  if (records.length === 0) return "No moderation history.";
  const shown = records.slice(-MAX_LINES);
  const lines = shown.map((r) => {
    const reason = r.reason ? ` · ${r.reason}` : "";
    return `\`#${r.id}\` **${r.kind}** by <@${r.staffId}> ${discordRelative(r.createdAt)}${reason}`;
  });
  if (records.length > shown.length) lines.unshift(`…${records.length - shown.length} older records not shown`);
  return lines.join("\n");
}

export async function execute(interaction: ChatInputCommandInteraction, deps: FlightHistoryDeps): Promise<void> {
  const traveler = interaction.options.getString("traveler", true);
  const origin = interaction.options.getString("origin") ?? "";
  const identityId = travelerKey(traveler, origin);

  if (!identityId) {
    await interaction.reply({ content: "That name has no letters or digits.", flags: MessageFlags.Ephemeral });
    return;
  }

  const records = deps.registry.historyOf(identityId);
  const embed = new EmbedBuilder()
    .setTitle(`Flight history: ${traveler}${origin ? ` from ${origin}` : ""}`)
    .setDescription(formatHistory(records))
    .setFooter({ text: `${records.length} record${records.length === 1 ? "" : "s"} · key ${identityId}` })
    .setColor(records.length > 0 ? 0xfee75c : 0x57f287);

  await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral, allowedMentions: { parse: [] } });
}
