/**
 * Island Warden — src/commands/islands.ts
 * WHAT: /islands slash command listing the confirmed status of every sub island.
 * WHY: Read-only status surface; reports what the monitor last confirmed, never a fresh probe.
 * FLOWS:
 *  - tracker.snapshot(key) per island → grouped report → embed
 *  - islands whose channel was not found are listed too; the fleet total counts them
 *  - last line: status loop health, so a stalled monitor is not read as a quiet fleet
 * DOCS:
 *  - Discord.js SlashCommandBuilder: https://discord.js.org/docs/packages/builders
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder, EmbedBuilder, type ChatInputCommandInteraction } from "discord.js";
import { describeSchedulerHealth, schedulerHealth } from "../lib/schedulerHealth.js";
import type { StatusTracker } from "../features/islandStatus/tracker.js";
import type { IslandState, MonitoredIsland } from "../features/islandStatus/types.js";

export const data = new SlashCommandBuilder()
  .setName("islands")
  .setDescription("Check the status of all sub islands.")
  .setDMPermission(false);

export interface IslandsCommandDeps {
  islands: readonly MonitoredIsland[];
  /** Display names of configured islands with no channel */
  unresolved: readonly string[];
  tracker: StatusTracker;
}

type ReportGroup = IslandState | "no_channel";

export interface IslandStatusReport {
  summary: string;
  /** Status loop health line */
  monitor: string;
  groups: Record<ReportGroup, string[]>;
}

const GROUP_TITLES: ReadonlyArray<readonly [ReportGroup, string]> = [
  ["online", "Online"],
  ["refreshing", "Refreshing"],
  ["offline", "Offline"],
  ["unknown", "Not checked yet"],
  ["no_channel", "Channel not found"],
];

export function buildIslandStatusReport(
  islands: readonly MonitoredIsland[],
  tracker: StatusTracker,
  unresolved: readonly string[] = []
): IslandStatusReport {
  const groups: Record<ReportGroup, string[]> = {
    online: [],
    offline: [],
    refreshing: [],
    unknown: [],
    no_channel: [...unresolved],
  };
  for (const island of islands) {
    groups[tracker.snapshot(island.key).state].push(`<#${island.channelId}>`);
  }
  const total = islands.length + unresolved.length;
  return {
    summary: `${groups.online.length}/${total} online`,
    monitor: describeSchedulerHealth(schedulerHealth("islandStatus")),
    groups,
  };
}

export async function execute(interaction: ChatInputCommandInteraction, deps: IslandsCommandDeps): Promise<void> {
  const report = buildIslandStatusReport(deps.islands, deps.tracker, deps.unresolved);
  const total = deps.islands.length + deps.unresolved.length;

  const embed = new EmbedBuilder()
    .setTitle("Sub Island Status")
    .setDescription(`**${report.summary}**\n${report.monitor}`)
    .setColor(report.groups.online.length === total ? 0x57f287 : 0xfee75c)
    .setTimestamp();

  for (const [state, title] of GROUP_TITLES) {
    const lines = report.groups[state];
    if (lines.length === 0) continue;
    embed.addFields({ name: `${title} (${lines.length})`, value: lines.join("\n").slice(0, 1024) });
  }

  await interaction.reply({ embeds: [embed] });
}
