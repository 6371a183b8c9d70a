/**
 * Island Warden — src/features/islandStatus/discordProbe.ts
 * WHAT: IslandProbe over Discord: island bot presence plus recent channel messages.
 * WHY: Each island runs a bot member named "<prefix> <Island>" under one shared role.
 *      Its presence is the cheapest liveness signal; channel messages cover
 *      islands whose bot cannot be identified.
 * FLOWS: probe(island) → find bot → fetch recent messages → classifyActivity()
 * DOCS:
 *  - GuildMember.presence: https://discord.js.org/docs/packages/discord.js/main/GuildMember:Class#presence
 *  - Requires the GuildPresences and GuildMembers intents.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember } from "discord.js";
import { cleanText } from "../../lib/text.js";
import { classifyActivity, type BotPresence, type ChannelMessage, type IslandProbe } from "./probe.js";
import type { MonitoredIsland, ProbeResult } from "./types.js";

export interface DiscordProbeOptions {
  /** Shared role of all island bots; without it only message scanning is used */
  botRoleId?: string;
  botNamePrefix: string;
  hostName: string;
  /** Messages scanned per probe (default: 30) */
  historyLimit?: number;
}

function presenceOf(member: GuildMember): BotPresence {
  const status = member.presence?.status;
  switch (status) {
    case "online":
    case "idle":
    case "dnd":
      return status;
    default:
      // invisible and missing presence look the same to us
      return "offline";
  }
}

export class DiscordIslandProbe implements IslandProbe {
  constructor(
    private readonly guild: Guild,
    private readonly options: DiscordProbeOptions
  ) {}

  async probe(island: MonitoredIsland, signal: AbortSignal): Promise<ProbeResult> {
    const bot = this.findIslandBot(island);
    if (bot) {
      const presence = presenceOf(bot);
      if (presence !== "online" && presence !== "idle") {
        return { state: classifyActivity({ bot: { id: bot.id, presence }, messages: [] }, this.options.hostName) };
      }
    }

    const messages = await this.recentMessages(island.channelId, signal);
    const activity = {
      bot: bot ? { id: bot.id, presence: presenceOf(bot) } : null,
      messages,
    };
    return { state: classifyActivity(activity, this.options.hostName) };
  }

  private findIslandBot(island: MonitoredIsland): GuildMember | null {
    if (!this.options.botRoleId) return null;
    const role = this.guild.roles.cache.get(this.options.botRoleId);
    if (!role) return null;

    // Bot names use decorative Unicode; compare cleaned forms
    const target = cleanText(`${this.options.botNamePrefix} ${island.displayName}`);
    return role.members.find((m) => m.user.bot && cleanText(m.displayName) === target) ?? null;
  }

  private async recentMessages(channelId: string, signal: AbortSignal): Promise<ChannelMessage[]> {
    const channel = this.guild.channels.cache.get(channelId) ?? (await this.guild.channels.fetch(channelId));
    signal.throwIfAborted();
    if (!channel || !channel.isTextBased()) {
      throw new Error(`Channel ${channelId} is missing or not text-based`);
    }

    const fetched = await channel.messages.fetch({ limit: this.options.historyLimit ?? 30 });
    signal.throwIfAborted();

    return [...fetched.values()]
      .sort((a, b) => b.createdTimestamp - a.createdTimestamp)
      .map((m) => ({ authorId: m.author.id, authorIsBot: m.author.bot, content: m.content }));
  }
}
