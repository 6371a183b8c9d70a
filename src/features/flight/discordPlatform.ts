/**
 * Island Warden — src/features/flight/discordPlatform.ts
 * WHAT: PlatformActions over a Discord guild.
 * WHY: Travelers are keyed by game identity ("kit@aruga"); moderation needs the
 *      member behind it. The member is the one whose nickname lists that IGN.
 * FLOWS:
 *  - canRemove(id, permanent) → member.kickable / member.bannable
 *  - revokeAccess(id) → resolve member → roles.remove(island access role)
 *  - removeFromSpace(id, permanent) → kick, or ban when permanent
 *  - sendDirectMessage(id, text) → member.send()
 * NOTES:
 *  - No unique member match throws ActionError("identity_gone"); the executor
 *    then records the decision without a platform action.
 *  - Removing a role the member does not hold is a no-op.
 * DOCS:
 *  - GuildMember.kick: https://discord.js.org/#/docs/discord.js/main/class/GuildMember?scrollTo=kick
 *  - GuildMemberManager.ban: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberManager?scrollTo=ban
 *  - GuildMember.kickable / bannable: https://discord.js.org/#/docs/discord.js/main/class/GuildMember?scrollTo=kickable
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember } from "discord.js";
import { ActionError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import type { PlatformActions } from "./executor.js";
import { splitTravelerKey } from "./feed.js";
import { memberMatchesIgn, parseMemberNick } from "./roster.js";

export interface DiscordPlatformOptions {
  accessRoleId: string;
}

export class DiscordPlatform implements PlatformActions {
  constructor(
    private readonly guild: Guild,
    private readonly options: DiscordPlatformOptions
  ) {}

  async canRemove(identityId: string, permanent: boolean): Promise<boolean> {
    const member = await this.resolveMember(identityId);
    // Role hierarchy and the bot's own permissions, as discord.js computes them
    return permanent ? member.bannable : member.kickable;
  }

  async revokeAccess(identityId: string, reason?: string): Promise<void> {
    const member = await this.resolveMember(identityId);
    if (!member.roles.cache.has(this.options.accessRoleId)) return;
    await member.roles.remove(this.options.accessRoleId, reason);
  }

  async removeFromSpace(identityId: string, permanent: boolean, reason?: string): Promise<void> {
    const member = await this.resolveMember(identityId);
    if (permanent) {
      await this.guild.members.ban(member, { reason });
    } else {
      await member.kick(reason);
    }
  }

  async sendDirectMessage(identityId: string, text: string): Promise<void> {
    const member = await this.resolveMember(identityId);
    await member.send({ content: text });
  }

  /**
   * Prefer a member listing both the IGN and the origin island; fall back to
   * the IGN alone. Anything but exactly one candidate is treated as gone.
   */
  private async resolveMember(identityId: string): Promise<GuildMember> {
    const { ign, origin } = splitTravelerKey(identityId);
    const members = await this.guild.members.fetch();

    const byIgn = members.filter((m) => memberMatchesIgn(m.displayName, ign));
    const byBoth = origin ? byIgn.filter((m) => parseMemberNick(m.displayName).islands.includes(origin)) : byIgn;
    const candidates = byBoth.size > 0 ? byBoth : byIgn;

    const member = candidates.size === 1 ? candidates.first() : undefined;
    if (!member) {
      logger.info(
        { identityId, candidates: candidates.size },
        "[flight] no unique member for traveler"
      );
      throw new ActionError(
        "identity_gone",
        candidates.size === 0 ? "No member matches this traveler" : "Several members match this traveler"
      );
    }
    return member;
  }
}
