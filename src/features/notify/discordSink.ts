/**
 * Island Warden — src/features/notify/discordSink.ts
 * WHAT: ChannelSink over Discord text channels.
 * FLOWS: postMessage(channelId, msg) → channel.send(payload); editMessage → message.edit(payload)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client, SendableChannels } from "discord.js";
import { toMessagePayload } from "../flight/card.js";
import type { ChannelSink } from "./dispatcher.js";
import type { OutboundMessage } from "./templates.js";

export class DiscordChannelSink implements ChannelSink {
  constructor(private readonly client: Client) {}

  async postMessage(channelRef: string, message: OutboundMessage): Promise<{ messageId: string | null }> {
    const channel = await this.sendable(channelRef);
    const sent = await channel.send(toMessagePayload(message));
    return { messageId: sent.id };
  }

  async editMessage(channelRef: string, messageId: string, message: OutboundMessage): Promise<void> {
    const channel = await this.sendable(channelRef);
    await channel.messages.edit(messageId, toMessagePayload(message));
  }

  private async sendable(channelRef: string): Promise<SendableChannels> {
    const channel = this.client.channels.cache.get(channelRef) ?? (await this.client.channels.fetch(channelRef));
    if (!channel || !channel.isSendable()) {
      throw new Error(`Channel ${channelRef} is missing or not sendable`);
    }
    return channel;
  }
}
