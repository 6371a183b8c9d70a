/**
 * Island Warden — src/lib/commandSync.ts
 * WHAT: Registers slash commands for the home guild at startup.
 * WHY: Guild-scoped commands update instantly; the bot only ever serves one guild.
 * FLOWS: buildCommands() → REST PUT applicationGuildCommands → verify names present
 * DOCS:
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { REST, Routes } from "discord.js";
import { buildCommands } from "../commands/buildCommands.js";
import { logger } from "./logger.js";

export interface CommandSyncOptions {
  token: string;
  appId: string;
  guildId: string;
}

export async function syncGuildCommands({ token, appId, guildId }: CommandSyncOptions): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(token);
  const commands = buildCommands();

  await rest.put(Routes.applicationGuildCommands(appId, guildId), { body: commands });

  // rest.get() is untyped; narrow instead of trusting the shape
  const existing: unknown = await rest.get(Routes.applicationGuildCommands(appId, guildId));
  const names = Array.isArray(existing)
    ? existing.flatMap((cmd: unknown) =>
        cmd && typeof cmd === "object" && "name" in cmd && typeof cmd.name === "string" ? [cmd.name] : []
      )
    : [];
  const missing = commands.map((c) => c.name).filter((n) => !names.includes(n));

  if (missing.length > 0) {
    logger.warn({ guildId, missing }, "[commands] some commands missing after sync");
  } else {
    logger.info({ guildId, count: commands.length }, "[commands] guild commands synced");
  }
}
