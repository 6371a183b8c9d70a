// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// scripts/deploy-commands.ts PUTs the result to the guild.
//
// GOTCHA: Discord caches slash commands. After adding or removing commands here,
// re-run the deploy script. Guild-scoped commands update instantly.

import { data as islandsData } from "./islands.js";
import { data as flighthistoryData } from "./flighthistory.js";

export function buildCommands() {
  return [islandsData.toJSON(), flighthistoryData.toJSON()];
}
