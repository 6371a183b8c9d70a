/**
 * Island Warden — src/features/islandStatus/islands.ts
 * WHAT: Loads the authoritative island list and resolves each island's channel.
 * WHY: The fleet is fixed configuration; channels may be pinned in the file or
 *      found by name in the guild at startup.
 * FLOWS:
 *  - loadIslandConfig(path) → read JSON → zod validate → IslandConfig[]
 *  - resolveIslandChannels(configs, channels) → MonitoredIsland[] (+ unresolved names)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFileSync } from "node:fs";
import { z } from "zod";
import { cleanText } from "../../lib/text.js";
import type { MonitoredIsland } from "./types.js";

const islandSchema = z.object({
  name: z.string().trim().min(1),
  channelId: z
    .string()
    .regex(/^\d{17,20}$/, "channelId must be a Discord snowflake")
    .optional(),
});

const fileSchema = z
  .object({ islands: z.array(islandSchema).min(1) })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.islands.forEach((island, index) => {
      const key = cleanText(island.name);
      const path = ["islands", index, "name"];
      if (!key) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: "name has no letters or digits" });
      } else if (seen.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `duplicate island "${island.name}"` });
      }
      seen.add(key);
    });
  });

export interface IslandConfig {
  key: string;
  displayName: string;
  channelId: string | null;
}

export class IslandConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IslandConfigError";
  }
}

export function parseIslandConfig(raw: unknown): IslandConfig[] {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new IslandConfigError(`Invalid island list:\n${issues}`);
  }
  return parsed.data.islands.map((island) => ({
    key: cleanText(island.name),
    displayName: island.name,
    channelId: island.channelId ?? null,
  }));
}

export function loadIslandConfig(filePath: string): IslandConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new IslandConfigError(`Cannot read island list at ${filePath}`, { cause: err });
  }
  return parseIslandConfig(raw);
}

/**
 * Pinned channel ids win. Otherwise the first text channel whose cleaned name
 * contains the island key ("🏝️・alapaap" → alapaap) is used.
 */
export function resolveIslandChannels(
  configs: readonly IslandConfig[],
  channels: ReadonlyArray<{ id: string; name: string }>
): { islands: MonitoredIsland[]; unresolved: string[] } {
  const islands: MonitoredIsland[] = [];
  const unresolved: string[] = [];

  for (const config of configs) {
    const channelId =
      config.channelId ?? channels.find((ch) => cleanText(ch.name).includes(config.key))?.id ?? null;
    if (channelId) {
      islands.push({ key: config.key, displayName: config.displayName, channelId });
    } else {
      unresolved.push(config.displayName);
    }
  }

  return { islands, unresolved };
}
