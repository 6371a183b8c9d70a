/**
 * Island Warden — src/features/flight/roster.ts
 * WHAT: Builds the cleared-traveler roster from member nicknames.
 * WHY: Members link their game identity by nickname, "IGN | Island", with "/"
 *      between alternatives ("Kit/Kat | Aruga/Bonita").
 * FLOWS:
 *  - parseMemberNick(displayName) → { igns, islands }
 *  - rosterKeysFor(displayName) → traveler keys one member clears (registry.syncMember())
 *  - buildRoster(members) → keys per member id for registry.replaceRoster()
 *  - memberMatchesIgn(displayName, ign) → used to find a moderation target
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { cleanText } from "../../lib/text.js";

export interface ParsedNick {
  igns: string[];
  islands: string[];
}

function splitOptions(raw: string): string[] {
  return raw
    .split("/")
    .map((part) => cleanText(part.trim()))
    .filter((part) => part.length > 0);
}

/**
 * Nicknames without a "|" carry no game identity.
 * Everything after the first "|" is the island part, so "Kit | Aruga | Bonita"
 * lists both islands' text in one chunk.
 */
export function parseMemberNick(displayName: string | null | undefined): ParsedNick {
  if (!displayName || !displayName.includes("|")) return { igns: [], islands: [] };

  const chunks = displayName
    .split("|")
    .map((c) => c.trim())
    .filter(Boolean);
  if (chunks.length === 0) return { igns: [], islands: [] };

  return {
    igns: splitOptions(chunks[0]),
    islands: chunks.length > 1 ? splitOptions(chunks.slice(1).join(" | ")) : [],
  };
}

/**
 * Every key a member's nickname clears:
 *  - "<ign>@" for feed lines with no readable origin
 *  - "<ign>@<island>" for each IGN and island pair
 */
export function rosterKeysFor(displayName: string | null | undefined): Set<string> {
  const keys = new Set<string>();
  const { igns, islands } = parseMemberNick(displayName);
  for (const ign of igns) {
    keys.add(`${ign}@`);
    for (const island of islands) keys.add(`${ign}@${island}`);
  }
  return keys;
}

export interface RosterMember {
  id: string;
  displayName: string;
}

/** Members whose nickname clears nothing are left out. */
export function buildRoster(members: Iterable<RosterMember>): Map<string, Set<string>> {
  const roster = new Map<string, Set<string>>();
  for (const member of members) {
    const keys = rosterKeysFor(member.displayName);
    if (keys.size > 0) roster.set(member.id, keys);
  }
  return roster;
}

export function memberMatchesIgn(displayName: string, ign: string): boolean {
  return parseMemberNick(displayName).igns.includes(ign);
}
