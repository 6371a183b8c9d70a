/**
 * Island Warden — src/features/flight/feed.ts
 * WHAT: Parses island-bot feed lines into arrival and departure events.
 * WHY: Island bots announce every visitor in a listen channel as plain text,
 *      e.g. "[12:01] ✈️ Kit from Aruga is joining Alapaap."
 * FLOWS: parseFeedLine(content, timestamp) → FeedEvent | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { cleanText } from "../../lib/text.js";
import type { ArrivalEvent, DepartureEvent } from "./types.js";

// "[time] <emoji> <ign> from <origin> is joining <destination>."
const JOIN_RE = /\[.*?\]\s*.*?\s+(.*?)\s+from\s+(.*?)\s+is joining\s+(.*?)(?:\.|$)/i;
const LEAVE_RE = /\[.*?\]\s*.*?\s+(.*?)\s+from\s+(.*?)\s+is leaving\s+(.*?)(?:\.|$)/i;

export type FeedEvent =
  | { kind: "arrival"; event: ArrivalEvent; destination: string }
  | { kind: "departure"; event: DepartureEvent; destination: string };

/**
 * Traveler key: cleaned IGN and origin island joined by "@".
 * Returns null when the IGN cleans to nothing.
 */
export function travelerKey(ign: string, origin: string): string | null {
  const name = cleanText(ign);
  if (!name) return null;
  return `${name}@${cleanText(origin)}`;
}

/** Split a traveler key back into its IGN and origin parts. */
export function splitTravelerKey(identityId: string): { ign: string; origin: string } {
  const at = identityId.lastIndexOf("@");
  if (at === -1) return { ign: identityId, origin: "" };
  return { ign: identityId.slice(0, at), origin: identityId.slice(at + 1) };
}

export function parseFeedLine(content: string, timestamp: number): FeedEvent | null {
  const join = JOIN_RE.exec(content);
  if (join) {
    const [, ignRaw, originRaw, destRaw] = join;
    const ign = ignRaw.trim();
    const origin = originRaw.trim();
    const destination = destRaw.trim();
    const identityId = travelerKey(ign, origin);
    if (!identityId) return null;
    return {
      kind: "arrival",
      destination,
      event: {
        identityId,
        displayName: ign,
        originIsland: origin,
        islandKey: cleanText(destination),
        timestamp,
      },
    };
  }

  const leave = LEAVE_RE.exec(content);
  if (leave) {
    const [, ignRaw, originRaw, destRaw] = leave;
    const identityId = travelerKey(ignRaw.trim(), originRaw.trim());
    if (!identityId) return null;
    const destination = destRaw.trim();
    return {
      kind: "departure",
      destination,
      event: { identityId, islandKey: cleanText(destination), timestamp },
    };
  }

  return null;
}
