/**
 * Island Warden — src/features/islandStatus/probe.ts
 * WHAT: Probe contract for the poll scheduler, plus the rules that turn an
 *       island channel's recent activity into a state.
 * FLOWS: classifyActivity(activity, hostName) → online | offline | refreshing
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MonitoredIsland, ObservedState, ProbeResult } from "./types.js";

/**
 * One liveness check. Implementations should stop early when `signal` aborts;
 * the scheduler enforces its own deadline regardless.
 */
export interface IslandProbe {
  probe(island: MonitoredIsland, signal: AbortSignal): Promise<ProbeResult>;
}

export type BotPresence = "online" | "idle" | "dnd" | "offline";

export interface ChannelMessage {
  authorId: string;
  authorIsBot: boolean;
  content: string;
}

export interface ChannelActivity {
  /** The island's own bot member, when one could be identified */
  bot: { id: string; presence: BotPresence } | null;
  /** Newest first */
  messages: readonly ChannelMessage[];
}

// Dodo codes: 5 chars, uppercase letters and digits, never I or O
export const DODO_CODE_RE = /\b[A-HJ-NP-Z0-9]{5}\b/;
const REFRESH_RE = /refresh/i;

/**
 * - Known bot, online or idle: refreshing when its latest message says so, otherwise online.
 * - Known bot, anything else: offline.
 * - No known bot: online when a recent bot message shows a dodo code or the host's name.
 */
export function classifyActivity(activity: ChannelActivity, hostName: string): ObservedState {
  const { bot, messages } = activity;

  if (bot) {
    if (bot.presence !== "online" && bot.presence !== "idle") return "offline";
    const latest = messages.find((m) => m.authorId === bot.id);
    return latest && REFRESH_RE.test(latest.content) ? "refreshing" : "online";
  }

  const host = hostName.toLowerCase();
  const active = messages.some(
    (m) => m.authorIsBot && (DODO_CODE_RE.test(m.content) || m.content.toLowerCase().includes(host))
  );
  return active ? "online" : "offline";
}
