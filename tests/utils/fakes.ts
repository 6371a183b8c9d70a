/**
 * Island Warden — tests/utils/fakes.ts
 * WHAT: In-process stand-ins for the platform, the channel sink and island probes.
 * USAGE:
 *  const sink = new FakeSink();
 *  const dispatcher = new NotificationDispatcher(sink);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { PlatformActions } from "../../src/features/flight/executor.js";
import type { ChannelSink } from "../../src/features/notify/dispatcher.js";
import type { OutboundMessage } from "../../src/features/notify/templates.js";
import type { ArrivalEvent } from "../../src/features/flight/types.js";
import type { IslandProbe } from "../../src/features/islandStatus/probe.js";
import type { MonitoredIsland, ObservedState, ProbeResult } from "../../src/features/islandStatus/types.js";

// ===== Channel sink =====

export interface PostedMessage {
  channelRef: string;
  messageId: string;
  message: OutboundMessage;
}

export class FakeSink implements ChannelSink {
  posts: PostedMessage[] = [];
  edits: PostedMessage[] = [];
  /** Channels whose sends reject */
  failing = new Set<string>();
  private nextId = 1;

  async postMessage(channelRef: string, message: OutboundMessage): Promise<{ messageId: string | null }> {
    if (this.failing.has(channelRef)) throw new Error(`channel ${channelRef} unavailable`);
    const messageId = `msg-${this.nextId++}`;
    this.posts.push({ channelRef, messageId, message });
    return { messageId };
  }

  async editMessage(channelRef: string, messageId: string, message: OutboundMessage): Promise<void> {
    if (this.failing.has(channelRef)) throw new Error(`channel ${channelRef} unavailable`);
    this.edits.push({ channelRef, messageId, message });
  }

  postsTo(channelRef: string): PostedMessage[] {
    return this.posts.filter((p) => p.channelRef === channelRef);
  }
}

// ===== Platform =====

export type PlatformCall =
  | { op: "canRemove"; identityId: string; permanent: boolean }
  | { op: "revokeAccess"; identityId: string }
  | { op: "removeFromSpace"; identityId: string; permanent: boolean }
  | { op: "sendDirectMessage"; identityId: string; text: string };

/**
 * Records every call in order. Queue errors per operation with failNext();
 * each queued error is thrown once.
 */
export class FakePlatform implements PlatformActions {
  calls: PlatformCall[] = [];
  /** What canRemove() answers when it does not fail */
  removable = true;
  private failures: Record<PlatformCall["op"], unknown[]> = {
    canRemove: [],
    revokeAccess: [],
    removeFromSpace: [],
    sendDirectMessage: [],
  };

  failNext(op: PlatformCall["op"], ...errors: unknown[]): void {
    this.failures[op].push(...errors);
  }

  async canRemove(identityId: string, permanent: boolean): Promise<boolean> {
    this.calls.push({ op: "canRemove", identityId, permanent });
    this.maybeFail("canRemove");
    return this.removable;
  }

  async revokeAccess(identityId: string): Promise<void> {
    this.calls.push({ op: "revokeAccess", identityId });
    this.maybeFail("revokeAccess");
  }

  async removeFromSpace(identityId: string, permanent: boolean): Promise<void> {
    this.calls.push({ op: "removeFromSpace", identityId, permanent });
    this.maybeFail("removeFromSpace");
  }

  async sendDirectMessage(identityId: string, text: string): Promise<void> {
    this.calls.push({ op: "sendDirectMessage", identityId, text });
    this.maybeFail("sendDirectMessage");
  }

  ops(): string[] {
    return this.calls.map((c) => c.op);
  }

  private maybeFail(op: PlatformCall["op"]): void {
    const next = this.failures[op].shift();
    if (next !== undefined) throw next;
  }
}

/** Shape of a rejected discord.js REST call, enough for classifyError(). */
export function discordApiError(code: number, status = 403): Error {
  return Object.assign(new Error(`Discord API error ${code}`), { name: "DiscordAPIError", code, status });
}

/** Shape of a Node socket error, enough for classifyError(). */
export function networkError(code = "ECONNRESET"): Error {
  return Object.assign(new Error(`network ${code}`), { code });
}

// ===== Flight events =====

export function arrival(overrides: Partial<ArrivalEvent> = {}): ArrivalEvent {
  return {
    identityId: "kit@aruga",
    displayName: "Kit",
    originIsland: "Aruga",
    islandKey: "alapaap",
    timestamp: 1_700_000_000,
    ...overrides,
  };
}

// ===== Island probes =====

/**
 * Scripted probe: each island answers from its own queue; an Error entry
 * rejects, "hang" never settles until aborted.
 */
export class ScriptedProbe implements IslandProbe {
  calls: string[] = [];
  private scripts = new Map<string, Array<ObservedState | Error | "hang">>();

  script(islandKey: string, ...steps: Array<ObservedState | Error | "hang">): void {
    this.scripts.set(islandKey, [...(this.scripts.get(islandKey) ?? []), ...steps]);
  }

  async probe(island: MonitoredIsland, signal: AbortSignal): Promise<ProbeResult> {
    this.calls.push(island.key);
    const step = this.scripts.get(island.key)?.shift() ?? "offline";
    if (step instanceof Error) throw step;
    if (step === "hang") {
      return new Promise<ProbeResult>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    return { state: step };
  }
}

export function island(key: string, channelId = `ch-${key}`): MonitoredIsland {
  return { key, displayName: key.charAt(0).toUpperCase() + key.slice(1), channelId };
}
