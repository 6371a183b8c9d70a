/**
 * Island Warden — tests/features/flight/feedGate.test.ts
 * WHAT: Feed events held before the first roster load and replayed in order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { FeedGate } from "../../../src/features/flight/feedGate.js";
import type { FeedEvent } from "../../../src/features/flight/feed.js";
import { arrival } from "../../utils/fakes.js";

function arrivalOf(identityId: string): FeedEvent {
  return { kind: "arrival", destination: "Alapaap", event: arrival({ identityId }) };
}

function departureOf(identityId: string): FeedEvent {
  return {
    kind: "departure",
    destination: "Alapaap",
    event: { identityId, islandKey: "alapaap", timestamp: 1_700_000_100 },
  };
}

describe("FeedGate", () => {
  it("holds events while closed", async () => {
    const gate = new FeedGate();

    await gate.push(arrivalOf("kit@aruga"));

    expect(gate.isOpen).toBe(false);
    expect(gate.heldCount).toBe(1);
  });

  it("replays held events in order on open, then passes events straight through", async () => {
    const gate = new FeedGate();
    const seen: string[] = [];
    await gate.push(arrivalOf("kit@aruga"));
    await gate.push(departureOf("kit@aruga"));

    const replayed = await gate.open(async (e) => {
      seen.push(`${e.kind}:${e.event.identityId}`);
    });
    await gate.push(arrivalOf("mo@bonita"));

    expect(replayed).toBe(2);
    expect(seen).toEqual(["arrival:kit@aruga", "departure:kit@aruga", "arrival:mo@bonita"]);
    expect(gate.heldCount).toBe(0);
  });

  it("replays events that arrive during the replay before opening", async () => {
    const gate = new FeedGate();
    const seen: string[] = [];
    await gate.push(arrivalOf("kit@aruga"));

    await gate.open(async (e) => {
      seen.push(e.event.identityId);
      if (e.event.identityId === "kit@aruga") await gate.push(arrivalOf("mo@bonita"));
    });

    expect(seen).toEqual(["kit@aruga", "mo@bonita"]);
  });

  it("skips a failing event and keeps replaying", async () => {
    const gate = new FeedGate();
    const seen: string[] = [];
    await gate.push(arrivalOf("bad@aruga"));
    await gate.push(arrivalOf("kit@aruga"));

    const replayed = await gate.open(async (e) => {
      if (e.event.identityId === "bad@aruga") throw new Error("database is locked");
      seen.push(e.event.identityId);
    });

    expect(replayed).toBe(1);
    expect(seen).toEqual(["kit@aruga"]);
  });

  it("drops the oldest events beyond capacity", async () => {
    const gate = new FeedGate(2);
    const seen: string[] = [];
    for (const id of ["a@x", "b@x", "c@x"]) await gate.push(arrivalOf(id));

    await gate.open(async (e) => {
      seen.push(e.event.identityId);
    });

    expect(seen).toEqual(["b@x", "c@x"]);
  });
});
