/**
 * Island Warden — tests/features/islandStatus/transitions.test.ts
 * WHAT: Which confirmed transitions reach the island channel.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { transitionNotice } from "../../../src/features/islandStatus/transitions.js";
import type { IslandState, ObservedState } from "../../../src/features/islandStatus/types.js";
import { island } from "../../utils/fakes.js";

const aruga = island("aruga");

function notice(previous: IslandState, next: ObservedState) {
  return transitionNotice({ islandKey: "aruga", previous, next, timestamp: 0 }, aruga);
}

describe("transitionNotice", () => {
  it("announces going down from any state", () => {
    expect(notice("online", "offline")).toEqual({ kind: "island-down", island: "Aruga" });
    expect(notice("unknown", "offline")).toEqual({ kind: "island-down", island: "Aruga" });
  });

  it("announces coming back after downtime or a refresh", () => {
    expect(notice("offline", "online")).toEqual({ kind: "island-up", island: "Aruga" });
    expect(notice("refreshing", "online")).toEqual({ kind: "island-up", island: "Aruga" });
  });

  it("stays quiet on the first confirmation after start", () => {
    expect(notice("unknown", "online")).toBeNull();
  });

  it("announces refreshes", () => {
    expect(notice("online", "refreshing")).toEqual({ kind: "island-refreshing", island: "Aruga" });
  });
});
