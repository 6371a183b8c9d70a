/**
 * Island Warden — tests/features/notify/templates.test.ts
 * WHAT: Message text for every notification kind.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { directNotice, renderNotification } from "../../../src/features/notify/templates.js";
import type { Alert, ModerationRecord } from "../../../src/features/flight/types.js";

const pending: Alert = {
  id: "01J9Z3X4Y5W6V7T8S9R0QPNMKH",
  identityId: "kit kat@aruga",
  displayName: "Kit Kat",
  originIsland: "aruga",
  islandKey: "alapaap",
  channelId: null,
  messageId: null,
  status: "pending",
  outcome: null,
  resolverId: null,
  createdAt: 1_700_000_000,
  resolvedAt: null,
};

function record(id: number, kind: ModerationRecord["kind"]): ModerationRecord {
  return { id, alertId: `a${id}`, identityId: "kitkat@aruga", kind, staffId: "staff-1", reason: null, createdAt: 1 };
}

describe("renderNotification", () => {
  it("renders an arrival alert with decisions", () => {
    const msg = renderNotification({ kind: "arrival-alert", alert: pending, islandLabel: "<#123>", history: [] });

    expect(msg.title).toBe("Unknown traveler in <#123>");
    expect(msg.text).toBe(
      "Traveler **`Kit Kat`** from **`Aruga`** is not linked. " +
        "Check if this is a member or they didn't change their nickname.\n" +
        "Arrived <t:1700000000:R>"
    );
    expect(msg.tone).toBe("alert");
    expect(msg.prompt?.decisions).toEqual(["admit", "warn", "kick", "ban"]);
  });

  it("summarizes prior actions by kind", () => {
    const msg = renderNotification({
      kind: "arrival-alert",
      alert: pending,
      islandLabel: "Alapaap",
      history: [record(1, "kick"), record(2, "warn"), record(3, "kick")],
    });

    expect(msg.text.split("\n").at(-1)).toBe("Prior actions: 1 warn, 2 kicks");
  });

  it("names an unreadable origin", () => {
    const msg = renderNotification({
      kind: "arrival-alert",
      alert: { ...pending, originIsland: "" },
      islandLabel: "Alapaap",
      history: [],
    });

    expect(msg.text.startsWith("Traveler **`Kit Kat`** from **`an unknown island`**")).toBe(true);
  });

  it("renders a resolved card without buttons", () => {
    const msg = renderNotification({
      kind: "alert-resolved",
      alert: { ...pending, status: "resolved", outcome: "admit", resolverId: "staff-9" },
      islandLabel: "Alapaap",
    });

    expect(msg).toEqual({
      title: "Traveler in Alapaap: Admitted",
      text: "Traveler **`Kit Kat`** from **`Aruga`**\nAdmitted by <@staff-9>",
      tone: "success",
      clearPrompt: true,
    });
  });

  it("renders an action summary with the reason", () => {
    const msg = renderNotification({
      kind: "action-summary",
      summary: {
        kind: "ban",
        identity: { id: "kitkat@aruga", displayName: "Kit Kat", originIsland: "aruga", arrivedAt: 1 },
        staffId: "staff-1",
        reason: "griefing",
        targetPresent: true,
        dmDelivered: true,
      },
    });

    expect(msg).toEqual({
      title: "Flight ban",
      text: "Traveler **`Kit Kat`** from **`Aruga`** was banned by <@staff-1>.\nReason: griefing",
      tone: "neutral",
    });
  });

  it("renders island notices as plain text", () => {
    expect(renderNotification({ kind: "island-down", island: "Aruga" })).toEqual({
      text: "Aruga island is currently down.",
    });
    expect(renderNotification({ kind: "island-refreshing", island: "Aruga" })).toEqual({
      text: "Aruga island is refreshing.",
    });
  });
});

describe("directNotice", () => {
  it("appends the reason when given", () => {
    expect(directNotice("kick", "spam")).toBe("You have been removed from the server by island staff.\nReason: spam");
    expect(directNotice("ban", null)).toBe("You have been banned from the server by island staff.");
  });
});
