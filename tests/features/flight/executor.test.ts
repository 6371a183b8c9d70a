/**
 * Island Warden — tests/features/flight/executor.test.ts
 * WHAT: Decision application order, failure taxonomy and record-only paths.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import type Database from "better-sqlite3";
import { openDatabase, closeDatabase } from "../../../src/db/db.js";
import { KnownEntityRegistry } from "../../../src/features/flight/registry.js";
import { ActionExecutor, decisionBudgetMs } from "../../../src/features/flight/executor.js";
import { NotificationDispatcher } from "../../../src/features/notify/dispatcher.js";
import { identityOf, type Alert } from "../../../src/features/flight/types.js";
import { AlreadyResolvedError } from "../../../src/lib/errors.js";
import { FakePlatform, FakeSink, arrival, discordApiError, networkError } from "../../utils/fakes.js";

const MOD_LOG = "mod-log";

describe("ActionExecutor", () => {
  let db: Database.Database;
  let registry: KnownEntityRegistry;
  let platform: FakePlatform;
  let sink: FakeSink;
  let executor: ActionExecutor;
  let alert: Alert;

  beforeEach(() => {
    db = openDatabase(":memory:");
    registry = new KnownEntityRegistry(db, { now: () => 1_700_000_000 });
    platform = new FakePlatform();
    sink = new FakeSink();
    executor = new ActionExecutor(registry, platform, new NotificationDispatcher(sink), {
      modLogChannel: MOD_LOG,
      callTimeoutMs: 200,
      retryDelayMs: 1,
    });
    const opened = registry.openAlert(arrival());
    if (!opened) throw new Error("expected alert");
    alert = opened;
  });

  afterEach(() => {
    closeDatabase(db);
  });

  // ===== Admit =====

  it("admit clears the traveler without touching the platform or history", async () => {
    const result = await executor.apply("admit", identityOf(alert), "staff-1", { alertId: alert.id });

    expect(result.ok).toBe(true);
    expect(registry.isKnown("kit@aruga")).toBe(true);
    expect(registry.getAlert(alert.id)?.outcome).toBe("admit");
    expect(registry.historyOf("kit@aruga")).toEqual([]);
    expect(platform.calls).toEqual([]);
    expect(sink.posts).toEqual([]);
  });

  // ===== Warn =====

  describe("warn", () => {
    it("revokes access, records, then DMs and posts the summary", async () => {
      const result = await executor.apply("warn", identityOf(alert), "staff-1", {
        alertId: alert.id,
        reason: "no nickname",
      });

      expect(platform.ops()).toEqual(["revokeAccess", "sendDirectMessage"]);
      expect(platform.calls[1]).toEqual({
        op: "sendDirectMessage",
        identityId: "kit@aruga",
        text: "You have been warned by island staff and your island access has been removed.\nReason: no nickname",
      });
      expect(registry.historyOf("kit@aruga").map((r) => r.kind)).toEqual(["warn"]);

      const summaries = sink.postsTo(MOD_LOG);
      expect(summaries).toHaveLength(1);
      expect(summaries[0].message.text).toBe(
        "Traveler **`Kit`** from **`Aruga`** was warned by <@staff-1>.\nReason: no nickname"
      );

      expect(result).toEqual({
        ok: true,
        value: expect.objectContaining({ decision: "warn", targetPresent: true, dmDelivered: true, summaryPosted: true }),
      });
    });

    it("retries a transient failure exactly once", async () => {
      platform.failNext("revokeAccess", networkError());

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(true);
      expect(platform.ops().filter((op) => op === "revokeAccess")).toHaveLength(2);
    });

    it("gives up after the retry and leaves the alert pending", async () => {
      platform.failNext("revokeAccess", networkError(), networkError("ETIMEDOUT"));

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("platform_unavailable");
      expect(platform.ops()).toEqual(["revokeAccess", "revokeAccess"]);
      expect(registry.getAlert(alert.id)?.status).toBe("pending");
      expect(registry.historyOf("kit@aruga")).toEqual([]);
      expect(sink.posts).toEqual([]);
    });

    it("does not retry permission errors", async () => {
      platform.failNext("revokeAccess", discordApiError(50013));

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("permission_denied");
      expect(platform.ops()).toEqual(["revokeAccess"]);
      expect(registry.getAlert(alert.id)?.status).toBe("pending");
    });

    it("records only when the target is gone", async () => {
      platform.failNext("revokeAccess", discordApiError(10007, 404));

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.targetPresent).toBe(false);
        expect(result.value.dmDelivered).toBe(false);
      }
      // No DM attempt once the member is gone
      expect(platform.ops()).toEqual(["revokeAccess"]);
      expect(registry.historyOf("kit@aruga")).toHaveLength(1);
      expect(sink.postsTo(MOD_LOG)[0].message.text).toBe(
        "Traveler **`Kit`** from **`Aruga`** was warned by <@staff-1>.\nTarget had already left; recorded only."
      );
    });

    it("still records when the DM is refused", async () => {
      platform.failNext("sendDirectMessage", discordApiError(50007));

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.dmDelivered).toBe(false);
      expect(registry.historyOf("kit@aruga")).toHaveLength(1);
      expect(sink.postsTo(MOD_LOG)[0].message.text).toBe(
        "Traveler **`Kit`** from **`Aruga`** was warned by <@staff-1>.\nDirect notice could not be delivered."
      );
    });

    it("does not retry a request Discord rejected", async () => {
      platform.failNext("revokeAccess", discordApiError(50035, 400));

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("request_rejected");
      expect(platform.ops()).toEqual(["revokeAccess"]);
    });

    it("lets errors that are not platform failures reach the caller", async () => {
      const bug = new TypeError("roles is undefined");
      platform.failNext("revokeAccess", bug);

      await expect(executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id })).rejects.toBe(bug);
      expect(platform.ops()).toEqual(["revokeAccess"]);
      expect(registry.getAlert(alert.id)?.status).toBe("pending");
    });

    it("reports a failed summary without undoing the action", async () => {
      sink.failing.add(MOD_LOG);

      const result = await executor.apply("warn", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.summaryPosted).toBe(false);
      expect(registry.getAlert(alert.id)?.outcome).toBe("warn");
    });
  });

  // ===== Kick / Ban =====

  describe("kick and ban", () => {
    it("kick checks removability, then sends the notice before removal", async () => {
      await executor.apply("kick", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(platform.calls).toEqual([
        { op: "canRemove", identityId: "kit@aruga", permanent: false },
        {
          op: "sendDirectMessage",
          identityId: "kit@aruga",
          text: "You have been removed from the server by island staff.",
        },
        { op: "removeFromSpace", identityId: "kit@aruga", permanent: false },
      ]);
      expect(registry.getAlert(alert.id)?.outcome).toBe("kick");
    });

    it("ban removes permanently", async () => {
      const result = await executor.apply("ban", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(true);
      expect(platform.calls[0]).toEqual({ op: "canRemove", identityId: "kit@aruga", permanent: true });
      expect(platform.calls[2]).toEqual({ op: "removeFromSpace", identityId: "kit@aruga", permanent: true });
      expect(registry.historyOf("kit@aruga").map((r) => r.kind)).toEqual(["ban"]);
    });

    it("failed removal records nothing", async () => {
      platform.failNext("removeFromSpace", discordApiError(50013));

      const result = await executor.apply("ban", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(false);
      expect(registry.historyOf("kit@aruga")).toEqual([]);
      expect(registry.getAlert(alert.id)?.status).toBe("pending");
    });

    it("sends no notice when the bot may not remove the member", async () => {
      platform.removable = false;

      const result = await executor.apply("kick", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("permission_denied");
      expect(platform.ops()).toEqual(["canRemove"]);
      expect(registry.getAlert(alert.id)?.status).toBe("pending");
    });

    it("sends the notice once when staff retry a failed removal", async () => {
      platform.failNext("removeFromSpace", discordApiError(50013));

      const first = await executor.apply("kick", identityOf(alert), "staff-1", { alertId: alert.id });
      const second = await executor.apply("kick", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(first.ok).toBe(false);
      expect(second.ok).toBe(true);
      if (second.ok) expect(second.value.dmDelivered).toBe(true);
      expect(platform.ops()).toEqual([
        "canRemove",
        "sendDirectMessage",
        "removeFromSpace",
        "canRemove",
        "removeFromSpace",
      ]);
      expect(registry.historyOf("kit@aruga").map((r) => r.kind)).toEqual(["kick"]);
    });

    it("records only when the member left before the check", async () => {
      platform.failNext("canRemove", discordApiError(10007, 404));

      const result = await executor.apply("ban", identityOf(alert), "staff-1", { alertId: alert.id });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.targetPresent).toBe(false);
        expect(result.value.dmDelivered).toBe(false);
      }
      expect(platform.ops()).toEqual(["canRemove"]);
      expect(registry.historyOf("kit@aruga").map((r) => r.kind)).toEqual(["ban"]);
    });
  });

  // ===== Preconditions =====

  it("refuses a resolved alert before any platform call", async () => {
    registry.resolveAlert(alert.id, "departed", null);

    await expect(executor.apply("kick", identityOf(alert), "staff-1", { alertId: alert.id })).rejects.toBeInstanceOf(
      AlreadyResolvedError
    );
    expect(platform.calls).toEqual([]);
  });

  it("budgets for every platform call of a decision", () => {
    // 3 calls x (2 x 10s + 375ms pause) + 10s summary
    expect(decisionBudgetMs(10_000)).toBe(71_125);
  });
});
