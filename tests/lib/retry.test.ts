/**
 * Island Warden — tests/lib/retry.test.ts
 * WHAT: Tests for the platform call runner.
 * WHY: Platform calls get exactly one retry on transient failures; tests pin
 *      the attempt counts and which errors count as platform failures.
 *
 * NOTE: Real timers with minimal delays; fake timers and rejected promises
 * make for unhandled rejection noise.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

// ===== Mock Setup =====

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

import { platformCallBudgetMs, retryPlatformCall } from "../../src/lib/retry.js";
import { ActionError } from "../../src/lib/errors.js";
import { discordApiError, networkError } from "../utils/fakes.js";

// ===== Test Helpers =====

/** Fails `failCount` times, then resolves. */
function failingThenSucceeding<T>(failCount: number, value: T, make: () => unknown = () => networkError()) {
  let calls = 0;
  return {
    fn: async (): Promise<T> => {
      calls++;
      if (calls <= failCount) throw make();
      return value;
    },
    callCount: () => calls,
  };
}

const FAST = { label: "kick", timeoutMs: 200, retryDelayMs: 1 };

// ===== retryPlatformCall Tests =====

describe("retryPlatformCall", () => {
  it("returns the first success without retrying", async () => {
    const op = failingThenSucceeding(0, "ok");

    expect(await retryPlatformCall(op.fn, FAST)).toBe("ok");
    expect(op.callCount()).toBe(1);
  });

  it("retries a transient failure once", async () => {
    const op = failingThenSucceeding(1, "ok");

    expect(await retryPlatformCall(op.fn, FAST)).toBe("ok");
    expect(op.callCount()).toBe(2);
  });

  it("gives up with platform_unavailable after the last attempt", async () => {
    const op = failingThenSucceeding(5, "ok");

    const caught = await retryPlatformCall(op.fn, FAST).catch((e: unknown) => e);

    expect(caught).toBeInstanceOf(ActionError);
    expect(caught).toMatchObject({ kind: "platform_unavailable" });
    expect(op.callCount()).toBe(2);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "platform_call_failed", label: "kick", attempt: 2 }),
      "[platform] kick failed after 2 attempt(s): network ECONNRESET"
    );
  });

  it("does not retry a rejected request", async () => {
    const op = failingThenSucceeding(1, "ok", () => discordApiError(50035, 400));

    await expect(retryPlatformCall(op.fn, FAST)).rejects.toMatchObject({ kind: "request_rejected" });
    expect(op.callCount()).toBe(1);
  });

  it("rethrows errors that did not come from the platform", async () => {
    const bug = new TypeError("member.kick is not a function");
    const op = failingThenSucceeding(1, "ok", () => bug);

    await expect(retryPlatformCall(op.fn, FAST)).rejects.toBe(bug);
    expect(op.callCount()).toBe(1);
  });

  it("turns a missed deadline into a retry", async () => {
    let calls = 0;
    const fn = (): Promise<string> => {
      calls++;
      return calls === 1 ? new Promise<string>(() => undefined) : Promise.resolve("late ok");
    };

    expect(await retryPlatformCall(fn, { label: "dm", timeoutMs: 10, retryDelayMs: 1 })).toBe("late ok");
    expect(calls).toBe(2);
  });

  it("rejects a non-positive attempt budget", async () => {
    await expect(retryPlatformCall(async () => 1, { ...FAST, attempts: 0 })).rejects.toThrow(
      "retryPlatformCall: attempts must be >= 1, got 0"
    );
  });
});

describe("platformCallBudgetMs", () => {
  it("covers every attempt plus the longest pause", () => {
    expect(platformCallBudgetMs(10_000)).toBe(20_375);
    expect(platformCallBudgetMs(1_000, 3, 100)).toBe(3_300);
  });
});
