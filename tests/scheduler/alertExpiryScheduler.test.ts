/**
 * Island Warden — tests/scheduler/alertExpiryScheduler.test.ts
 * WHAT: Periodic expiry pass wiring.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import type { FlightLogger } from "../../src/features/flight/flightLogger.js";
import { startAlertExpiryScheduler, stopAlertExpiryScheduler } from "../../src/scheduler/alertExpiryScheduler.js";

function fakeFlightLogger(): { flight: Pick<FlightLogger, "expireStale">; expireStale: ReturnType<typeof vi.fn> } {
  const expireStale = vi.fn().mockResolvedValue([]);
  return { flight: { expireStale }, expireStale };
}

describe("alert expiry scheduler", () => {
  afterEach(() => {
    stopAlertExpiryScheduler();
  });

  it("runs an expiry pass every minute", async () => {
    vi.useFakeTimers();
    const { flight, expireStale } = fakeFlightLogger();

    startAlertExpiryScheduler(flight, 30);
    await vi.advanceTimersByTimeAsync(120_000);

    expect(expireStale).toHaveBeenCalledTimes(2);
  });

  it("stays off when the window is zero", async () => {
    vi.useFakeTimers();
    const { flight, expireStale } = fakeFlightLogger();

    startAlertExpiryScheduler(flight, 0);
    await vi.advanceTimersByTimeAsync(120_000);

    expect(expireStale).not.toHaveBeenCalled();
  });
});
