/**
 * Island Warden — tests/lib/timeout.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { withTimeout } from "../../src/lib/timeout.js";
import { TimeoutError } from "../../src/lib/errors.js";

describe("withTimeout", () => {
  it("passes through a result that arrives in time", async () => {
    expect(await withTimeout(Promise.resolve("ok"), 50, "fast")).toBe("ok");
  });

  it("rejects with TimeoutError past the deadline", async () => {
    const never = new Promise<string>(() => undefined);

    const caught = await withTimeout(never, 10, "probe:aruga").catch((err: unknown) => err);

    expect(caught).toBeInstanceOf(TimeoutError);
    expect(caught).toMatchObject({ operation: "probe:aruga", timeoutMs: 10 });
  });

  it("propagates the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("refused")), 50, "op")).rejects.toThrow("refused");
  });
});
