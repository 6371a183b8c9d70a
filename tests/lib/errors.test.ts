/**
 * Island Warden — tests/lib/errors.test.ts
 * WHAT: Error classification and the moderation failure taxonomy.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  ActionError,
  TimeoutError,
  actionErrorMessage,
  classifyError,
  shouldReportToSentry,
  toActionError,
} from "../../src/lib/errors.js";
import { discordApiError, networkError } from "../utils/fakes.js";

// ===== classifyError =====

describe("classifyError", () => {
  it("classifies Discord API errors by JSON code", () => {
    expect(classifyError(discordApiError(50013))).toMatchObject({
      kind: "discord_api",
      code: 50013,
      httpStatus: 403,
    });
  });

  it("classifies SQLite errors", () => {
    const err = Object.assign(new Error("UNIQUE constraint failed"), {
      name: "SqliteError",
      code: "SQLITE_CONSTRAINT_UNIQUE",
    });
    expect(classifyError(err)).toMatchObject({ kind: "db_error", code: "SQLITE_CONSTRAINT_UNIQUE" });
  });

  it("classifies network and timeout errors", () => {
    expect(classifyError(Object.assign(new Error("reset"), { code: "ECONNRESET" })).kind).toBe("network");
    expect(classifyError(new TimeoutError("probe:aruga", 10))).toMatchObject({
      kind: "timeout",
      operation: "probe:aruga",
    });
  });

  it("classifies REST-layer errors that carry no JSON code", () => {
    const serverError = Object.assign(new Error("Internal Server Error"), { name: "HTTPError", status: 502 });
    const rateLimited = Object.assign(new Error("rate limited"), { name: "RateLimitError" });

    expect(classifyError(serverError)).toMatchObject({ kind: "discord_api", code: 0, httpStatus: 502 });
    expect(classifyError(rateLimited)).toMatchObject({ kind: "discord_api", code: 0, httpStatus: 429 });
  });

  it("falls back to unknown", () => {
    expect(classifyError("plain string")).toEqual({ kind: "unknown", message: "plain string" });
    expect(classifyError(null).kind).toBe("unknown");
  });
});

// ===== Predicates =====

describe("shouldReportToSentry", () => {
  it("skips operational Discord errors", () => {
    expect(shouldReportToSentry({ kind: "discord_api", code: 50007, message: "" })).toBe(false);
    expect(shouldReportToSentry({ kind: "unknown", message: "" })).toBe(true);
  });
});

// ===== Moderation taxonomy =====

describe("toActionError", () => {
  it("maps missing permissions and closed DMs to permission_denied", () => {
    expect(toActionError(discordApiError(50013))?.kind).toBe("permission_denied");
    expect(toActionError(discordApiError(50007))?.kind).toBe("permission_denied");
  });

  it("maps unknown member to identity_gone", () => {
    expect(toActionError(discordApiError(10007, 404))?.kind).toBe("identity_gone");
  });

  it("treats network trouble, timeouts, 429 and 5xx as transient", () => {
    for (const e of [
      networkError(),
      new TimeoutError("platform:kick", 10),
      discordApiError(0, 429),
      discordApiError(0, 503),
    ]) {
      const mapped = toActionError(e);
      expect(mapped?.kind).toBe("platform_unavailable");
      expect(mapped?.transient).toBe(true);
    }
  });

  it("maps other Discord 4xx to a non-transient rejection", () => {
    const mapped = toActionError(discordApiError(50035, 400));
    expect(mapped?.kind).toBe("request_rejected");
    expect(mapped?.transient).toBe(false);
  });

  it("returns null for errors that did not come from the platform", () => {
    expect(toActionError(new TypeError("cannot read properties of undefined"))).toBeNull();
    expect(toActionError(Object.assign(new Error("locked"), { name: "SqliteError", code: "SQLITE_BUSY" }))).toBeNull();
  });

  it("passes ActionError through untouched", () => {
    const original = new ActionError("identity_gone", "left");
    expect(toActionError(original)).toBe(original);
  });
});

describe("actionErrorMessage", () => {
  it("explains each failure kind", () => {
    expect(actionErrorMessage(new ActionError("identity_gone", ""))).toBe("That traveler is no longer in the server.");
    expect(actionErrorMessage(new ActionError("request_rejected", ""))).toBe(
      "Discord rejected that request, so nothing was changed."
    );
  });
});
