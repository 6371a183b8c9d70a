/**
 * Island Warden — src/lib/retry.ts
 * WHAT: Runs one platform call under a deadline, retrying only what the
 *       moderation taxonomy calls transient.
 * WHY: Callers deal in ActionError alone. Errors that did not come from the
 *      platform are bugs and leave untouched on the first attempt.
 * FLOWS:
 *  - retryPlatformCall(fn, opts) → attempt → transient ActionError? pause → attempt → ActionError
 *  - platformCallBudgetMs(...) → longest a retryPlatformCall() can take
 * USAGE:
 *  await retryPlatformCall(() => member.kick(reason), { label: "kick", timeoutMs: 10_000 });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { toActionError } from "./errors.js";
import { withTimeout } from "./timeout.js";

export interface PlatformCallOptions {
  /** Log label, also names the timeout */
  label: string;
  /** Deadline per attempt */
  timeoutMs: number;
  /** Attempts including the first (default: 2) */
  attempts?: number;
  /** Base pause before a retry, jittered to 0.5x-1.5x (default: 250ms) */
  retryDelayMs?: number;
}

export const DEFAULT_ATTEMPTS = 2;
export const DEFAULT_RETRY_DELAY_MS = 250;

/**
 * @throws ActionError for platform failures; anything else is rethrown as caught
 */
export async function retryPlatformCall<T>(fn: () => Promise<T>, options: PlatformCallOptions): Promise<T> {
  const { label, timeoutMs, attempts = DEFAULT_ATTEMPTS, retryDelayMs = DEFAULT_RETRY_DELAY_MS } = options;
  if (attempts < 1) {
    throw new Error(`retryPlatformCall: attempts must be >= 1, got ${attempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(fn(), timeoutMs, `platform:${label}`);
    } catch (err) {
      const actionErr = toActionError(err);
      if (!actionErr) throw err;

      if (!actionErr.transient || attempt >= attempts) {
        logger.warn(
          { evt: "platform_call_failed", label, attempt, errorKind: actionErr.kind },
          `[platform] ${label} failed after ${attempt} attempt(s): ${actionErr.message}`
        );
        throw actionErr;
      }

      const pauseMs = Math.floor(retryDelayMs * (0.5 + Math.random()));
      logger.debug(
        { evt: "platform_call_retry", label, attempt, pauseMs },
        `[platform] ${label} unavailable, retrying in ${pauseMs}ms`
      );
      await new Promise((resolve) => setTimeout(resolve, pauseMs));
    }
  }
}

/** Every attempt runs into its deadline and every pause hits the jitter ceiling. */
export function platformCallBudgetMs(
  timeoutMs: number,
  attempts: number = DEFAULT_ATTEMPTS,
  retryDelayMs: number = DEFAULT_RETRY_DELAY_MS
): number {
  return attempts * timeoutMs + (attempts - 1) * Math.ceil(retryDelayMs * 1.5);
}
