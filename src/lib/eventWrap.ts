/**
 * Island Warden — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers.
 * WHY: A throwing listener must never take the bot down; errors are classified and logged.
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches, classifies and logs
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { withTimeout } from "./timeout.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "30000", 10);

export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await withTimeout(Promise.resolve(handler(...args)), timeoutMs, `event:${eventName}`);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        { evt: "event_error", event: eventName, ...errorContext(classified, contextIds), err },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, ...contextIds });
      }
      // Never re-throw
    }
  };
}

/**
 * Pull guild/channel/user ids off common discord.js payloads for log context.
 */
function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    if ("guildId" in arg && typeof arg.guildId === "string") {
      context.guildId = arg.guildId;
    }
    if ("channelId" in arg && typeof arg.channelId === "string") {
      context.channelId = arg.channelId;
    }
    if ("user" in arg && arg.user && typeof arg.user === "object" && "id" in arg.user) {
      context.userId = arg.user.id;
    }
  }

  return context;
}
