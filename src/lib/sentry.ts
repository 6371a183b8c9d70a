/**
 * Island Warden — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture and shutdown flush.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/Message → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { logger } from "./logger.js";

let sentryEnabled = false;

export interface SentryOptions {
  dsn?: string;
  environment: string;
  tracesSampleRate: number;
  release: string;
}

function hasValidDsn(dsn: string | undefined): dsn is string {
  // Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a valid DSN and outside of test runs.
 */
export function initializeSentry(options: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(options.dsn)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      release: options.release,
      tracesSampleRate: options.tracesSampleRate,
      integrations: [Sentry.onUnhandledRejectionIntegration({ mode: "warn" })],
      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(
            /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g,
            "[REDACTED_TOKEN]"
          );
        }
        return event;
      },
      // Transient platform noise; logged locally with more context
      ignoreErrors: ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });

    sentryEnabled = true;
    logger.info({ environment: options.environment }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function captureMessage(message: string, level: Sentry.SeverityLevel = "info"): string | null {
  if (!sentryEnabled) return null;
  return Sentry.captureMessage(message, level);
}

/**
 * Flush pending events before exit. Resolves false on timeout.
 */
export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.close(timeoutMs);
  } catch (err) {
    logger.warn({ err }, "Sentry flush failed");
    return false;
  }
}
