/**
 * Island Warden — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for secrets that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. Keep the host, redact the secret.
 * Mention pattern: @everyone/@here in a log line means user-controlled text got through.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

// Only warn once per process when the Sentry module cannot be loaded
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data
 * (traveler names, feed lines). Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

function serializeErr(e: unknown): Record<string, unknown> {
  if (e instanceof Error) {
    const code = "code" in e ? e.code : undefined;
    return { name: e.name, code, message: e.message, stack: e.stack };
  }
  return { message: String(e) };
}

/**
 * Log level defaults to "info"; LOG_LEVEL overrides it. Test runs are silent
 * unless LOG_LEVEL is set.
 * Pretty printing for TTY dev sessions with LOG_PRETTY=true.
 * Everything else gets newline-delimited JSON.
 */
const isVitest = !!process.env.VITEST_WORKER_ID;
const logLevel = process.env.LOG_LEVEL ?? (isVitest ? "silent" : "info");
const wantPretty = process.env.LOG_PRETTY === "true" && process.stdout.isTTY;

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  serializers: {
    err: serializeErr,
  },
  /**
   * Error-level logs carrying an Error are forwarded to Sentry, so callers
   * only ever write logger.error({ err }, "...").
   */
  hooks: {
    logMethod(args, method, level) {
      if (!isVitest && level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import keeps Sentry optional and avoids a circular import
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", String(importErr));
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
