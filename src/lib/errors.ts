/**
 * Island Warden — src/lib/errors.ts
 * WHAT: Domain error classes for the moderation/status core, plus a
 *       discriminated-union classifier for errors caught from the platform.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - toActionError(err) → ActionError for platform failures, null for anything else (bugs propagate)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, toActionError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 50013) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Domain Errors =====

/**
 * Raised when a moderation record is written twice for the same alert.
 * Keyed by alert, not identity: the same traveler may be warned on many visits.
 */
export class ConflictError extends Error {
  readonly kind = "conflict" as const;
  constructor(
    readonly alertId: string,
    message = `Alert ${alertId} already has a moderation record`
  ) {
    super(message);
    this.name = "ConflictError";
  }
}

/**
 * A staff decision arrived for an alert that is no longer pending.
 * Carries who/what resolved it so the late clicker can be told.
 */
export class AlreadyResolvedError extends Error {
  readonly kind = "already_resolved" as const;
  constructor(
    readonly alertId: string,
    readonly outcome: string | null,
    readonly resolverId: string | null
  ) {
    super(`Alert ${alertId} was already resolved (${outcome ?? "unknown outcome"})`);
    this.name = "AlreadyResolvedError";
  }
}

export type ActionErrorKind = "permission_denied" | "identity_gone" | "platform_unavailable" | "request_rejected";

/**
 * Failure of a platform-side moderation call.
 * - permission_denied: the bot/staff lacks rights on the platform
 * - identity_gone: the target already left
 * - platform_unavailable: transient; callers may retry once
 * - request_rejected: Discord refused the request itself (other 4xx); not retried
 */
export class ActionError extends Error {
  constructor(
    readonly kind: ActionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ActionError";
  }

  get transient(): boolean {
    return this.kind === "platform_unavailable";
  }
}

/** Notification could not be delivered. Always non-fatal. */
export class DeliveryError extends Error {
  readonly kind = "delivery" as const;
  constructor(
    readonly channelRef: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DeliveryError";
  }
}

/** A suspended platform call or probe exceeded its deadline. */
export class TimeoutError extends Error {
  readonly kind = "timeout" as const;
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

// ===== Classified (caught) Errors =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors. Discord uses numeric JSON codes, not HTTP status:
 * - 10007: Unknown Member, 10013: Unknown User
 * - 50001: Missing Access, 50013: Missing Permissions
 * - 50007: Cannot send messages to this user (DMs closed)
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Node.js system errors: the request never reached the server or dropped mid-flight. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

export interface TimeoutErrorInfo extends AppError {
  kind: "timeout";
  operation: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError = DiscordApiError | NetworkError | DbError | TimeoutErrorInfo | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught error. Ordered from most specific to least:
 * timeouts, SQLite, Discord, network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }
  const cause = err instanceof Error ? err : undefined;

  if (err instanceof TimeoutError) {
    return { kind: "timeout", operation: err.operation, message: err.message, cause };
  }

  if (!isRecord(err)) {
    return { kind: "unknown", message: String(err) };
  }

  const message = str(err.message) ?? String(err);
  const name = str(err.name);
  const code = err.code;

  if (name === "SqliteError" && typeof code === "string") {
    return { kind: "db_error", code, message, cause };
  }

  // @discordjs/rest raises HTTPError for 5xx bodies it cannot parse and RateLimitError
  // when it gives up waiting on a bucket
  const status = name === "RateLimitError" ? 429 : num(err.status);
  if ((name === "RateLimitError" || name === "HTTPError") && status !== undefined) {
    return { kind: "discord_api", code: 0, httpStatus: status, method: str(err.method), path: str(err.url), message, cause };
  }

  if (name === "DiscordAPIError" || (name?.includes("Discord") && typeof code === "number")) {
    return {
      kind: "discord_api",
      code: num(code) ?? 0,
      httpStatus: num(err.status) ?? num(err.httpStatus),
      method: str(err.method),
      path: str(err.url) ?? str(err.path),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return { kind: "network", code, host: str(err.hostname) ?? str(err.host), message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api":
      // Operational, not bugs
      return ![10007, 10008, 10013, 10062, 40060, 50001, 50007, 50013].includes(err.code);
    case "network":
    case "timeout":
      return false;
    default:
      return true;
  }
}

/** Discord refused a DM because the user closed DMs or shares no server with the bot. */
export function isDmBlocked(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 50007;
}

/**
 * Map a caught platform error onto the moderation taxonomy. Returns null when
 * the error did not come from the platform (a bug, a database error), so the
 * caller can rethrow it instead of reporting an outage.
 */
export function toActionError(err: unknown): ActionError | null {
  if (err instanceof ActionError) return err;
  const classified = classifyError(err);

  switch (classified.kind) {
    case "network":
    case "timeout":
      return new ActionError("platform_unavailable", classified.message, { cause: err });
    case "discord_api":
      return discordActionError(classified, err);
    default:
      return null;
  }
}

function discordActionError(classified: DiscordApiError, err: unknown): ActionError {
  const { code, httpStatus } = classified;
  // 50007: DMs closed; another attempt will not help
  if (code === 50013 || code === 50001 || isDmBlocked(classified)) {
    return new ActionError("permission_denied", classified.message, { cause: err });
  }
  if (code === 10007 || code === 10013) {
    return new ActionError("identity_gone", classified.message, { cause: err });
  }
  if (httpStatus !== undefined && httpStatus >= 400 && httpStatus < 500 && httpStatus !== 429) {
    return new ActionError("request_rejected", classified.message, { cause: err });
  }
  return new ActionError("platform_unavailable", classified.message, { cause: err });
}

// ===== Error Context Helpers =====

export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };

  switch (err.kind) {
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "db_error":
      return { ...base, sqlCode: err.code };
    case "timeout":
      return { ...base, operation: err.operation };
    default:
      return base;
  }
}

/** Staff-facing text for a failed moderation action. */
export function actionErrorMessage(err: ActionError): string {
  switch (err.kind) {
    case "permission_denied":
      return "I don't have permission to do that. Check my role position and permissions.";
    case "identity_gone":
      return "That traveler is no longer in the server.";
    case "platform_unavailable":
      return "Discord did not respond in time. Please try again in a moment.";
    case "request_rejected":
      return "Discord rejected that request, so nothing was changed.";
  }
}
