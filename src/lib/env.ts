/**
 * Island Warden — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so test env vars set before import win
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw environment extraction. Every variable is trimmed; validation happens
 * in one pass below.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),

  // Flight logger channels and roles
  FLIGHT_LISTEN_CHANNEL_ID: process.env.FLIGHT_LISTEN_CHANNEL_ID?.trim(),
  FLIGHT_ALERT_CHANNEL_ID: process.env.FLIGHT_ALERT_CHANNEL_ID?.trim(),
  MOD_LOG_CHANNEL_ID: process.env.MOD_LOG_CHANNEL_ID?.trim(),
  ISLAND_ACCESS_ROLE_ID: process.env.ISLAND_ACCESS_ROLE_ID?.trim(),
  FLIGHT_ALERT_TTL_MINUTES: process.env.FLIGHT_ALERT_TTL_MINUTES?.trim(),
  ROSTER_REFRESH_MINUTES: process.env.ROSTER_REFRESH_MINUTES?.trim(),
  PLATFORM_CALL_TIMEOUT_MS: process.env.PLATFORM_CALL_TIMEOUT_MS?.trim(),

  // Island status monitor
  ISLAND_BOT_ROLE_ID: process.env.ISLAND_BOT_ROLE_ID?.trim(),
  ISLAND_BOT_NAME_PREFIX: process.env.ISLAND_BOT_NAME_PREFIX?.trim(),
  ISLAND_HOST_NAME: process.env.ISLAND_HOST_NAME?.trim(),
  ISLANDS_FILE: process.env.ISLANDS_FILE?.trim(),
  STATUS_POLL_INTERVAL_SECONDS: process.env.STATUS_POLL_INTERVAL_SECONDS?.trim(),
  STATUS_DEBOUNCE_THRESHOLD: process.env.STATUS_DEBOUNCE_THRESHOLD?.trim(),
  STATUS_PROBE_CONCURRENCY: process.env.STATUS_PROBE_CONCURRENCY?.trim(),
  STATUS_PROBE_TIMEOUT_MS: process.env.STATUS_PROBE_TIMEOUT_MS?.trim(),
};

const schema = z.object({
  // Core Discord credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().min(1, "Missing GUILD_ID"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  LOG_LEVEL: z.string().optional(),

  FLIGHT_LISTEN_CHANNEL_ID: z.string().min(1, "Missing FLIGHT_LISTEN_CHANNEL_ID"),
  FLIGHT_ALERT_CHANNEL_ID: z.string().min(1, "Missing FLIGHT_ALERT_CHANNEL_ID"),
  MOD_LOG_CHANNEL_ID: z.string().min(1, "Missing MOD_LOG_CHANNEL_ID"),
  // Role that grants island access; Warn removes it
  ISLAND_ACCESS_ROLE_ID: z.string().min(1, "Missing ISLAND_ACCESS_ROLE_ID"),
  // 0 disables auto-expiry of undecided alerts
  FLIGHT_ALERT_TTL_MINUTES: z.coerce.number().int().min(0).default(0),
  ROSTER_REFRESH_MINUTES: z.coerce.number().int().min(1).default(60),
  PLATFORM_CALL_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),

  ISLAND_BOT_ROLE_ID: z.string().optional(),
  ISLAND_BOT_NAME_PREFIX: z.string().default("chobot"),
  ISLAND_HOST_NAME: z.string().default("chopaeng"),
  ISLANDS_FILE: z.string().default("config/islands.json"),
  STATUS_POLL_INTERVAL_SECONDS: z.coerce.number().int().min(10).default(300),
  STATUS_DEBOUNCE_THRESHOLD: z.coerce.number().int().min(1).default(2),
  STATUS_PROBE_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  STATUS_PROBE_TIMEOUT_MS: z.coerce.number().int().min(100).default(15_000),
});

export type Env = z.infer<typeof schema>;

/**
 * Fail-fast validation. safeParse collects every issue so a broken .env is
 * fixed in one pass.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
