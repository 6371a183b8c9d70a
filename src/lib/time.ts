/**
 * Island Warden — src/lib/time.ts
 * WHAT: Unix epoch timestamp utilities.
 * FLOWS:
 *  - nowUtc() → current Unix seconds (INTEGER for SQLite)
 *  - tsToIso() → convert Unix seconds back to ISO8601 string
 *
 * NOTE: All created_at / resolved_at columns are Unix seconds, not milliseconds.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Floor so "X seconds ago" never goes negative
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

export const tsToIso = (seconds: number): string => new Date(seconds * 1000).toISOString();

/** Discord relative timestamp markup, e.g. "<t:1729468800:R>" */
export const discordRelative = (seconds: number): string => `<t:${seconds}:R>`;
