/**
 * Island Warden — src/lib/result.ts
 * WHAT: Minimal Result union for operations whose failure is an expected value
 *       (moderation actions, notification delivery) rather than an exception.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });
