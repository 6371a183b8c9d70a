/**
 * Island Warden — src/lib/timeout.ts
 * WHAT: Deadline wrapper for platform calls and probes.
 * FLOWS: withTimeout(promise, ms, op) → resolves with promise or rejects with TimeoutError
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { TimeoutError } from "./errors.js";

/**
 * Race a promise against a timer. The timer is always cleared so a finished
 * call never leaves a pending handle behind.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
