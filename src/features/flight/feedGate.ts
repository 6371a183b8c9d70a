/**
 * Island Warden — src/features/flight/feedGate.ts
 * WHAT: Holds feed events until the flight logger may act on them, then replays them in order.
 * WHY: Before the first roster load every traveler looks unknown; handling arrivals
 *      then would alert staff about members.
 * FLOWS:
 *  - push(event) → held (gate closed) | handler(event) (gate open)
 *  - open(handler) → replay held events oldest first → pass-through from then on
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { classifyError, errorContext } from "../../lib/errors.js";
import type { FeedEvent } from "./feed.js";

export type FeedHandler = (event: FeedEvent) => Promise<void>;

export class FeedGate {
  private held: FeedEvent[] = [];
  private handler: FeedHandler | null = null;

  /** @param capacity oldest held events are dropped beyond this */
  constructor(private readonly capacity = 500) {}

  get isOpen(): boolean {
    return this.handler !== null;
  }

  get heldCount(): number {
    return this.held.length;
  }

  async push(event: FeedEvent): Promise<void> {
    if (this.handler) {
      await this.handler(event);
      return;
    }
    if (this.held.length >= this.capacity) {
      const dropped = this.held.shift();
      logger.warn({ evt: "feed_hold_overflow", identityId: dropped?.event.identityId }, "[flight] feed hold full");
    }
    this.held.push(event);
  }

  /**
   * Replays everything held, including events pushed while the replay runs,
   * then lets events straight through. A failing event is logged and skipped.
   * @returns number of events replayed
   */
  async open(handler: FeedHandler): Promise<number> {
    let replayed = 0;
    for (let next = this.held.shift(); next; next = this.held.shift()) {
      try {
        await handler(next);
        replayed++;
      } catch (err) {
        logger.error(
          { evt: "feed_replay_failed", ...errorContext(classifyError(err), { identityId: next.event.identityId }) },
          "[flight] held feed event failed"
        );
      }
    }
    this.handler = handler;
    logger.info({ replayed }, "[flight] feed gate open");
    return replayed;
  }
}
