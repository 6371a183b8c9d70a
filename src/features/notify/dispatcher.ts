/**
 * Island Warden — src/features/notify/dispatcher.ts
 * WHAT: Notification dispatcher shared by the flight logger and the status monitor.
 * WHY: Delivery is best-effort. A failed send is logged and dropped; it never
 *      reaches the caller as an exception and never blocks other recipients.
 * FLOWS:
 *  - notify(channelRef, notification) → render → sink.postMessage → Result
 *  - notifyAll(batch) → every recipient independently
 *  - revise(channelRef, messageId, notification) → sink.editMessage → Result
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { DeliveryError, classifyError, errorContext } from "../../lib/errors.js";
import { err, ok, type Result } from "../../lib/result.js";
import { withTimeout } from "../../lib/timeout.js";
import { renderNotification, type Notification, type OutboundMessage } from "./templates.js";

export interface DeliveryReceipt {
  channelRef: string;
  messageId: string | null;
}

/**
 * Where messages go. The Discord adapter implements this over text channels;
 * tests use an in-memory sink.
 */
export interface ChannelSink {
  postMessage(channelRef: string, message: OutboundMessage): Promise<{ messageId: string | null }>;
  editMessage(channelRef: string, messageId: string, message: OutboundMessage): Promise<void>;
}

export interface DispatchItem {
  channelRef: string;
  notification: Notification;
}

export interface DispatcherOptions {
  /** Deadline for a single send (default: 10s) */
  timeoutMs?: number;
}

export class NotificationDispatcher {
  private readonly timeoutMs: number;

  constructor(
    private readonly sink: ChannelSink,
    options: DispatcherOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  render(notification: Notification): OutboundMessage {
    return renderNotification(notification);
  }

  async notify(
    channelRef: string,
    notification: Notification
  ): Promise<Result<DeliveryReceipt, DeliveryError>> {
    try {
      const { messageId } = await withTimeout(
        this.sink.postMessage(channelRef, this.render(notification)),
        this.timeoutMs,
        `notify:${notification.kind}`
      );
      logger.debug({ evt: "notify_sent", kind: notification.kind, channelRef, messageId }, "[notify] sent");
      return ok({ channelRef, messageId });
    } catch (e) {
      return err(this.dropped(channelRef, notification.kind, e));
    }
  }

  /**
   * Deliver a batch. Each item settles on its own; the result array lines up
   * with the input.
   */
  async notifyAll(batch: readonly DispatchItem[]): Promise<Result<DeliveryReceipt, DeliveryError>[]> {
    return Promise.all(batch.map((item) => this.notify(item.channelRef, item.notification)));
  }

  /** Edit a message posted earlier (alert cards after resolution). */
  async revise(
    channelRef: string,
    messageId: string,
    notification: Notification
  ): Promise<Result<void, DeliveryError>> {
    try {
      await withTimeout(
        this.sink.editMessage(channelRef, messageId, this.render(notification)),
        this.timeoutMs,
        `revise:${notification.kind}`
      );
      return ok(undefined);
    } catch (e) {
      return err(this.dropped(channelRef, notification.kind, e));
    }
  }

  private dropped(channelRef: string, kind: string, cause: unknown): DeliveryError {
    const classified = classifyError(cause);
    logger.warn(
      { evt: "notify_dropped", kind, channelRef, ...errorContext(classified) },
      `[notify] delivery to ${channelRef} failed: ${classified.message}`
    );
    return new DeliveryError(channelRef, classified.message, { cause });
  }
}
