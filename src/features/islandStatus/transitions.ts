/**
 * Island Warden — src/features/islandStatus/transitions.ts
 * WHAT: Which confirmed transitions are announced, and how.
 * FLOWS: transitionNotice(event, island) → Notification | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Notification } from "../notify/templates.js";
import type { MonitoredIsland, TransitionEvent } from "./types.js";

/**
 * - → offline: down notice, from any previous state
 * - offline/refreshing → online: back-online notice
 * - → refreshing: refreshing notice
 * unknown → online (first sweep after start) is silent.
 */
export function transitionNotice(event: TransitionEvent, island: MonitoredIsland): Notification | null {
  switch (event.next) {
    case "offline":
      return { kind: "island-down", island: island.displayName };
    case "refreshing":
      return { kind: "island-refreshing", island: island.displayName };
    case "online":
      return event.previous === "offline" || event.previous === "refreshing"
        ? { kind: "island-up", island: island.displayName }
        : null;
  }
}
