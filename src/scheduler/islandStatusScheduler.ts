/**
 * Island Warden — src/scheduler/islandStatusScheduler.ts
 * WHAT: Periodic status poll over every monitored island.
 * WHY: Islands fail independently; one slow or broken island must never hold
 *      up the others, and the loop must outlive any single failure.
 * FLOWS:
 *  - start() → sweep now, then every intervalMs
 *  - sweep → bounded fan-out of probes → tracker.observe() → onTransition()
 *  - stop() → timer cleared, in-flight probes aborted and abandoned
 * NOTES:
 *  - Probe timeout or error → "unknown", which the tracker ignores.
 *  - Each sweep carries the generation it started in. stop() bumps the
 *    generation, so a probe that finishes afterwards never reaches observe().
 *  - A tick that lands while the previous sweep is still running is skipped.
 * DOCS:
 *  - setInterval/unref: https://nodejs.org/api/timers.html#timeoutunref
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { runWithConcurrency } from "../lib/concurrency.js";
import { classifyError, errorContext } from "../lib/errors.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { withTimeout } from "../lib/timeout.js";
import type { IslandProbe } from "../features/islandStatus/probe.js";
import type { StatusTracker } from "../features/islandStatus/tracker.js";
import type { IslandState, MonitoredIsland, TransitionEvent } from "../features/islandStatus/types.js";

const SCHEDULER_NAME = "islandStatus";

export interface StatusPollSchedulerOptions {
  intervalMs: number;
  /** Probes in flight at once (default: 4) */
  concurrency?: number;
  /** Per-probe deadline (default: 15s) */
  probeTimeoutMs?: number;
  onTransition?: (event: TransitionEvent, island: MonitoredIsland) => Promise<void> | void;
}

export interface IslandObservation {
  islandKey: string;
  raw: IslandState;
  transition: TransitionEvent | null;
}

export interface SweepReport {
  /** False when stop() landed mid-sweep and results were discarded */
  applied: boolean;
  observations: IslandObservation[];
}

export class StatusPollScheduler {
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;
  private running: Promise<SweepReport> | null = null;
  private readonly controllers = new Set<AbortController>();
  private readonly concurrency: number;
  private readonly probeTimeoutMs: number;

  constructor(
    private readonly islands: readonly MonitoredIsland[],
    private readonly probe: IslandProbe,
    private readonly tracker: StatusTracker,
    private readonly options: StatusPollSchedulerOptions
  ) {
    this.concurrency = options.concurrency ?? 4;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 15_000;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    logger.info(
      { intervalMs: this.options.intervalMs, islands: this.islands.length, concurrency: this.concurrency },
      "[islandStatus:scheduler] starting"
    );

    this.timer = setInterval(() => void this.tick(), this.options.intervalMs);
    // Do not hold the process open for the poll loop alone
    this.timer.unref();
    void this.tick();
  }

  /** Cancel the loop as a unit. In-flight probes are aborted and their results dropped. */
  stop(): void {
    this.generation++;
    for (const controller of this.controllers) controller.abort();
    this.controllers.clear();

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("[islandStatus:scheduler] stopped");
    }
  }

  /** One full sweep over every island. */
  async runOnce(): Promise<SweepReport> {
    const generation = this.generation;

    const settled = await runWithConcurrency(this.islands, this.concurrency, async (island) => {
      const raw = await this.probeOne(island);
      if (generation !== this.generation) return null;

      const transition = this.tracker.observe(island.key, raw);
      if (transition) await this.announce(transition, island);
      return { islandKey: island.key, raw, transition };
    });

    const observations: IslandObservation[] = [];
    for (const result of settled) {
      if (!result.ok) throw result.error;
      if (result.value) observations.push(result.value);
    }
    return { applied: generation === this.generation, observations };
  }

  private async tick(): Promise<void> {
    if (this.running) {
      logger.warn("[islandStatus:scheduler] previous sweep still running, skipping tick");
      return;
    }

    this.running = this.runOnce();
    try {
      const report = await this.running;
      recordSchedulerRun(SCHEDULER_NAME, true);
      const unknown = report.observations.filter((o) => o.raw === "unknown").length;
      logger.debug(
        { probed: report.observations.length, unknown, applied: report.applied },
        "[islandStatus:scheduler] sweep completed"
      );
    } catch (err) {
      recordSchedulerRun(SCHEDULER_NAME, false);
      logger.error({ err }, "[islandStatus:scheduler] sweep failed");
    } finally {
      this.running = null;
    }
  }

  /** Never rejects: timeouts and probe errors become "unknown". */
  private async probeOne(island: MonitoredIsland): Promise<IslandState> {
    const controller = new AbortController();
    this.controllers.add(controller);
    try {
      const result = await withTimeout(
        this.probe.probe(island, controller.signal),
        this.probeTimeoutMs,
        `probe:${island.key}`
      );
      return result.state;
    } catch (err) {
      controller.abort();
      const classified = classifyError(err);
      logger.debug(
        { island: island.key, ...errorContext(classified) },
        `[islandStatus:scheduler] probe failed: ${classified.message}`
      );
      return "unknown";
    } finally {
      this.controllers.delete(controller);
    }
  }

  private async announce(event: TransitionEvent, island: MonitoredIsland): Promise<void> {
    logger.info(
      { evt: "island_transition", island: island.key, previous: event.previous, next: event.next },
      `[islandStatus] ${island.displayName}: ${event.previous} → ${event.next}`
    );
    if (!this.options.onTransition) return;
    try {
      await this.options.onTransition(event, island);
    } catch (err) {
      logger.warn({ err, island: island.key }, "[islandStatus:scheduler] transition handler failed");
    }
  }
}
