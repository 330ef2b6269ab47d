// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/engine/tick-loop`
 * Purpose: Drives engine ticks on a fixed interval and publishes each snapshot.
 * Scope: Timer lifecycle (start, pause, resume, stop) and tick timing. Does not compute rings.
 * Invariants:
 *   - A throwing tick is logged and skipped; the loop keeps running
 *   - The timer is unref'd and never keeps the process alive by itself
 * Side-effects: timers
 * Links: src/engine/temporal-model-engine.ts, src/engine/snapshot-store.ts
 * @public
 */

import type { Logger } from "../observability/logger.js";
import type { SnapshotSink } from "./snapshot-store.js";
import type { Snapshot } from "./temporal-model-engine.js";

export type TickLoopState = "stopped" | "running" | "paused";

export interface TickLoopOptions {
  readonly engine: { tick(): Snapshot };
  readonly sink: SnapshotSink;
  readonly intervalMs: number;
  readonly logger: Logger;
  readonly onTickDuration?: (durationMs: number) => void;
  /** Monotonic clock for tick timing; defaults to performance.now */
  readonly monotonicNow?: () => number;
}

export class TickLoop {
  private timer: ReturnType<typeof setInterval> | undefined;
  private current: TickLoopState = "stopped";
  private readonly monotonicNow: () => number;

  constructor(private readonly options: TickLoopOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(
        `Tick interval must be positive, got ${options.intervalMs}`
      );
    }
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
  }

  get state(): TickLoopState {
    return this.current;
  }

  /** Ticks immediately, then every interval */
  start(): void {
    if (this.current !== "stopped") return;
    this.current = "running";
    this.schedule();
  }

  /** Stops ticking but keeps the loop resumable */
  pause(): void {
    if (this.current !== "running") return;
    this.clearTimer();
    this.current = "paused";
  }

  resume(): void {
    if (this.current !== "paused") return;
    this.current = "running";
    this.schedule();
  }

  stop(): void {
    this.clearTimer();
    this.current = "stopped";
  }

  /** One tick outside the schedule; returns undefined when the engine threw */
  tickOnce(): Snapshot | undefined {
    const started = this.monotonicNow();
    try {
      const snapshot = this.options.engine.tick();
      this.options.sink.publish(snapshot);
      return snapshot;
    } catch (error) {
      this.options.logger.error({ err: error }, "tick failed");
      return undefined;
    } finally {
      this.options.onTickDuration?.(this.monotonicNow() - started);
    }
  }

  private schedule(): void {
    this.tickOnce();
    this.timer = setInterval(() => this.tickOnce(), this.options.intervalMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
