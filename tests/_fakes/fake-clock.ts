// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `tests/_fakes/fake-clock`
 * Purpose: Deterministic local clock for time-source and engine tests.
 * Scope: Implements ClockSource with explicit time control. Does NOT replace Date or timers globally.
 * Invariants: Time advances only via explicit calls; millisecond precision maintained.
 * Side-effects: none
 * Notes: Combine with vi.useFakeTimers() when the code under test also schedules timers.
 * Links: packages/time-sync/src/ports/clock.port.ts
 * @public
 */

import type { ClockSource } from "../../packages/time-sync/src/ports/clock.port.js";

const DEFAULT_TIME = "2024-01-01T00:00:00.000Z";

export class FakeClock implements ClockSource {
  private currentMs: number;

  constructor(initialTime: string | number = DEFAULT_TIME) {
    this.currentMs = FakeClock.toMs(initialTime);
  }

  now(): number {
    return this.currentMs;
  }

  advance(milliseconds: number): void {
    this.currentMs += milliseconds;
  }

  setTime(time: string | number): void {
    this.currentMs = FakeClock.toMs(time);
  }

  reset(): void {
    this.currentMs = FakeClock.toMs(DEFAULT_TIME);
  }

  private static toMs(time: string | number): number {
    return typeof time === "number" ? time : Date.parse(time);
  }
}
