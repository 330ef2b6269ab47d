// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/ports/clock`
 * Purpose: Local wall-clock abstraction for deterministic testing.
 * Scope: Provides the local clock reading in epoch milliseconds. Does not apply any network offset.
 * Invariants: Returns epoch milliseconds (UTC).
 * Side-effects: none (interface only)
 * Notes: Implemented by SystemClock; tests use FakeClock.
 * Links: src/system-clock.ts, tests/_fakes/fake-clock.ts
 * @public
 */

export interface ClockSource {
  /** Local wall clock, epoch milliseconds */
  now(): number;
}
