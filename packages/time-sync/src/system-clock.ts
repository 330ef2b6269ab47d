// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/system-clock`
 * Purpose: System clock implementation for real-world time access.
 * Scope: Reads the host wall clock.
 * Invariants: Returns epoch milliseconds.
 * Side-effects: IO (reads system time)
 * Links: Implements ClockSource port
 * @public
 */

import type { ClockSource } from "./ports/clock.port.js";

export class SystemClock implements ClockSource {
  now(): number {
    return Date.now();
  }
}
