// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/clock-rings`
 * Purpose: Local wall-clock ring and the synchronized atomic-time ring.
 * Scope: Hand angles and display strings from zoned fields. Does not read any clock.
 * Invariants: Hand angles are in [0, 360).
 * Side-effects: none
 * Links: src/zoned-time.ts, packages/time-sync/src/network-time-sync.ts
 * @public
 */

import type { Instant, SyncStatus, TimeReading } from "./model.js";
import { zonedFields } from "./zoned-time.js";

export interface LocalTimeState {
  readonly timeZone: string;
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
  readonly utcOffsetMinutes: number;
  readonly hourHandDeg: number;
  readonly minuteHandDeg: number;
  readonly secondHandDeg: number;
  /** HH:MM:SS */
  readonly display: string;
}

export interface AtomicTimeState {
  readonly epochMs: number;
  /** HH:MM:SS.mmm in the display timezone */
  readonly display: string;
  readonly millisecondHandDeg: number;
  readonly offsetMs: number;
  readonly syncStatus: SyncStatus;
  readonly lastSyncIso?: string;
  readonly server?: string;
  readonly roundTripMs?: number;
}

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, "0");

export function computeLocalTime(
  instant: Instant,
  timeZone: string
): LocalTimeState {
  const f = zonedFields(instant.epochMs, timeZone);
  return {
    timeZone,
    ...f,
    hourHandDeg: ((f.hour % 12) + f.minute / 60 + f.second / 3600) * 30,
    minuteHandDeg: (f.minute + f.second / 60) * 6,
    secondHandDeg: (f.second + f.millisecond / 1000) * 6,
    display: `${pad(f.hour)}:${pad(f.minute)}:${pad(f.second)}`,
  };
}

export function computeAtomicTime(
  instant: Instant,
  reading: TimeReading,
  timeZone: string
): AtomicTimeState {
  const f = zonedFields(instant.epochMs, timeZone);
  return {
    epochMs: instant.epochMs,
    display: `${pad(f.hour)}:${pad(f.minute)}:${pad(f.second)}.${pad(f.millisecond, 3)}`,
    millisecondHandDeg: (f.millisecond / 1000) * 360,
    offsetMs: reading.offsetMs,
    syncStatus: reading.syncStatus,
    ...(reading.lastSyncEpochMs !== undefined
      ? { lastSyncIso: new Date(reading.lastSyncEpochMs).toISOString() }
      : {}),
    ...(reading.server !== undefined ? { server: reading.server } : {}),
    ...(reading.roundTripMs !== undefined
      ? { roundTripMs: reading.roundTripMs }
      : {}),
  };
}
