// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/instant`
 * Purpose: Instant construction plus the day-count and angle arithmetic every ring calculator shares.
 * Scope: Julian date, fixed (R.D.) day numbers, degree normalization. Does not read the system clock.
 * Invariants: Pure; deterministic for the same epoch milliseconds.
 * Side-effects: none
 * Links: src/solar-position.ts, src/hebrew-calendar.ts
 * @public
 */

import type { Instant } from "./model.js";

export const MS_PER_DAY = 86_400_000;

/** Julian date of 1970-01-01T00:00:00Z */
export const UNIX_EPOCH_JULIAN_DAY = 2_440_587.5;

/** Julian date of J2000.0 (2000-01-01T12:00:00 TT, used here as UT) */
export const J2000_JULIAN_DAY = 2_451_545.0;

/** Fixed day number (Rata Die) of 1970-01-01 */
export const UNIX_EPOCH_FIXED_DAY = 719_163;

// Range accepted by the Date constructor
const MAX_EPOCH_MS = 8.64e15;

export function instantFromEpochMs(epochMs: number): Instant {
  if (!Number.isFinite(epochMs) || Math.abs(epochMs) > MAX_EPOCH_MS) {
    throw new RangeError(`Epoch milliseconds out of range: ${epochMs}`);
  }
  return Object.freeze({
    epochMs,
    iso: new Date(epochMs).toISOString(),
  });
}

export function julianDay(instant: Instant): number {
  return instant.epochMs / MS_PER_DAY + UNIX_EPOCH_JULIAN_DAY;
}

/** Days (fractional) since J2000.0 */
export function daysSinceJ2000(instant: Instant): number {
  return julianDay(instant) - J2000_JULIAN_DAY;
}

/**
 * Fixed day number of the civil day containing `epochMs + offsetMs`.
 */
export function fixedDayFromEpochMs(epochMs: number, offsetMs = 0): number {
  return Math.floor((epochMs + offsetMs) / MS_PER_DAY) + UNIX_EPOCH_FIXED_DAY;
}

/** Maps any angle to [0, 360) */
export function normalizeDegrees(deg: number): number {
  const r = deg % 360;
  return r < 0 ? r + 360 : r;
}

/** Maps any angle to (-180, 180] */
export function normalizeSignedDegrees(deg: number): number {
  const r = normalizeDegrees(deg);
  return r > 180 ? r - 360 : r;
}

export const toRadians = (deg: number): number => (deg * Math.PI) / 180;
export const toDegrees = (rad: number): number => (rad * 180) / Math.PI;

/** Floor modulo: result has the sign of the divisor */
export function mod(a: number, b: number): number {
  return a - b * Math.floor(a / b);
}
