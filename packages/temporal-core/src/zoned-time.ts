// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/zoned-time`
 * Purpose: Wall-clock fields of an instant in an IANA timezone, read through Intl.
 * Scope: Timezone validation and civil field extraction. Does not do calendar arithmetic.
 * Invariants:
 * - Hours are 0..23 (hourCycle h23)
 * - Years are astronomical (1 BC = 0, 2 BC = -1)
 * Side-effects: none
 * Links: src/local-time.ts, src/hebrew-calendar.ts
 * @public
 */

import { ConfigurationError } from "./errors.js";

export interface ZonedFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
  /** Minutes east of UTC */
  readonly utcOffsetMinutes: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      era: "short",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

/**
 * @throws ConfigurationError when the identifier is not a known IANA zone
 */
export function assertValidTimeZone(timeZone: string): void {
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigurationError([
      { path: "timezone", message: `Unknown IANA timezone "${timeZone}"` },
    ]);
  }
}

export function zonedFields(epochMs: number, timeZone: string): ZonedFields {
  assertValidTimeZone(timeZone);
  const parts = formatterFor(timeZone).formatToParts(new Date(epochMs));
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number.parseInt(part.value, 10) : 0;
  };

  const era = parts.find((p) => p.type === "era")?.value ?? "AD";
  const yearOfEra = read("year");
  const year = era.startsWith("B") ? 1 - yearOfEra : yearOfEra;
  const month = read("month");
  const day = read("day");
  const hour = read("hour");
  const minute = read("minute");
  const second = read("second");
  const millisecond = ((epochMs % 1000) + 1000) % 1000;

  // Offset is the difference between the wall clock read as UTC and the instant
  const wall = new Date(0);
  wall.setUTCFullYear(year, month - 1, day);
  wall.setUTCHours(hour, minute, second, millisecond);
  const utcOffsetMinutes = Math.round((wall.getTime() - epochMs) / 60_000);

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    millisecond,
    utcOffsetMinutes,
  };
}

/**
 * Milliseconds to add to UTC epoch time to get the zone's wall clock,
 * so that `floor((epochMs + offset) / day)` indexes civil days.
 */
export function zoneOffsetMs(epochMs: number, timeZone: string): number {
  return zonedFields(epochMs, timeZone).utcOffsetMinutes * 60_000;
}
