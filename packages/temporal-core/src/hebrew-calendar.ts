// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/hebrew-calendar`
 * Purpose: Converts an instant to the arithmetic Hebrew calendar (year, month, day, holiday).
 * Scope: Molad-based new-year computation, month lengths, fixed-day conversion both ways. Does not model sunset day boundaries.
 * Invariants:
 * - Months are numbered Nisan = 1 .. Adar = 12, Adar II = 13; the year begins on 1 Tishri (month 7)
 * - Leap years: (7y + 1) mod 19 < 7; only leap years have month 13
 * - Days roll over at civil midnight in the supplied timezone
 * - fixedFromHebrew(hebrewFromFixed(d)) === d for every d on or after the epoch
 * Side-effects: none
 * Notes: Day arithmetic uses fixed day numbers (Rata Die, 0001-01-01 proleptic Gregorian = 1).
 * Links: src/instant.ts, src/zoned-time.ts
 * @public
 */

import { CalendarDomainError } from "./errors.js";
import { fixedDayFromEpochMs, mod } from "./instant.js";
import type { Instant } from "./model.js";
import { zoneOffsetMs } from "./zoned-time.js";

/** Fixed day of 1 Tishri AM 1 (7 October 3761 BCE, proleptic Julian) */
export const HEBREW_EPOCH_FIXED_DAY = -1_373_427;

export const NISAN = 1;
export const TISHRI = 7;
export const ADAR = 12;
export const ADAR_II = 13;

export type HebrewYearType = "deficient" | "regular" | "complete";

export interface HebrewDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly monthName: string;
  readonly hebrewMonthName: string;
  /** 1-based position counted from Tishri */
  readonly monthOfYear: number;
  readonly isLeapYear: boolean;
  readonly yearLength: number;
  readonly yearType: HebrewYearType;
  readonly daysInMonth: number;
  readonly monthsInYear: number;
  readonly holiday?: string;
}

const MONTH_NAMES: readonly string[] = [
  "Nisan",
  "Iyyar",
  "Sivan",
  "Tammuz",
  "Av",
  "Elul",
  "Tishri",
  "Marheshvan",
  "Kislev",
  "Tevet",
  "Shevat",
  "Adar",
  "Adar II",
];

const HEBREW_MONTH_NAMES: readonly string[] = [
  "ניסן",
  "אייר",
  "סיון",
  "תמוז",
  "אב",
  "אלול",
  "תשרי",
  "חשוון",
  "כסלו",
  "טבת",
  "שבט",
  "אדר",
  "אדר ב׳",
];

export function isHebrewLeapYear(year: number): boolean {
  return mod(7 * year + 1, 19) < 7;
}

export function monthsInHebrewYear(year: number): number {
  return isHebrewLeapYear(year) ? 13 : 12;
}

/** Days from the epoch to the molad of Tishri, with the weekday postponement applied */
function calendarElapsedDays(year: number): number {
  const monthsElapsed = Math.floor((235 * year - 234) / 19);
  const partsElapsed = 12_084 + 13_753 * monthsElapsed;
  const days = 29 * monthsElapsed + Math.floor(partsElapsed / 25_920);
  return mod(3 * (days + 1), 7) < 3 ? days + 1 : days;
}

// Keeps year lengths within 353..355 / 383..385
function yearLengthCorrection(year: number): number {
  const ny0 = calendarElapsedDays(year - 1);
  const ny1 = calendarElapsedDays(year);
  const ny2 = calendarElapsedDays(year + 1);
  if (ny2 - ny1 === 356) return 2;
  if (ny1 - ny0 === 382) return 1;
  return 0;
}

/** Fixed day of 1 Tishri of `year` */
export function hebrewNewYear(year: number): number {
  return (
    HEBREW_EPOCH_FIXED_DAY +
    calendarElapsedDays(year) +
    yearLengthCorrection(year)
  );
}

export function daysInHebrewYear(year: number): number {
  return hebrewNewYear(year + 1) - hebrewNewYear(year);
}

export function hebrewYearType(year: number): HebrewYearType {
  switch (daysInHebrewYear(year) % 10) {
    case 3:
      return "deficient";
    case 4:
      return "regular";
    default:
      return "complete";
  }
}

export function daysInHebrewMonth(year: number, month: number): number {
  const length = daysInHebrewYear(year);
  if (
    month === 2 ||
    month === 4 ||
    month === 6 ||
    month === 10 ||
    month === ADAR_II
  ) {
    return 29;
  }
  if (month === ADAR && !isHebrewLeapYear(year)) return 29;
  // Marheshvan is long only in complete years
  if (month === 8 && length % 10 !== 5) return 29;
  // Kislev is short only in deficient years
  if (month === 9 && length % 10 === 3) return 29;
  return 30;
}

export function fixedFromHebrew(
  year: number,
  month: number,
  day: number
): number {
  let fixed = hebrewNewYear(year) + day - 1;
  const last = monthsInHebrewYear(year);
  if (month < TISHRI) {
    for (let m = TISHRI; m <= last; m++) fixed += daysInHebrewMonth(year, m);
    for (let m = NISAN; m < month; m++) fixed += daysInHebrewMonth(year, m);
  } else {
    for (let m = TISHRI; m < month; m++) fixed += daysInHebrewMonth(year, m);
  }
  return fixed;
}

// Mean year length in days
const MEAN_YEAR_DAYS = 35_975_351 / 98_496;

export function hebrewFromFixed(fixed: number): {
  year: number;
  month: number;
  day: number;
} {
  const approx =
    Math.floor((fixed - HEBREW_EPOCH_FIXED_DAY) / MEAN_YEAR_DAYS) + 1;
  let year = approx - 1;
  while (hebrewNewYear(year + 1) <= fixed) year++;

  let month = fixed < fixedFromHebrew(year, NISAN, 1) ? TISHRI : NISAN;
  while (
    fixed >
    fixedFromHebrew(year, month, daysInHebrewMonth(year, month))
  ) {
    month++;
  }
  const day = fixed - fixedFromHebrew(year, month, 1) + 1;
  return { year, month, day };
}

export function hebrewMonthName(year: number, month: number): string {
  if (month === ADAR && isHebrewLeapYear(year)) return "Adar I";
  return MONTH_NAMES[month - 1] ?? `Month ${month}`;
}

function hebrewScriptMonthName(year: number, month: number): string {
  if (month === ADAR && isHebrewLeapYear(year)) return "אדר א׳";
  return HEBREW_MONTH_NAMES[month - 1] ?? "";
}

/** Months counted from Tishri; Nisan is 7th in common years, 8th in leap years */
export function hebrewMonthOfYear(year: number, month: number): number {
  return month >= TISHRI
    ? month - TISHRI + 1
    : month + monthsInHebrewYear(year) - TISHRI + 1;
}

export function hebrewHoliday(
  year: number,
  month: number,
  day: number
): string | undefined {
  const purimMonth = isHebrewLeapYear(year) ? ADAR_II : ADAR;
  if (month === TISHRI) {
    if (day === 1 || day === 2) return "Rosh Hashanah";
    if (day === 10) return "Yom Kippur";
    if (day === 15) return "Sukkot";
  }
  if (month === 9 && day === 25) return "Hanukkah";
  if (month === purimMonth && day === 14) return "Purim";
  if (month === NISAN && day === 15) return "Passover";
  if (month === 3 && day === 6) return "Shavuot";
  return undefined;
}

/**
 * Hebrew date of the civil day containing `instant` in `timeZone`.
 *
 * @throws CalendarDomainError for days before 1 Tishri AM 1
 */
export function convertToHebrew(
  instant: Instant,
  timeZone = "UTC"
): HebrewDate {
  const offsetMs = timeZone === "UTC" ? 0 : zoneOffsetMs(instant.epochMs, timeZone);
  const fixed = fixedDayFromEpochMs(instant.epochMs, offsetMs);
  if (fixed < HEBREW_EPOCH_FIXED_DAY) {
    throw new CalendarDomainError("Hebrew", instant.epochMs);
  }

  const { year, month, day } = hebrewFromFixed(fixed);
  const yearLength = daysInHebrewYear(year);
  const holiday = hebrewHoliday(year, month, day);

  return {
    year,
    month,
    day,
    monthName: hebrewMonthName(year, month),
    hebrewMonthName: hebrewScriptMonthName(year, month),
    monthOfYear: hebrewMonthOfYear(year, month),
    isLeapYear: isHebrewLeapYear(year),
    yearLength,
    yearType: hebrewYearType(year),
    daysInMonth: daysInHebrewMonth(year, month),
    monthsInYear: monthsInHebrewYear(year),
    ...(holiday ? { holiday } : {}),
  };
}
