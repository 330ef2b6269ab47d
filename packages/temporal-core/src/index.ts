// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core`
 * Purpose: Pure ring calculators and shared time model for the concentric time engine.
 * Scope: Re-exports public APIs. Does not perform I/O or read the system clock.
 * Invariants: Every calculator takes an explicit Instant.
 * Side-effects: none
 * Links: src/model.ts, src/errors.ts
 * @public
 */

export {
  type AtomicTimeState,
  computeAtomicTime,
  computeLocalTime,
  type LocalTimeState,
} from "./clock-rings.js";
export {
  computeEarthRotation,
  dayFractionVisible,
  greenwichMeanSiderealTimeDeg,
  type LandmarkState,
  type RotationState,
  validateLocation,
} from "./earth-rotation.js";
export {
  CalendarDomainError,
  ConfigurationError,
  type ConfigurationIssue,
  isCalendarDomainError,
  isConfigurationError,
  isTimeSourceError,
  TIME_SOURCE_ERROR_CODES,
  TimeSourceError,
  type TimeSourceErrorCode,
} from "./errors.js";
export {
  convertToHebrew,
  daysInHebrewMonth,
  daysInHebrewYear,
  fixedFromHebrew,
  HEBREW_EPOCH_FIXED_DAY,
  type HebrewDate,
  hebrewFromFixed,
  hebrewHoliday,
  hebrewMonthName,
  hebrewNewYear,
  type HebrewYearType,
  hebrewYearType,
  isHebrewLeapYear,
  monthsInHebrewYear,
} from "./hebrew-calendar.js";
export {
  fixedDayFromEpochMs,
  instantFromEpochMs,
  julianDay,
  MS_PER_DAY,
  normalizeDegrees,
  normalizeSignedDegrees,
} from "./instant.js";
export {
  type GeoLocation,
  type Instant,
  type Landmark,
  type PulsarConfig,
  RING_IDS,
  type RingId,
  type RingResult,
  SYNC_STATUSES,
  type SyncStatus,
  type TimeReading,
} from "./model.js";
export {
  computePulsar,
  computePulsars,
  DEFAULT_PULSARS,
  PULSAR_EPOCH_MS,
  type PulsarState,
  pulsarsById,
  pulseIntensity,
  validatePulsars,
} from "./pulsar.js";
export {
  computeSolarPosition,
  type Season,
  SEASONS,
  seasonForLongitude,
  type SolarPosition,
  ZODIAC_SIGNS,
  type ZodiacSign,
  zodiacSignForLongitude,
} from "./solar-position.js";
export {
  assertValidTimeZone,
  isValidTimeZone,
  type ZonedFields,
  zonedFields,
} from "./zoned-time.js";
