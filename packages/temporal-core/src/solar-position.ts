// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/solar-position`
 * Purpose: Apparent position of the Sun, season and tropical zodiac sign for an instant.
 * Scope: Low-precision almanac formula (well under 1° for current dates). Does not correct for nutation or aberration.
 * Invariants:
 * - eclipticLongitudeDeg is in [0, 360)
 * - Season and zodiac boundaries fall exactly on multiples of 90° and 30°
 * Side-effects: none
 * Links: src/earth-rotation.ts
 * @public
 */

import {
  daysSinceJ2000,
  julianDay,
  normalizeDegrees,
  normalizeSignedDegrees,
  toDegrees,
  toRadians,
} from "./instant.js";
import type { Instant } from "./model.js";

export const SEASONS = ["spring", "summer", "autumn", "winter"] as const;
export type Season = (typeof SEASONS)[number];

export const ZODIAC_SIGNS = [
  "Aries",
  "Taurus",
  "Gemini",
  "Cancer",
  "Leo",
  "Virgo",
  "Libra",
  "Scorpio",
  "Sagittarius",
  "Capricorn",
  "Aquarius",
  "Pisces",
] as const;
export type ZodiacSign = (typeof ZODIAC_SIGNS)[number];

export interface SolarPosition {
  readonly julianDay: number;
  readonly eclipticLongitudeDeg: number;
  readonly rightAscensionDeg: number;
  readonly declinationDeg: number;
  /** Apparent minus mean solar time */
  readonly equationOfTimeMinutes: number;
  readonly obliquityDeg: number;
  readonly season: Season;
  readonly zodiacSign: ZodiacSign;
  /** Ecliptic longitude as a fraction of the tropical year, from the March equinox */
  readonly yearFraction: number;
}

export function seasonForLongitude(longitudeDeg: number): Season {
  const index = Math.floor(normalizeDegrees(longitudeDeg) / 90);
  return SEASONS[index] ?? "spring";
}

export function zodiacSignForLongitude(longitudeDeg: number): ZodiacSign {
  const index = Math.floor(normalizeDegrees(longitudeDeg) / 30);
  return ZODIAC_SIGNS[index] ?? "Aries";
}

export function computeSolarPosition(instant: Instant): SolarPosition {
  const n = daysSinceJ2000(instant);
  const meanLongitude = normalizeDegrees(280.46 + 0.9856474 * n);
  const meanAnomaly = toRadians(normalizeDegrees(357.528 + 0.9856003 * n));

  const lambda = normalizeDegrees(
    meanLongitude +
      1.915 * Math.sin(meanAnomaly) +
      0.02 * Math.sin(2 * meanAnomaly)
  );
  const obliquity = 23.439 - 0.0000004 * n;

  const lambdaRad = toRadians(lambda);
  const epsilonRad = toRadians(obliquity);
  const rightAscension = normalizeDegrees(
    toDegrees(
      Math.atan2(Math.cos(epsilonRad) * Math.sin(lambdaRad), Math.cos(lambdaRad))
    )
  );
  const declination = toDegrees(
    Math.asin(Math.sin(epsilonRad) * Math.sin(lambdaRad))
  );
  // 4 minutes of time per degree
  const equationOfTime =
    4 * normalizeSignedDegrees(meanLongitude - rightAscension);

  return {
    julianDay: julianDay(instant),
    eclipticLongitudeDeg: lambda,
    rightAscensionDeg: rightAscension,
    declinationDeg: declination,
    equationOfTimeMinutes: equationOfTime,
    obliquityDeg: obliquity,
    season: seasonForLongitude(lambda),
    zodiacSign: zodiacSignForLongitude(lambda),
    yearFraction: lambda / 360,
  };
}
