// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/earth-rotation`
 * Purpose: Earth rotation state relative to the Sun: subsolar point, local rotation angle, day/night split.
 * Scope: Sidereal time and hour-angle geometry on top of solar-position. Does not model refraction or the solar disc radius.
 * Invariants:
 * - localRotationAngleDeg is 0 at local solar midnight, 180 at solar noon, and increases with time
 * - dayFractionVisible is clamped to [0, 1] (polar night 0, polar day 1)
 * Side-effects: none
 * Links: src/solar-position.ts
 * @public
 */

import { ConfigurationError, type ConfigurationIssue } from "./errors.js";
import {
  daysSinceJ2000,
  normalizeDegrees,
  normalizeSignedDegrees,
  toDegrees,
  toRadians,
} from "./instant.js";
import type { GeoLocation, Instant, Landmark } from "./model.js";
import { computeSolarPosition, type SolarPosition } from "./solar-position.js";

export interface LandmarkState {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly solarElevationDeg: number;
  readonly isDaylight: boolean;
}

export interface RotationState {
  readonly subsolarLongitudeDeg: number;
  readonly subsolarLatitudeDeg: number;
  readonly localRotationAngleDeg: number;
  readonly solarElevationDeg: number;
  readonly isDaylight: boolean;
  readonly dayFractionVisible: number;
  readonly landmarks: readonly LandmarkState[];
}

/** Greenwich mean sidereal time in degrees, [0, 360) */
export function greenwichMeanSiderealTimeDeg(instant: Instant): number {
  return normalizeDegrees(
    280.46061837 + 360.98564736629 * daysSinceJ2000(instant)
  );
}

export function validateLocation(
  location: GeoLocation,
  path = "location"
): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  if (
    !Number.isFinite(location.latitude) ||
    location.latitude < -90 ||
    location.latitude > 90
  ) {
    issues.push({
      path: `${path}.latitude`,
      message: `Latitude must be within [-90, 90], got ${location.latitude}`,
    });
  }
  if (
    !Number.isFinite(location.longitude) ||
    location.longitude < -180 ||
    location.longitude > 180
  ) {
    issues.push({
      path: `${path}.longitude`,
      message: `Longitude must be within [-180, 180], got ${location.longitude}`,
    });
  }
  return issues;
}

function elevationDeg(
  location: GeoLocation,
  hourAngleDeg: number,
  declinationDeg: number
): number {
  const phi = toRadians(location.latitude);
  const delta = toRadians(declinationDeg);
  const h = toRadians(hourAngleDeg);
  const sinAlt =
    Math.sin(phi) * Math.sin(delta) +
    Math.cos(phi) * Math.cos(delta) * Math.cos(h);
  return toDegrees(Math.asin(Math.min(1, Math.max(-1, sinAlt))));
}

export function dayFractionVisible(
  latitudeDeg: number,
  declinationDeg: number
): number {
  const x =
    -Math.tan(toRadians(latitudeDeg)) * Math.tan(toRadians(declinationDeg));
  if (x >= 1) return 0;
  if (x <= -1) return 1;
  return toDegrees(Math.acos(x)) / 180;
}

/**
 * @param sun precomputed solar position for the same instant, when available
 * @throws ConfigurationError when a coordinate is out of range
 */
export function computeEarthRotation(
  instant: Instant,
  location: GeoLocation,
  landmarks: readonly Landmark[] = [],
  sun: SolarPosition = computeSolarPosition(instant)
): RotationState {
  const issues = [
    ...validateLocation(location),
    ...landmarks.flatMap((l, i) => validateLocation(l, `landmarks.${i}`)),
  ];
  if (issues.length > 0) throw new ConfigurationError(issues);

  const gmst = greenwichMeanSiderealTimeDeg(instant);
  const hourAngleAt = (longitude: number): number =>
    gmst + longitude - sun.rightAscensionDeg;

  const localHourAngle = hourAngleAt(location.longitude);
  const solarElevationDeg = elevationDeg(
    location,
    localHourAngle,
    sun.declinationDeg
  );

  return {
    subsolarLongitudeDeg: normalizeSignedDegrees(sun.rightAscensionDeg - gmst),
    subsolarLatitudeDeg: sun.declinationDeg,
    localRotationAngleDeg: normalizeDegrees(localHourAngle + 180),
    solarElevationDeg,
    isDaylight: solarElevationDeg > 0,
    dayFractionVisible: dayFractionVisible(
      location.latitude,
      sun.declinationDeg
    ),
    landmarks: landmarks.map((landmark) => {
      const elevation = elevationDeg(
        landmark,
        hourAngleAt(landmark.longitude),
        sun.declinationDeg
      );
      return {
        name: landmark.name,
        latitude: landmark.latitude,
        longitude: landmark.longitude,
        solarElevationDeg: elevation,
        isDaylight: elevation > 0,
      };
    }),
  };
}
