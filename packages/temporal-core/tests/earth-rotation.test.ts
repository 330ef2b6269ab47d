// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/tests/earth-rotation`
 * Purpose: Unit tests for the Earth rotation model.
 * Scope: Subsolar point, rotation angle continuity, elevation, polar day and night, landmarks, coordinate validation.
 * Invariants: Deterministic.
 * Side-effects: none
 * Links: src/earth-rotation.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  computeEarthRotation,
  dayFractionVisible,
} from "../src/earth-rotation.js";
import { isConfigurationError } from "../src/errors.js";
import { instantFromEpochMs } from "../src/instant.js";

const at = (iso: string) => instantFromEpochMs(Date.parse(iso));
const NULL_ISLAND = { latitude: 0, longitude: 0 };
const WARSAW = { latitude: 52.23, longitude: 21.01 };

describe("computeEarthRotation", () => {
  it("puts the Sun near the prime meridian at noon UTC on the equinox", () => {
    const state = computeEarthRotation(at("2024-03-20T12:00:00Z"), NULL_ISLAND);

    expect(state.subsolarLongitudeDeg).toBeCloseTo(1.83, 2);
    expect(state.subsolarLatitudeDeg).toBeCloseTo(0.148, 3);
    expect(state.localRotationAngleDeg).toBeCloseTo(178.17, 2);
    expect(state.solarElevationDeg).toBeCloseTo(88.164, 2);
    expect(state.isDaylight).toBe(true);
    expect(state.dayFractionVisible).toBe(0.5);
  });

  it("reports night on the opposite side of the day", () => {
    const state = computeEarthRotation(at("2024-03-20T00:00:00Z"), NULL_ISLAND);

    expect(state.subsolarLongitudeDeg).toBeCloseTo(-178.133, 2);
    expect(state.localRotationAngleDeg).toBeCloseTo(358.133, 2);
    expect(state.isDaylight).toBe(false);
  });

  it("computes a mid-latitude summer state", () => {
    const state = computeEarthRotation(at("2024-06-20T12:00:00Z"), WARSAW);

    expect(state.localRotationAngleDeg).toBeCloseTo(200.583, 2);
    expect(state.solarElevationDeg).toBeCloseTo(57.19, 2);
    expect(state.dayFractionVisible).toBeCloseTo(0.689, 3);
  });

  it("reports polar day and polar night", () => {
    const north = { latitude: 70, longitude: 0 };

    expect(
      computeEarthRotation(at("2024-06-20T12:00:00Z"), north).dayFractionVisible
    ).toBe(1);

    const winter = computeEarthRotation(at("2024-12-21T12:00:00Z"), north);
    expect(winter.dayFractionVisible).toBe(0);
    expect(winter.solarElevationDeg).toBeCloseTo(-3.436, 2);
    expect(winter.isDaylight).toBe(false);
  });

  it("advances the local rotation angle monotonically across a day", () => {
    const start = Date.parse("2024-05-01T00:00:00Z");
    let previous = computeEarthRotation(instantFromEpochMs(start), WARSAW)
      .localRotationAngleDeg;
    let wraps = 0;

    for (let minute = 10; minute <= 24 * 60; minute += 10) {
      const angle = computeEarthRotation(
        instantFromEpochMs(start + minute * 60_000),
        WARSAW
      ).localRotationAngleDeg;
      if (angle < previous) {
        wraps++;
        expect(previous - angle).toBeGreaterThan(350);
      }
      previous = angle;
    }
    expect(wraps).toBe(1);
  });

  it("reports each landmark", () => {
    const state = computeEarthRotation(at("2024-06-20T12:00:00Z"), WARSAW, [
      { name: "London", latitude: 51.5, longitude: 0 },
      { name: "Tokyo", latitude: 35.68, longitude: 139.69 },
    ]);

    expect(state.landmarks.map((l) => l.name)).toEqual(["London", "Tokyo"]);
    expect(state.landmarks[0]?.solarElevationDeg).toBeCloseTo(61.933, 2);
    expect(state.landmarks[0]?.isDaylight).toBe(true);
    // 21:18 local solar time in Tokyo
    expect(state.landmarks[1]?.isDaylight).toBe(false);
  });

  it("rejects out-of-range coordinates", () => {
    let caught: unknown;
    try {
      computeEarthRotation(at("2024-06-20T12:00:00Z"), {
        latitude: 91,
        longitude: 200,
      });
    } catch (error) {
      caught = error;
    }

    expect(isConfigurationError(caught)).toBe(true);
    if (isConfigurationError(caught)) {
      expect(caught.issues.map((i) => i.path)).toEqual([
        "location.latitude",
        "location.longitude",
      ]);
    }
  });
});

describe("dayFractionVisible", () => {
  it("is one half everywhere at the equinox", () => {
    expect(dayFractionVisible(45, 0)).toBeCloseTo(0.5, 10);
  });

  it("mirrors between hemispheres", () => {
    expect(dayFractionVisible(-52.23, 23.43)).toBeCloseTo(
      1 - dayFractionVisible(52.23, 23.43),
      10
    );
  });
});
