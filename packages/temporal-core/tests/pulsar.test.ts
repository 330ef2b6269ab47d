// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/tests/pulsar`
 * Purpose: Unit tests for the pulsar phase simulator.
 * Scope: Phase arithmetic, pulse detection, intensity profile, idempotency, configuration validation.
 * Invariants: Instants are offsets from the fixed pulsar epoch so phases are exact.
 * Side-effects: none
 * Links: src/pulsar.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { isConfigurationError } from "../src/errors.js";
import { instantFromEpochMs } from "../src/instant.js";
import type { PulsarConfig } from "../src/model.js";
import {
  computePulsars,
  DEFAULT_PULSARS,
  PULSAR_EPOCH_MS,
  pulsarsById,
  pulseIntensity,
} from "../src/pulsar.js";

const afterEpoch = (ms: number) => instantFromEpochMs(PULSAR_EPOCH_MS + ms);

const SLOW: PulsarConfig = {
  id: "slow",
  displayName: "Slow test pulsar",
  periodMs: 100,
  phaseOffsetMs: 0,
};

describe("computePulsars", () => {
  it("derives phase from elapsed time since the epoch", () => {
    const [state] = computePulsars(afterEpoch(250), [SLOW], 10);

    expect(state?.phase).toBe(0.5);
    expect(state?.pulsed).toBe(false);
    expect(state?.pulsesInInterval).toBe(0);
    expect(state?.intensity).toBeCloseTo(Math.exp(-12.5), 12);
  });

  it("shifts the zero crossing by the phase offset", () => {
    const [state] = computePulsars(
      afterEpoch(250),
      [{ ...SLOW, phaseOffsetMs: 25 }],
      10
    );
    expect(state?.phase).toBe(0.25);
  });

  it("flags a pulse when phase zero falls in the tick interval", () => {
    const [crossing] = computePulsars(afterEpoch(205), [SLOW], 10);
    expect(crossing?.pulsed).toBe(true);
    expect(crossing?.pulsesInInterval).toBe(1);

    const [exact] = computePulsars(afterEpoch(200), [SLOW], 100);
    expect(exact?.phase).toBe(0);
    expect(exact?.intensity).toBe(1);
    expect(exact?.pulsed).toBe(true);
  });

  it("counts many crossings for a pulsar faster than the tick", () => {
    const [state] = computePulsars(
      afterEpoch(1000),
      [{ ...SLOW, periodMs: 10 }],
      100
    );
    expect(state?.pulsesInInterval).toBe(10);
  });

  it("keeps phase in [0, 1) before the epoch", () => {
    const [state] = computePulsars(afterEpoch(-25), [SLOW], 10);
    expect(state?.phase).toBe(0.75);
  });

  it("is idempotent for the same instant", () => {
    const instant = afterEpoch(123_456_789);
    expect(computePulsars(instant, DEFAULT_PULSARS, 100)).toEqual(
      computePulsars(instant, DEFAULT_PULSARS, 100)
    );
  });

  it("keeps configured order and indexes by id", () => {
    const states = computePulsars(afterEpoch(0), DEFAULT_PULSARS, 100);

    expect(states.map((s) => s.id)).toEqual(["crab", "b1937", "j0737", "b1919"]);
    expect(pulsarsById(states).b1919?.periodMs).toBe(1337.3);
  });

  it("rejects non-positive periods and duplicate ids", () => {
    let caught: unknown;
    try {
      computePulsars(afterEpoch(0), [{ ...SLOW, periodMs: 0 }, SLOW], 10);
    } catch (error) {
      caught = error;
    }

    expect(isConfigurationError(caught)).toBe(true);
    if (isConfigurationError(caught)) {
      expect(caught.issues.map((i) => i.path)).toEqual([
        "pulsars.0.period_ms",
        "pulsars.1.id",
      ]);
    }
  });
});

describe("pulseIntensity", () => {
  it("is symmetric around phase zero", () => {
    expect(pulseIntensity(0.1)).toBeCloseTo(pulseIntensity(0.9), 12);
    expect(pulseIntensity(0.1)).toBeCloseTo(Math.exp(-0.5), 12);
  });
});
