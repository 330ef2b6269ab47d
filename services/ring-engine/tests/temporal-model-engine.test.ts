// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/tests/temporal-model-engine`
 * Purpose: Unit tests for snapshot assembly.
 * Scope: Single clock read per tick, ring failure isolation, disabled rings, freezing and sequencing.
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  CalendarDomainError,
  DEFAULT_PULSARS,
  isConfigurationError,
  type RingId,
  type TimeReading,
} from "@concentric/temporal-core";

import {
  DEFAULT_RING_CALCULATORS,
  type EngineRingConfig,
  type RingCalculators,
  TemporalModelEngine,
  type TemporalModelEngineOptions,
} from "../src/engine/temporal-model-engine.js";
import { makeNoopLogger } from "../src/observability/logger.js";

const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

const ALL_RINGS: Record<RingId, boolean> = {
  localTime: true,
  hebrew: true,
  atomicTime: true,
  pulsar: true,
  earthRotation: true,
  astronomicalYear: true,
};

const CONFIG: EngineRingConfig = {
  timeZone: "UTC",
  location: { latitude: 52.23, longitude: 21.01 },
  tickIntervalMs: 100,
  pulsars: DEFAULT_PULSARS,
  landmarks: [{ name: "Cairo", latitude: 30.04, longitude: 31.24 }],
  rings: ALL_RINGS,
};

function reading(epochMs = T0): TimeReading {
  return {
    epochMs,
    localEpochMs: epochMs - 40,
    offsetMs: 40,
    syncStatus: "synced",
    lastSyncEpochMs: epochMs - 1000,
    server: "a.ntp.test",
    roundTripMs: 12,
  };
}

function spyCalculators() {
  return {
    localTime: vi.fn(DEFAULT_RING_CALCULATORS.localTime),
    hebrew: vi.fn(DEFAULT_RING_CALCULATORS.hebrew),
    atomicTime: vi.fn(DEFAULT_RING_CALCULATORS.atomicTime),
    pulsar: vi.fn(DEFAULT_RING_CALCULATORS.pulsar),
    earthRotation: vi.fn(DEFAULT_RING_CALCULATORS.earthRotation),
    astronomicalYear: vi.fn(DEFAULT_RING_CALCULATORS.astronomicalYear),
  } satisfies RingCalculators;
}

function setup(overrides: Partial<TemporalModelEngineOptions> = {}) {
  const now = vi.fn(() => reading());
  const logger = makeNoopLogger();
  const engine = new TemporalModelEngine({
    config: CONFIG,
    timeSource: { now },
    logger,
    ...overrides,
  });
  return { engine, now, logger };
}

describe("TemporalModelEngine", () => {
  it("reads the clock once and hands every ring the same instant", () => {
    const calculators = spyCalculators();
    const { engine, now } = setup({ calculators });

    const snapshot = engine.tick();

    expect(now).toHaveBeenCalledTimes(1);
    expect(snapshot.instant.epochMs).toBe(T0);
    for (const spy of Object.values(calculators)) {
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0]?.[0]).toBe(snapshot.instant);
    }
    expect(calculators.atomicTime.mock.calls[0]?.[1]).toBe(snapshot.trust);
  });

  it("reuses the solar position for the earth rotation ring", () => {
    const calculators = spyCalculators();
    const { engine } = setup({ calculators });

    const snapshot = engine.tick();

    const solar = snapshot.rings.astronomicalYear;
    expect(solar.status).toBe("ok");
    if (solar.status === "ok") {
      expect(calculators.earthRotation.mock.calls[0]?.[3]).toBe(solar.value);
    }
  });

  it("computes every ring for a live instant", () => {
    const { engine } = setup();

    const { rings, trust, timeZone } = engine.tick();

    expect(timeZone).toBe("UTC");
    expect(trust.syncStatus).toBe("synced");
    expect(Object.values(rings).map((r) => r.status)).toEqual([
      "ok",
      "ok",
      "ok",
      "ok",
      "ok",
      "ok",
    ]);
    if (rings.localTime.status === "ok") {
      expect(rings.localTime.value.display).toBe("12:00:00");
    }
    if (rings.hebrew.status === "ok") {
      expect(rings.hebrew.value.year).toBe(5784);
      expect(rings.hebrew.value.monthName).toBe("Tevet");
    }
    if (rings.atomicTime.status === "ok") {
      expect(rings.atomicTime.value.offsetMs).toBe(40);
      expect(rings.atomicTime.value.server).toBe("a.ntp.test");
    }
    if (rings.pulsar.status === "ok") {
      expect(rings.pulsar.value.map((p) => p.id)).toEqual([
        "crab",
        "b1937",
        "j0737",
        "b1919",
      ]);
    }
    if (rings.earthRotation.status === "ok") {
      expect(rings.earthRotation.value.landmarks.map((l) => l.name)).toEqual([
        "Cairo",
      ]);
    }
  });

  it("marks a calendar domain failure unavailable and keeps the other rings", () => {
    const onRingUnavailable = vi.fn();
    const { engine } = setup({
      calculators: {
        hebrew: () => {
          throw new CalendarDomainError("Hebrew", T0);
        },
      },
      onRingUnavailable,
    });

    const { rings } = engine.tick();

    expect(rings.hebrew).toEqual({
      status: "unavailable",
      code: "CALENDAR_DOMAIN",
      reason: `Instant ${T0} lies before the Hebrew calendar epoch and cannot be converted`,
    });
    expect(rings.localTime.status).toBe("ok");
    expect(rings.pulsar.status).toBe("ok");
    expect(onRingUnavailable).toHaveBeenCalledWith("hebrew", "CALENDAR_DOMAIN");
  });

  it("rejects an instant before the Hebrew epoch on the real calendar", () => {
    const ancient = Date.UTC(-4000, 0, 1);
    const { engine } = setup({ timeSource: { now: () => reading(ancient) } });

    const { rings } = engine.tick();

    expect(rings.hebrew.status).toBe("unavailable");
    if (rings.hebrew.status === "unavailable") {
      expect(rings.hebrew.code).toBe("CALENDAR_DOMAIN");
    }
    expect(rings.astronomicalYear.status).toBe("ok");
  });

  it("isolates unexpected errors and logs them once per failure streak", () => {
    const { engine, logger } = setup({
      calculators: {
        pulsar: () => {
          throw new TypeError("boom");
        },
      },
    });
    const error = vi.spyOn(logger, "error");

    const first = engine.tick();
    engine.tick();

    expect(first.rings.pulsar).toEqual({
      status: "unavailable",
      code: "RING_COMPUTE_FAILED",
      reason: "boom",
    });
    expect(first.rings.earthRotation.status).toBe("ok");
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("skips disabled rings without calling their calculators", () => {
    const calculators = spyCalculators();
    const { engine } = setup({
      calculators,
      config: {
        ...CONFIG,
        rings: { ...ALL_RINGS, pulsar: false, astronomicalYear: false },
      },
    });

    const { rings } = engine.tick();

    expect(rings.pulsar).toEqual({ status: "disabled" });
    expect(rings.astronomicalYear).toEqual({ status: "disabled" });
    expect(calculators.pulsar).not.toHaveBeenCalled();
    expect(calculators.astronomicalYear).not.toHaveBeenCalled();
    expect(calculators.earthRotation.mock.calls[0]?.[3]).toBeUndefined();
    expect(rings.earthRotation.status).toBe("ok");
  });

  it("deep-freezes snapshots and numbers them in order", () => {
    const { engine } = setup();

    const first = engine.tick();
    const second = engine.tick();

    expect([first.sequence, second.sequence]).toEqual([1, 2]);
    expect(engine.lastSequence).toBe(2);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.rings)).toBe(true);
    expect(Object.isFrozen(first.trust)).toBe(true);
    const pulsar = first.rings.pulsar;
    expect(pulsar.status).toBe("ok");
    if (pulsar.status === "ok") {
      expect(Object.isFrozen(pulsar.value)).toBe(true);
      expect(Object.isFrozen(pulsar.value[0])).toBe(true);
    }
  });

  it("rejects an unknown timezone at construction", () => {
    let caught: unknown;
    try {
      setup({ config: { ...CONFIG, timeZone: "Nowhere/Land" } });
    } catch (error) {
      caught = error;
    }

    expect(isConfigurationError(caught)).toBe(true);
  });
});
