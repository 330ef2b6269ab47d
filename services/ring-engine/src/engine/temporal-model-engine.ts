// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/engine/temporal-model-engine`
 * Purpose: Produces one snapshot of all six rings per tick from a single clock reading.
 * Scope: Instant capture, ring dispatch, failure isolation, snapshot assembly. Does not schedule ticks or perform IO.
 * Invariants:
 *   - timeSource.now() is read exactly once per tick; every ring sees the same Instant
 *   - A throwing ring becomes `unavailable`; the other rings are unaffected
 *   - Snapshots are deep-frozen and their sequence increases by one per tick
 * Side-effects: none
 * Links: src/engine/tick-loop.ts, packages/temporal-core/src/index.ts
 * @public
 */

import {
  type AtomicTimeState,
  assertValidTimeZone,
  computeAtomicTime,
  computeEarthRotation,
  computeLocalTime,
  computePulsars,
  computeSolarPosition,
  convertToHebrew,
  type GeoLocation,
  type HebrewDate,
  type Instant,
  instantFromEpochMs,
  isCalendarDomainError,
  isConfigurationError,
  type Landmark,
  type LocalTimeState,
  type PulsarConfig,
  type PulsarState,
  type RingId,
  type RingResult,
  type RotationState,
  type SolarPosition,
  type TimeReading,
} from "@concentric/temporal-core";

import type { Logger } from "../observability/logger.js";

/** Anything that can answer "what time is it" with trust metadata */
export interface TimeSource {
  now(): TimeReading;
}

export interface RingStates {
  readonly localTime: LocalTimeState;
  readonly hebrew: HebrewDate;
  readonly atomicTime: AtomicTimeState;
  readonly pulsar: readonly PulsarState[];
  readonly earthRotation: RotationState;
  readonly astronomicalYear: SolarPosition;
}

export type SnapshotRings = {
  readonly [K in RingId]: RingResult<RingStates[K]>;
};

export interface Snapshot {
  readonly sequence: number;
  readonly instant: Instant;
  readonly timeZone: string;
  readonly trust: TimeReading;
  readonly rings: SnapshotRings;
}

export interface RingCalculators {
  localTime(instant: Instant, timeZone: string): LocalTimeState;
  hebrew(instant: Instant, timeZone: string): HebrewDate;
  atomicTime(
    instant: Instant,
    reading: TimeReading,
    timeZone: string
  ): AtomicTimeState;
  pulsar(
    instant: Instant,
    pulsars: readonly PulsarConfig[],
    tickIntervalMs: number
  ): readonly PulsarState[];
  earthRotation(
    instant: Instant,
    location: GeoLocation,
    landmarks: readonly Landmark[],
    sun?: SolarPosition
  ): RotationState;
  astronomicalYear(instant: Instant): SolarPosition;
}

export const DEFAULT_RING_CALCULATORS: RingCalculators = {
  localTime: computeLocalTime,
  hebrew: convertToHebrew,
  atomicTime: computeAtomicTime,
  pulsar: computePulsars,
  earthRotation: computeEarthRotation,
  astronomicalYear: computeSolarPosition,
};

export interface EngineRingConfig {
  readonly timeZone: string;
  readonly location: GeoLocation;
  readonly tickIntervalMs: number;
  readonly pulsars: readonly PulsarConfig[];
  readonly landmarks: readonly Landmark[];
  readonly rings: Readonly<Record<RingId, boolean>>;
}

export interface TemporalModelEngineOptions {
  readonly config: EngineRingConfig;
  readonly timeSource: TimeSource;
  readonly logger: Logger;
  /** Replaces individual calculators; the rest keep their defaults */
  readonly calculators?: Partial<RingCalculators>;
  readonly onRingUnavailable?: (ring: RingId, code: string) => void;
}

export const RING_COMPUTE_FAILED = "RING_COMPUTE_FAILED";

const DISABLED = Object.freeze({ status: "disabled" as const });

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export class TemporalModelEngine {
  private sequence = 0;
  private readonly calculators: RingCalculators;
  /** Last reported unavailable code per ring, so repeated failures log once */
  private readonly failing = new Map<RingId, string>();

  constructor(private readonly options: TemporalModelEngineOptions) {
    assertValidTimeZone(options.config.timeZone);
    this.calculators = { ...DEFAULT_RING_CALCULATORS, ...options.calculators };
  }

  get lastSequence(): number {
    return this.sequence;
  }

  tick(): Snapshot {
    const { config, timeSource } = this.options;
    const reading = timeSource.now();
    const instant = instantFromEpochMs(reading.epochMs);
    const calc = this.calculators;
    const tz = config.timeZone;

    const astronomicalYear = this.evaluate("astronomicalYear", () =>
      calc.astronomicalYear(instant)
    );
    const sun =
      astronomicalYear.status === "ok" ? astronomicalYear.value : undefined;

    const rings: SnapshotRings = {
      localTime: this.evaluate("localTime", () => calc.localTime(instant, tz)),
      hebrew: this.evaluate("hebrew", () => calc.hebrew(instant, tz)),
      atomicTime: this.evaluate("atomicTime", () =>
        calc.atomicTime(instant, reading, tz)
      ),
      pulsar: this.evaluate("pulsar", () =>
        calc.pulsar(instant, config.pulsars, config.tickIntervalMs)
      ),
      earthRotation: this.evaluate("earthRotation", () =>
        calc.earthRotation(instant, config.location, config.landmarks, sun)
      ),
      astronomicalYear,
    };

    this.sequence += 1;
    return deepFreeze({
      sequence: this.sequence,
      instant,
      timeZone: tz,
      trust: reading,
      rings,
    });
  }

  private evaluate<K extends RingId>(
    ring: K,
    compute: () => RingStates[K]
  ): RingResult<RingStates[K]> {
    if (!this.options.config.rings[ring]) return DISABLED;

    try {
      const value = compute();
      if (this.failing.delete(ring)) {
        this.options.logger.info({ ring }, "ring recovered");
      }
      return { status: "ok", value };
    } catch (error) {
      const unavailable =
        isCalendarDomainError(error) || isConfigurationError(error)
          ? { code: error.code, reason: error.message }
          : {
              code: RING_COMPUTE_FAILED,
              reason: error instanceof Error ? error.message : String(error),
            };

      if (this.failing.get(ring) !== unavailable.code) {
        this.failing.set(ring, unavailable.code);
        if (unavailable.code === RING_COMPUTE_FAILED) {
          this.options.logger.error(
            { ring, err: error },
            "ring computation failed"
          );
        } else {
          this.options.logger.warn(
            { ring, code: unavailable.code, reason: unavailable.reason },
            "ring unavailable"
          );
        }
      }
      this.options.onRingUnavailable?.(ring, unavailable.code);
      return { status: "unavailable", ...unavailable };
    }
  }
}
