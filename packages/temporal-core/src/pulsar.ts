// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/pulsar`
 * Purpose: Simulated pulsar phases, pulse intensity and pulse events for an instant.
 * Scope: Stateless phase arithmetic from a fixed epoch. Does not model spin-down, glitches or dispersion.
 * Invariants:
 * - phase = frac((now - J2000 - phaseOffset) / period), always in [0, 1)
 * - Same instant and configuration yield identical states
 * - pulsed is true iff phase 0 was crossed in (now - tickInterval, now]
 * Side-effects: none
 * Links: src/model.ts
 * @public
 */

import { ConfigurationError, type ConfigurationIssue } from "./errors.js";
import type { Instant, PulsarConfig } from "./model.js";

/** 2000-01-01T12:00:00Z */
export const PULSAR_EPOCH_MS = Date.UTC(2000, 0, 1, 12, 0, 0);

/** Gaussian pulse width as a fraction of the period */
export const PULSE_WIDTH = 0.1;

export const DEFAULT_PULSARS: readonly PulsarConfig[] = [
  {
    id: "crab",
    displayName: "PSR B0531+21 (Crab)",
    periodMs: 33.0,
    phaseOffsetMs: 0,
  },
  {
    id: "b1937",
    displayName: "PSR B1937+21",
    periodMs: 1.558,
    phaseOffsetMs: 0,
  },
  {
    id: "j0737",
    displayName: "PSR J0737-3039A",
    periodMs: 22.7,
    phaseOffsetMs: 0,
  },
  {
    id: "b1919",
    displayName: "PSR B1919+21",
    periodMs: 1337.3,
    phaseOffsetMs: 0,
  },
];

export interface PulsarState {
  readonly id: string;
  readonly displayName: string;
  readonly periodMs: number;
  readonly phaseOffsetMs: number;
  readonly phase: number;
  readonly intensity: number;
  readonly pulsed: boolean;
  readonly pulsesInInterval: number;
}

export function validatePulsars(
  pulsars: readonly PulsarConfig[],
  path = "pulsars"
): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  const seen = new Set<string>();
  pulsars.forEach((p, i) => {
    if (!Number.isFinite(p.periodMs) || p.periodMs <= 0) {
      issues.push({
        path: `${path}.${i}.period_ms`,
        message: `Pulsar "${p.id}" period must be positive, got ${p.periodMs}`,
      });
    }
    if (!Number.isFinite(p.phaseOffsetMs)) {
      issues.push({
        path: `${path}.${i}.phase_offset_ms`,
        message: `Pulsar "${p.id}" phase offset must be finite`,
      });
    }
    if (seen.has(p.id)) {
      issues.push({
        path: `${path}.${i}.id`,
        message: `Duplicate pulsar id "${p.id}"`,
      });
    }
    seen.add(p.id);
  });
  return issues;
}

function cyclesAt(epochMs: number, pulsar: PulsarConfig): number {
  return (epochMs - PULSAR_EPOCH_MS - pulsar.phaseOffsetMs) / pulsar.periodMs;
}

export function pulseIntensity(phase: number): number {
  const distance = Math.min(phase, 1 - phase);
  return Math.exp(-(distance * distance) / (2 * PULSE_WIDTH * PULSE_WIDTH));
}

export function computePulsar(
  instant: Instant,
  pulsar: PulsarConfig,
  tickIntervalMs: number
): PulsarState {
  const cycles = cyclesAt(instant.epochMs, pulsar);
  const previous = cyclesAt(instant.epochMs - tickIntervalMs, pulsar);
  const phase = cycles - Math.floor(cycles);
  const pulsesInInterval = Math.max(
    0,
    Math.floor(cycles) - Math.floor(previous)
  );

  return {
    id: pulsar.id,
    displayName: pulsar.displayName,
    periodMs: pulsar.periodMs,
    phaseOffsetMs: pulsar.phaseOffsetMs,
    phase,
    intensity: pulseIntensity(phase),
    pulsed: pulsesInInterval > 0,
    pulsesInInterval,
  };
}

/**
 * States ordered as configured.
 *
 * @throws ConfigurationError for a non-positive period or duplicate id
 */
export function computePulsars(
  instant: Instant,
  pulsars: readonly PulsarConfig[],
  tickIntervalMs: number
): PulsarState[] {
  const issues = validatePulsars(pulsars);
  if (!(tickIntervalMs > 0)) {
    issues.push({
      path: "tick_interval_ms",
      message: `Tick interval must be positive, got ${tickIntervalMs}`,
    });
  }
  if (issues.length > 0) throw new ConfigurationError(issues);
  return pulsars.map((p) => computePulsar(instant, p, tickIntervalMs));
}

export function pulsarsById(
  states: readonly PulsarState[]
): Readonly<Record<string, PulsarState>> {
  return Object.fromEntries(states.map((s) => [s.id, s]));
}
