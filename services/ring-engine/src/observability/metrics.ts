// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/observability/metrics`
 * Purpose: Prometheus metric definitions for time sync and ring ticks.
 * Scope: Registry construction and recording helpers. Does not serve HTTP (see health.ts).
 * Invariants: Labels are low-cardinality (ring id, outcome, error code).
 * Side-effects: Registers default process metrics on the given registry when asked
 * Links: src/health.ts, src/bootstrap/container.ts
 * @public
 */

import type { RingId } from "@concentric/temporal-core";
import type { SyncResult } from "@concentric/time-sync";
import type { Counter, Gauge, Histogram, Registry } from "prom-client";
import client from "prom-client";

export interface EngineMetrics {
  readonly registry: Registry;
  readonly ntpSyncTotal: Counter<"outcome" | "code">;
  readonly clockOffsetMs: Gauge;
  readonly ntpRoundTripMs: Gauge;
  readonly tickDurationMs: Histogram;
  readonly ringUnavailableTotal: Counter<"ring" | "code">;
}

export function createEngineMetrics(
  options: { registry?: Registry; collectDefaults?: boolean } = {}
): EngineMetrics {
  const registry = options.registry ?? new client.Registry();
  registry.setDefaultLabels({ app: "concentric-time" });
  if (options.collectDefaults) {
    client.collectDefaultMetrics({ register: registry });
  }

  return {
    registry,
    ntpSyncTotal: new client.Counter({
      name: "ntp_sync_total",
      help: "NTP sync attempts by outcome",
      labelNames: ["outcome", "code"],
      registers: [registry],
    }),
    clockOffsetMs: new client.Gauge({
      name: "clock_offset_ms",
      help: "Offset applied to the local clock from the last successful sync",
      registers: [registry],
    }),
    ntpRoundTripMs: new client.Gauge({
      name: "ntp_round_trip_ms",
      help: "Round-trip delay of the last successful sync",
      registers: [registry],
    }),
    tickDurationMs: new client.Histogram({
      name: "ring_tick_duration_ms",
      help: "Time spent computing one snapshot",
      buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 25, 50, 100],
      registers: [registry],
    }),
    ringUnavailableTotal: new client.Counter({
      name: "ring_unavailable_total",
      help: "Ring results that came back unavailable",
      labelNames: ["ring", "code"],
      registers: [registry],
    }),
  };
}

export function recordSyncResult(
  metrics: EngineMetrics,
  result: SyncResult
): void {
  if (result.ok) {
    metrics.ntpSyncTotal.inc({ outcome: "synced", code: "" });
    metrics.clockOffsetMs.set(result.offsetMs);
    metrics.ntpRoundTripMs.set(result.roundTripMs);
  } else {
    metrics.ntpSyncTotal.inc({ outcome: "failed", code: result.error.code });
  }
}

export function recordUnavailableRing(
  metrics: EngineMetrics,
  ring: RingId,
  code: string
): void {
  metrics.ringUnavailableTotal.inc({ ring, code });
}
