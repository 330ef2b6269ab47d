// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/bootstrap/container`
 * Purpose: Composition root that wires concrete adapters to the engine, sync and metrics.
 * Scope: All adapter construction lives here. Starts nothing; main.ts owns lifecycle.
 * Invariants:
 * - Only file that constructs UdpNtpClient and SystemClock
 * - Adapters can be overridden for tests (in-process NTP client, fake clock)
 * Side-effects: none until the returned components are started
 * Links: src/main.ts, packages/time-sync/src/index.ts
 * @internal
 */

import {
  type ClockSource,
  NetworkTimeSync,
  type NtpClient,
  SystemClock,
  UdpNtpClient,
} from "@concentric/time-sync";
import type { Registry } from "prom-client";

import type { EngineConfig } from "../config/engine-config.schema.js";
import { LatestSnapshotStore } from "../engine/snapshot-store.js";
import {
  type RingCalculators,
  TemporalModelEngine,
} from "../engine/temporal-model-engine.js";
import { TickLoop } from "../engine/tick-loop.js";
import type { Logger } from "../observability/logger.js";
import {
  createEngineMetrics,
  type EngineMetrics,
  recordSyncResult,
  recordUnavailableRing,
} from "../observability/metrics.js";
import type { Env } from "./env.js";

export interface EngineContainer {
  config: EngineConfig;
  timeSync: NetworkTimeSync;
  engine: TemporalModelEngine;
  tickLoop: TickLoop;
  snapshots: LatestSnapshotStore;
  metrics: EngineMetrics;
  logger: Logger;
}

export interface ContainerOverrides {
  ntpClient?: NtpClient;
  clock?: ClockSource;
  registry?: Registry;
  calculators?: Partial<RingCalculators>;
}

/**
 * Build the engine container from validated env, engine config and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(
  env: Pick<Env, "NTP_PORT">,
  config: EngineConfig,
  logger: Logger,
  overrides: ContainerOverrides = {}
): EngineContainer {
  const clock = overrides.clock ?? new SystemClock();
  const metrics = createEngineMetrics({
    registry: overrides.registry,
    collectDefaults: overrides.registry === undefined,
  });

  const timeSync = new NetworkTimeSync({
    servers: config.ntp.servers,
    timeoutMs: config.ntp.timeoutMs,
    syncIntervalMs: config.ntp.syncIntervalMs,
    stalenessThresholdMs: config.ntp.stalenessThresholdMs,
    client:
      overrides.ntpClient ?? new UdpNtpClient({ port: env.NTP_PORT, clock }),
    clock,
    logger: logger.child({ component: "time-sync" }),
    onSyncResult: (result) => recordSyncResult(metrics, result),
  });

  const engine = new TemporalModelEngine({
    config,
    timeSource: timeSync,
    logger: logger.child({ component: "engine" }),
    calculators: overrides.calculators,
    onRingUnavailable: (ring, code) =>
      recordUnavailableRing(metrics, ring, code),
  });

  const snapshots = new LatestSnapshotStore();
  const tickLoop = new TickLoop({
    engine,
    sink: snapshots,
    intervalMs: config.tickIntervalMs,
    logger: logger.child({ component: "tick-loop" }),
    onTickDuration: (ms) => metrics.tickDurationMs.observe(ms),
  });

  return { config, timeSync, engine, tickLoop, snapshots, metrics, logger };
}
