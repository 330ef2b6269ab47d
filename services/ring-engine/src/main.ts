// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/main`
 * Purpose: Service entry point with graceful shutdown. Loads config, starts NTP sync, tick loop and health server.
 * Scope: Entry point that calls env() and wires lifecycle. Does not contain ring logic.
 * Invariants:
 *   - Invalid env or YAML config is fatal before any tick (exit 1)
 *   - Handles SIGTERM/SIGINT: ready=false, stop ticks, abort sync, close HTTP
 * Side-effects: IO (config file, UDP, HTTP, process signals)
 * Links: src/bootstrap/container.ts, config/rings.yaml
 * @public
 */

import { isConfigurationError } from "@concentric/temporal-core";

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { loadEngineConfig } from "./config/load-engine-config.js";
import { closeServer, type HealthState, startHealthServer } from "./health.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const config = env();
  const logger = makeLogger();

  const engineConfig = await loadEngineConfig(config.RING_CONFIG_PATH);
  logger.info(
    {
      configPath: config.RING_CONFIG_PATH,
      timeZone: engineConfig.timeZone,
      tickIntervalMs: engineConfig.tickIntervalMs,
      servers: engineConfig.ntp.servers,
    },
    "Starting ring engine"
  );

  const container = createContainer(config, engineConfig, logger);

  const healthState: HealthState = { ready: false };
  const server = startHealthServer(
    {
      state: healthState,
      snapshots: container.snapshots,
      timeSync: container.timeSync,
      registry: container.metrics.registry,
      logger: logger.child({ component: "health" }),
    },
    config.HEALTH_PORT
  );
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  container.timeSync.start();
  container.tickLoop.start();
  healthState.ready = true;
  logger.info({}, "Tick loop started, ready for traffic");

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false;
    logger.info({ signal }, "Received signal, shutting down");

    container.tickLoop.stop();
    container.timeSync.stop();
    try {
      await closeServer(server);
      logger.info({}, "Ring engine stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal(
    isConfigurationError(err) ? { err, issues: err.issues } : { err },
    "Fatal error during startup"
  );
  flushLogger();
  process.exit(1);
});
