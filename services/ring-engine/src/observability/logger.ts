// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers and flush them on shutdown. Does not handle request-scoped logging.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads logging-specific env vars directly (NODE_ENV, LOG_LEVEL, SERVICE_NAME) so the boot logger works before env() validation.
 * Links: src/main.ts, src/bootstrap/container.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

export type { Logger } from "pino";

const destinations: Array<ReturnType<typeof pino.destination>> = [];

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "ring-engine";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const destination = pino.destination({
    dest: 1,
    sync: nodeEnv !== "production",
    minLength: nodeEnv === "production" ? 4096 : 0,
  });
  destinations.push(destination);

  return pino(
    {
      level,
      enabled: !isTestTooling,
      // Bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, app: "concentric-time", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Writes buffered lines before the process exits */
export function flushLogger(): void {
  for (const destination of destinations) {
    destination.flushSync();
  }
}
