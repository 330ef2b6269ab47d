// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/network-time-sync`
 * Purpose: Best-available clock: local time corrected by the latest NTP offset, with sync scheduling and trust status.
 * Scope: Server fallback, in-flight coalescing, periodic resync, staleness and drift. Does not speak UDP itself (NtpClient port).
 * Invariants:
 *   - now() never throws and never waits on the network
 *   - sync() never rejects; at most one sync is in flight and concurrent callers share its promise
 *   - State is a frozen object replaced in a single assignment
 *   - An aborted sync leaves the state untouched
 *   - After all servers fail the previous offset is kept; status is "failed" with an offset, "unsynced" without
 * Side-effects: IO (via NtpClient), timers (start/stop)
 * Links: src/ports/ntp-client.port.ts, src/ports/clock.port.ts
 * @public
 */

import {
  ConfigurationError,
  type ConfigurationIssue,
  isTimeSourceError,
  type SyncStatus,
  TimeSourceError,
  type TimeSourceErrorCode,
  type TimeReading,
} from "@concentric/temporal-core";

import type { ClockSource } from "./ports/clock.port.js";
import type { NtpClient, NtpSample } from "./ports/ntp-client.port.js";

/**
 * Logger interface expected by the time source.
 * Compatible with pino's Logger type.
 */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
}

const noopLogger: LoggerLike = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface SyncFailure {
  readonly code: TimeSourceErrorCode;
  readonly atEpochMs: number;
}

export interface TimeSourceState {
  readonly networkOffsetMs?: number;
  /** Corrected time of the last successful sync */
  readonly lastSyncEpochMs?: number;
  /** Local clock reading of the last successful sync */
  readonly lastSyncLocalEpochMs?: number;
  readonly lastServer?: string;
  readonly roundTripMs?: number;
  /** Offset change per elapsed local time between the last two syncs, parts per million */
  readonly driftPpm?: number;
  readonly lastFailure?: SyncFailure;
  readonly syncStatus: SyncStatus;
}

export type SyncResult =
  | {
      readonly ok: true;
      readonly status: "synced";
      readonly offsetMs: number;
      readonly roundTripMs: number;
      readonly server: string;
    }
  | {
      readonly ok: false;
      readonly status: "failed";
      readonly error: TimeSourceError;
    };

export interface NetworkTimeSyncOptions {
  /** Tried in order; first success wins */
  readonly servers: readonly string[];
  readonly timeoutMs: number;
  readonly syncIntervalMs: number;
  readonly stalenessThresholdMs: number;
  readonly client: NtpClient;
  readonly clock: ClockSource;
  readonly logger?: LoggerLike;
  /** Called with every completed (not aborted) sync result */
  readonly onSyncResult?: (result: SyncResult) => void;
}

const INITIAL_STATE: TimeSourceState = Object.freeze({
  syncStatus: "unsynced" as const,
});

export class NetworkTimeSync {
  private state: TimeSourceState = INITIAL_STATE;
  private inFlight: Promise<SyncResult> | undefined;
  private controller: AbortController | undefined;
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly logger: LoggerLike;

  constructor(private readonly options: NetworkTimeSyncOptions) {
    const issues: ConfigurationIssue[] = [];
    if (options.servers.length === 0) {
      issues.push({
        path: "ntp.servers",
        message: "At least one server is required",
      });
    }
    for (const [path, value] of [
      ["ntp.timeout_ms", options.timeoutMs],
      ["ntp.sync_interval_ms", options.syncIntervalMs],
      ["ntp.staleness_threshold_ms", options.stalenessThresholdMs],
    ] as const) {
      if (!(value > 0)) {
        issues.push({ path, message: `Must be positive, got ${value}` });
      }
    }
    if (issues.length > 0) throw new ConfigurationError(issues);
    this.logger = options.logger ?? noopLogger;
  }

  /** Current state with staleness applied */
  getState(): TimeSourceState {
    const local = this.options.clock.now();
    const status = this.statusAt(local + (this.state.networkOffsetMs ?? 0));
    return status === this.state.syncStatus
      ? this.state
      : Object.freeze({ ...this.state, syncStatus: status });
  }

  now(): TimeReading {
    const state = this.state;
    const localEpochMs = this.options.clock.now();
    const offsetMs = state.networkOffsetMs ?? 0;
    const epochMs = localEpochMs + offsetMs;

    return {
      epochMs,
      localEpochMs,
      offsetMs,
      syncStatus: this.statusAt(epochMs),
      ...(state.lastSyncEpochMs !== undefined
        ? { lastSyncEpochMs: state.lastSyncEpochMs }
        : {}),
      ...(state.lastServer !== undefined ? { server: state.lastServer } : {}),
      ...(state.roundTripMs !== undefined
        ? { roundTripMs: state.roundTripMs }
        : {}),
    };
  }

  sync(): Promise<SyncResult> {
    if (this.inFlight) return this.inFlight;

    const controller = new AbortController();
    const run: Promise<SyncResult> = this.runSync(controller.signal).finally(
      () => {
        if (this.inFlight === run) {
          this.inFlight = undefined;
          this.controller = undefined;
        }
      }
    );
    this.controller = controller;
    this.inFlight = run;
    return run;
  }

  /** Fire-and-forget trigger; coalesces with an in-flight sync */
  requestSync(): void {
    // sync() never rejects
    void this.sync();
  }

  start(): void {
    if (this.timer !== undefined) return;
    this.requestSync();
    this.timer = setInterval(
      () => this.requestSync(),
      this.options.syncIntervalMs
    );
    this.timer.unref();
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.controller?.abort();
  }

  private statusAt(epochMs: number): SyncStatus {
    const { syncStatus, lastSyncEpochMs } = this.state;
    if (
      syncStatus === "synced" &&
      lastSyncEpochMs !== undefined &&
      epochMs - lastSyncEpochMs > this.options.stalenessThresholdMs
    ) {
      return "stale";
    }
    return syncStatus;
  }

  private async runSync(signal: AbortSignal): Promise<SyncResult> {
    const { servers, timeoutMs, client } = this.options;
    const causes: TimeSourceError[] = [];

    for (const server of servers) {
      if (signal.aborted) break;
      try {
        const sample = await client.query(server, { timeoutMs, signal });
        if (signal.aborted) break;
        return this.report(this.applySample(sample));
      } catch (error) {
        const failure = isTimeSourceError(error)
          ? error
          : new TimeSourceError(
              "NETWORK_ERROR",
              `${server}: ${error instanceof Error ? error.message : String(error)}`,
              { server, cause: error }
            );
        if (failure.code === "ABORTED") break;
        causes.push(failure);
        this.logger.warn(
          { server, code: failure.code, err: failure.message },
          "ntp server query failed"
        );
      }
    }

    if (signal.aborted) {
      return {
        ok: false,
        status: "failed",
        error: new TimeSourceError("ABORTED", "Sync aborted"),
      };
    }

    const error = new TimeSourceError(
      "NO_SERVER_REACHABLE",
      `No NTP server reachable (tried ${servers.join(", ")})`,
      { causes }
    );
    const previous = this.state;
    const next: TimeSourceState = {
      ...previous,
      syncStatus: previous.networkOffsetMs !== undefined ? "failed" : "unsynced",
      lastFailure: Object.freeze({
        code: error.code,
        atEpochMs: this.options.clock.now(),
      }),
    };
    this.state = Object.freeze(next);
    this.logger.error(
      { code: error.code, attempts: causes.map((c) => c.code) },
      "ntp sync failed"
    );
    return this.report({ ok: false, status: "failed", error });
  }

  private applySample(sample: NtpSample): SyncResult {
    const previous = this.state;
    const local = this.options.clock.now();

    let driftPpm: number | undefined;
    if (
      previous.networkOffsetMs !== undefined &&
      previous.lastSyncLocalEpochMs !== undefined &&
      local > previous.lastSyncLocalEpochMs
    ) {
      driftPpm =
        ((sample.offsetMs - previous.networkOffsetMs) /
          (local - previous.lastSyncLocalEpochMs)) *
        1e6;
    }

    const next: TimeSourceState = {
      networkOffsetMs: sample.offsetMs,
      lastSyncEpochMs: local + sample.offsetMs,
      lastSyncLocalEpochMs: local,
      lastServer: sample.server,
      roundTripMs: sample.roundTripMs,
      ...(driftPpm !== undefined ? { driftPpm } : {}),
      ...(previous.lastFailure ? { lastFailure: previous.lastFailure } : {}),
      syncStatus: "synced",
    };
    this.state = Object.freeze(next);
    this.logger.info(
      {
        server: sample.server,
        offsetMs: sample.offsetMs,
        roundTripMs: sample.roundTripMs,
        stratum: sample.stratum,
      },
      "ntp sync succeeded"
    );

    return {
      ok: true,
      status: "synced",
      offsetMs: sample.offsetMs,
      roundTripMs: sample.roundTripMs,
      server: sample.server,
    };
  }

  private report(result: SyncResult): SyncResult {
    if (this.options.onSyncResult) {
      try {
        this.options.onSyncResult(result);
      } catch (error) {
        this.logger.error(
          { err: error instanceof Error ? error.message : String(error) },
          "sync result hook threw"
        );
      }
    }
    return result;
  }
}
