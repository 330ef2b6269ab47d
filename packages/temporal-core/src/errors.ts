// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/errors`
 * Purpose: Domain error classes for time sources, calendar conversion and configuration.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: src/hebrew-calendar.ts, packages/time-sync/src/network-time-sync.ts
 * @public
 */

export const TIME_SOURCE_ERROR_CODES = [
  "DNS_RESOLUTION_FAILED",
  "TIMEOUT",
  "INVALID_RESPONSE",
  "NETWORK_ERROR",
  "ABORTED",
  "NO_SERVER_REACHABLE",
] as const;

export type TimeSourceErrorCode = (typeof TIME_SOURCE_ERROR_CODES)[number];

/**
 * Failure to obtain network time. Recovered inside the time source and
 * surfaced to renderers only as a sync status.
 */
export class TimeSourceError extends Error {
  public readonly code: TimeSourceErrorCode;
  public readonly server: string | undefined;
  /** Per-server causes when code is NO_SERVER_REACHABLE */
  public readonly causes: readonly TimeSourceError[];

  constructor(
    code: TimeSourceErrorCode,
    message: string,
    options: {
      server?: string;
      causes?: readonly TimeSourceError[];
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "TimeSourceError";
    this.code = code;
    this.server = options.server;
    this.causes = options.causes ?? [];
  }
}

export class CalendarDomainError extends Error {
  public readonly code = "CALENDAR_DOMAIN" as const;
  constructor(
    public readonly calendar: string,
    public readonly epochMs: number
  ) {
    super(
      `Instant ${epochMs} lies before the ${calendar} calendar epoch and cannot be converted`
    );
    this.name = "CalendarDomainError";
  }
}

export interface ConfigurationIssue {
  readonly path: string;
  readonly message: string;
}

export class ConfigurationError extends Error {
  public readonly code = "CONFIGURATION_INVALID" as const;
  constructor(public readonly issues: readonly ConfigurationIssue[]) {
    super(
      `Invalid configuration:\n${issues
        .map((i) => `  ${i.path || "(root)"}: ${i.message}`)
        .join("\n")}`
    );
    this.name = "ConfigurationError";
  }
}

// Type guards

export function isTimeSourceError(error: unknown): error is TimeSourceError {
  return error instanceof Error && error.name === "TimeSourceError";
}

export function isCalendarDomainError(
  error: unknown
): error is CalendarDomainError {
  return error instanceof Error && error.name === "CalendarDomainError";
}

export function isConfigurationError(
  error: unknown
): error is ConfigurationError {
  return error instanceof Error && error.name === "ConfigurationError";
}
