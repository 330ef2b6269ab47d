// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/temporal-core/model`
 * Purpose: Shared type definitions and constants for the ring calculators and the time source.
 * Scope: Enums (as const arrays), literal unions and interfaces. Does not contain logic.
 * Invariants:
 * - Instants are UTC-anchored epoch milliseconds; timezones are display-only
 * - Ring results are discriminated on `status`
 * Side-effects: none (constants and types only)
 * Links: src/instant.ts, packages/time-sync/src/network-time-sync.ts
 * @public
 */

/**
 * Absolute point in time. `iso` is the UTC rendering of `epochMs`.
 */
export interface Instant {
  readonly epochMs: number;
  readonly iso: string;
}

export const SYNC_STATUSES = ["unsynced", "synced", "stale", "failed"] as const;

export type SyncStatus = (typeof SYNC_STATUSES)[number];

/**
 * One read of the best-available clock: local reading plus network offset.
 */
export interface TimeReading {
  /** local + offset */
  readonly epochMs: number;
  /** Raw local clock reading */
  readonly localEpochMs: number;
  /** Applied offset; 0 when no sync has ever succeeded */
  readonly offsetMs: number;
  readonly syncStatus: SyncStatus;
  readonly lastSyncEpochMs?: number;
  readonly server?: string;
  readonly roundTripMs?: number;
}

export interface GeoLocation {
  /** Degrees, [-90, 90] */
  readonly latitude: number;
  /** Degrees, [-180, 180] */
  readonly longitude: number;
}

export interface Landmark extends GeoLocation {
  readonly name: string;
}

export interface PulsarConfig {
  readonly id: string;
  readonly displayName: string;
  /** Rotation period in milliseconds, > 0 */
  readonly periodMs: number;
  /** Shifts the zero crossing later by this many milliseconds */
  readonly phaseOffsetMs: number;
}

export const RING_IDS = [
  "localTime",
  "hebrew",
  "atomicTime",
  "pulsar",
  "earthRotation",
  "astronomicalYear",
] as const;

export type RingId = (typeof RING_IDS)[number];

export type RingResult<T> =
  | { readonly status: "ok"; readonly value: T }
  | {
      readonly status: "unavailable";
      readonly code: string;
      readonly reason: string;
    }
  | { readonly status: "disabled" };
