// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/ports`
 * Purpose: Time-source ports barrel export.
 * Scope: Re-exports port interfaces. Does not contain implementations.
 * Invariants: All exports are types only.
 * Side-effects: none
 * Links: src/network-time-sync.ts
 * @public
 */

export type { ClockSource } from "./clock.port.js";
export type {
  NtpClient,
  NtpQueryOptions,
  NtpSample,
} from "./ntp-client.port.js";
