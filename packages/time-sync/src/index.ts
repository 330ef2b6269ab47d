// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync`
 * Purpose: Time-source subsystem: clock and NTP ports, SNTP codec, UDP client, NetworkTimeSync.
 * Scope: Re-exports public APIs. Does not start any timers on import.
 * Invariants: Consumers depend on ports; adapters are constructed in the composition root.
 * Side-effects: none
 * Links: src/network-time-sync.ts
 * @public
 */

export {
  type LoggerLike,
  NetworkTimeSync,
  type NetworkTimeSyncOptions,
  type SyncFailure,
  type SyncResult,
  type TimeSourceState,
} from "./network-time-sync.js";
export {
  type ClientRequest,
  computeClockOffset,
  createClientRequest,
  NTP_PACKET_SIZE,
  NTP_UNIX_OFFSET_SECONDS,
  type NtpReply,
  parseServerResponse,
  readTimestamp,
  writeTimestamp,
} from "./ntp/packet.js";
export {
  DEFAULT_NTP_PORT,
  type HostLookup,
  type ResolvedAddress,
  UdpNtpClient,
  type UdpNtpClientOptions,
} from "./ntp/udp-ntp-client.js";
export type {
  ClockSource,
  NtpClient,
  NtpQueryOptions,
  NtpSample,
} from "./ports/index.js";
export { SystemClock } from "./system-clock.js";
