// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/ports/ntp-client`
 * Purpose: Transport-agnostic port for a single NTP query against one server.
 * Scope: Defines the query contract and sample shape. Does not contain implementations or socket imports.
 * Invariants:
 *   - query() rejects only with TimeSourceError
 *   - An aborted signal rejects with code ABORTED
 *   - offsetMs is what must be added to the local clock to obtain server time
 * Side-effects: none (interface definition only)
 * Links: src/ntp/udp-ntp-client.ts, tests/_fakes/fake-ntp-client.ts
 * @public
 */

export interface NtpQueryOptions {
  /** Budget for this single server, DNS included */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export interface NtpSample {
  /** Host name as configured */
  readonly server: string;
  /** Resolved address the reply came from */
  readonly address: string;
  readonly offsetMs: number;
  readonly roundTripMs: number;
  readonly stratum: number;
}

export interface NtpClient {
  query(host: string, options: NtpQueryOptions): Promise<NtpSample>;
}
