// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/ntp/udp-ntp-client`
 * Purpose: NtpClient adapter that performs one SNTPv4 exchange over UDP.
 * Scope: DNS resolution, socket lifecycle, timeout and abort handling. Does not retry or choose between servers.
 * Invariants:
 *   - Exactly one request datagram per query
 *   - The socket is closed on every outcome
 *   - Rejections are always TimeSourceError (DNS_RESOLUTION_FAILED, TIMEOUT, INVALID_RESPONSE, NETWORK_ERROR, ABORTED)
 * Side-effects: IO (DNS lookup, UDP socket)
 * Links: src/ntp/packet.ts, src/ports/ntp-client.port.ts
 * @public
 */

import { createSocket, type Socket } from "node:dgram";
import { lookup as dnsLookup } from "node:dns/promises";

import { isTimeSourceError, TimeSourceError } from "@concentric/temporal-core";

import type { ClockSource } from "../ports/clock.port.js";
import type {
  NtpClient,
  NtpQueryOptions,
  NtpSample,
} from "../ports/ntp-client.port.js";
import { SystemClock } from "../system-clock.js";
import {
  computeClockOffset,
  createClientRequest,
  parseServerResponse,
} from "./packet.js";

export const DEFAULT_NTP_PORT = 123;

export interface ResolvedAddress {
  readonly address: string;
  readonly family: number;
}

export type HostLookup = (host: string) => Promise<ResolvedAddress>;

export interface UdpNtpClientOptions {
  /** Destination port (default 123) */
  readonly port?: number;
  readonly lookup?: HostLookup;
  /** Local clock used for t1 and t4 */
  readonly clock?: ClockSource;
}

type Outcome =
  | { readonly ok: true; readonly sample: NtpSample }
  | { readonly ok: false; readonly error: TimeSourceError };

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class UdpNtpClient implements NtpClient {
  private readonly port: number;
  private readonly lookup: HostLookup;
  private readonly clock: ClockSource;

  constructor(options: UdpNtpClientOptions = {}) {
    this.port = options.port ?? DEFAULT_NTP_PORT;
    this.lookup = options.lookup ?? ((host) => dnsLookup(host));
    this.clock = options.clock ?? new SystemClock();
  }

  query(host: string, options: NtpQueryOptions): Promise<NtpSample> {
    const { timeoutMs, signal } = options;

    return new Promise<NtpSample>((resolve, reject) => {
      let socket: Socket | undefined;
      let timer: ReturnType<typeof setTimeout> | undefined;
      let settled = false;

      const settle = (outcome: Outcome): void => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        socket?.close();
        if (outcome.ok) resolve(outcome.sample);
        else reject(outcome.error);
      };

      const fail = (
        code: TimeSourceError["code"],
        message: string,
        cause?: unknown
      ): void =>
        settle({
          ok: false,
          error: new TimeSourceError(code, `${host}: ${message}`, {
            server: host,
            cause,
          }),
        });

      const onAbort = (): void => fail("ABORTED", "query aborted");

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      timer = setTimeout(
        () => fail("TIMEOUT", `no reply within ${timeoutMs} ms`),
        timeoutMs
      );

      const exchange = async (): Promise<void> => {
        let resolved: ResolvedAddress;
        try {
          resolved = await this.lookup(host);
        } catch (error) {
          fail("DNS_RESOLUTION_FAILED", describe(error), error);
          return;
        }
        if (settled) return;
        const { address, family } = resolved;

        const udp = createSocket(family === 6 ? "udp6" : "udp4");
        socket = udp;
        const t1 = this.clock.now();
        const request = createClientRequest(t1);

        udp.on("error", (error) =>
          fail("NETWORK_ERROR", describe(error), error)
        );
        udp.on("message", (message) => {
          const t4 = this.clock.now();
          try {
            const reply = parseServerResponse(
              message,
              request.transmitTimestamp,
              host
            );
            const { offsetMs, roundTripMs } = computeClockOffset(
              t1,
              reply.receiveEpochMs,
              reply.transmitEpochMs,
              t4
            );
            settle({
              ok: true,
              sample: {
                server: host,
                address,
                offsetMs,
                roundTripMs,
                stratum: reply.stratum,
              },
            });
          } catch (error) {
            if (isTimeSourceError(error)) settle({ ok: false, error });
            else fail("INVALID_RESPONSE", describe(error), error);
          }
        });
        udp.send(request.packet, this.port, address, (error) => {
          if (error) fail("NETWORK_ERROR", describe(error), error);
        });
      };

      exchange().catch((error: unknown) =>
        fail("NETWORK_ERROR", describe(error), error)
      );
    });
  }
}
