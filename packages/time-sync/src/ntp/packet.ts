// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/ntp/packet`
 * Purpose: SNTPv4 packet codec and clock-offset arithmetic.
 * Scope: Builds client requests, validates server replies, converts NTP timestamps. Does not touch sockets.
 * Invariants:
 *   - Packets are 48 bytes; requests carry LI=0, VN=4, mode=3
 *   - Replies must be mode 4, echo our transmit timestamp as originate, and carry stratum 1..15
 *   - Timestamps with the top seconds bit clear belong to NTP era 1 (after 2036-02-07)
 * Side-effects: none
 * Notes: Timestamps are 32-bit seconds since 1900-01-01 plus a 32-bit binary fraction.
 * Links: src/ntp/udp-ntp-client.ts
 * @public
 */

import { TimeSourceError } from "@concentric/temporal-core";

export const NTP_PACKET_SIZE = 48;

/** Seconds between 1900-01-01 and 1970-01-01 */
export const NTP_UNIX_OFFSET_SECONDS = 2_208_988_800;

const TWO_POW_32 = 0x1_0000_0000;
const ERA_ONE_THRESHOLD = 0x8000_0000;

const MODE_CLIENT = 3;
const MODE_SERVER = 4;
const VERSION = 4;
const LEAP_ALARM = 3;

const ORIGINATE_OFFSET = 24;
const RECEIVE_OFFSET = 32;
const TRANSMIT_OFFSET = 40;

export interface NtpReply {
  readonly leapIndicator: number;
  readonly version: number;
  readonly mode: number;
  readonly stratum: number;
  /** Server receive time (t2), epoch milliseconds */
  readonly receiveEpochMs: number;
  /** Server transmit time (t3), epoch milliseconds */
  readonly transmitEpochMs: number;
}

export interface ClientRequest {
  readonly packet: Buffer;
  /** Raw 8-byte transmit field the server must echo back */
  readonly transmitTimestamp: Buffer;
}

export function writeTimestamp(
  target: Buffer,
  offset: number,
  epochMs: number
): void {
  const seconds = Math.floor(epochMs / 1000);
  const fraction = Math.min(
    TWO_POW_32 - 1,
    Math.round(((epochMs - seconds * 1000) / 1000) * TWO_POW_32)
  );
  target.writeUInt32BE((seconds + NTP_UNIX_OFFSET_SECONDS) % TWO_POW_32, offset);
  target.writeUInt32BE(fraction, offset + 4);
}

export function readTimestamp(source: Buffer, offset: number): number {
  let seconds = source.readUInt32BE(offset);
  const fraction = source.readUInt32BE(offset + 4);
  if (seconds < ERA_ONE_THRESHOLD) seconds += TWO_POW_32;
  return (seconds - NTP_UNIX_OFFSET_SECONDS) * 1000 + (fraction / TWO_POW_32) * 1000;
}

export function createClientRequest(transmitEpochMs: number): ClientRequest {
  const packet = Buffer.alloc(NTP_PACKET_SIZE);
  packet.writeUInt8((VERSION << 3) | MODE_CLIENT, 0);
  writeTimestamp(packet, TRANSMIT_OFFSET, transmitEpochMs);
  return {
    packet,
    transmitTimestamp: Buffer.from(
      packet.subarray(TRANSMIT_OFFSET, TRANSMIT_OFFSET + 8)
    ),
  };
}

function invalid(server: string, message: string): TimeSourceError {
  return new TimeSourceError("INVALID_RESPONSE", `${server}: ${message}`, {
    server,
  });
}

/**
 * @throws TimeSourceError INVALID_RESPONSE when the reply cannot be trusted
 */
export function parseServerResponse(
  reply: Buffer,
  expectedOriginate: Buffer,
  server: string
): NtpReply {
  if (reply.length < NTP_PACKET_SIZE) {
    throw invalid(server, `reply of ${reply.length} bytes is too short`);
  }

  const header = reply.readUInt8(0);
  const leapIndicator = header >> 6;
  const version = (header >> 3) & 0b111;
  const mode = header & 0b111;
  const stratum = reply.readUInt8(1);

  if (mode !== MODE_SERVER) {
    throw invalid(server, `unexpected mode ${mode}`);
  }
  if (stratum === 0) {
    const kissCode = reply
      .subarray(12, 16)
      .toString("ascii")
      .replace(/\0+$/, "");
    throw invalid(server, `kiss-o'-death ${kissCode || "(empty)"}`);
  }
  if (stratum > 15) {
    throw invalid(server, `stratum ${stratum} is out of range`);
  }
  if (leapIndicator === LEAP_ALARM) {
    throw invalid(server, "server clock is not synchronized");
  }
  if (
    !reply
      .subarray(ORIGINATE_OFFSET, ORIGINATE_OFFSET + 8)
      .equals(expectedOriginate)
  ) {
    throw invalid(server, "originate timestamp does not match the request");
  }
  if (reply.readUInt32BE(TRANSMIT_OFFSET) === 0) {
    throw invalid(server, "transmit timestamp is zero");
  }

  return {
    leapIndicator,
    version,
    mode,
    stratum,
    receiveEpochMs: readTimestamp(reply, RECEIVE_OFFSET),
    transmitEpochMs: readTimestamp(reply, TRANSMIT_OFFSET),
  };
}

/**
 * t1 client send, t2 server receive, t3 server send, t4 client receive.
 */
export function computeClockOffset(
  t1: number,
  t2: number,
  t3: number,
  t4: number
): { offsetMs: number; roundTripMs: number } {
  return {
    offsetMs: (t2 - t1 + (t3 - t4)) / 2,
    roundTripMs: Math.max(0, t4 - t1 - (t3 - t2)),
  };
}
