// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/time-sync/tests/udp-ntp-client`
 * Purpose: Adapter tests for the UDP SNTP client against an in-process server.
 * Scope: Successful exchange, timeout, DNS failure, abort, invalid reply. Does not reach any external host.
 * Invariants: Server binds 127.0.0.1 on an ephemeral port; host lookup is injected.
 * Side-effects: IO (loopback UDP sockets)
 * Links: src/ntp/udp-ntp-client.ts
 * @internal
 */

import { createSocket } from "node:dgram";

import { afterEach, describe, expect, it } from "vitest";

import { isTimeSourceError } from "@concentric/temporal-core";

import { FakeClock } from "../../../tests/_fakes/index.js";
import { NTP_PACKET_SIZE, writeTimestamp } from "../src/ntp/packet.js";
import { UdpNtpClient } from "../src/ntp/udp-ntp-client.js";

const T0 = Date.UTC(2024, 0, 1, 12);
const loopback = async () => ({ address: "127.0.0.1", family: 4 });

interface TestServer {
  port: number;
  received: Buffer[];
  close: () => Promise<void>;
}

const servers: TestServer[] = [];

async function startServer(
  reply: (request: Buffer) => Buffer | undefined
): Promise<TestServer> {
  const socket = createSocket("udp4");
  const received: Buffer[] = [];
  socket.on("message", (msg, rinfo) => {
    received.push(msg);
    const response = reply(msg);
    if (response) socket.send(response, rinfo.port, rinfo.address);
  });
  await new Promise<void>((resolve) =>
    socket.bind(0, "127.0.0.1", () => resolve())
  );
  const server: TestServer = {
    port: socket.address().port,
    received,
    close: () => new Promise<void>((resolve) => socket.close(() => resolve())),
  };
  servers.push(server);
  return server;
}

/** Answers as a stratum-1 server whose clock reads `serverMs` */
function serverReply(serverMs: number, header = 0x24) {
  return (request: Buffer): Buffer => {
    const reply = Buffer.alloc(NTP_PACKET_SIZE);
    reply.writeUInt8(header, 0);
    reply.writeUInt8(1, 1);
    request.copy(reply, 24, 40, 48);
    writeTimestamp(reply, 32, serverMs);
    writeTimestamp(reply, 40, serverMs);
    return reply;
  };
}

async function queryError(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (error) {
    if (isTimeSourceError(error)) return error.code;
    throw error;
  }
  throw new Error("expected the query to reject");
}

describe("UdpNtpClient", () => {
  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => s.close()));
  });

  it("computes offset and delay from one exchange", async () => {
    const server = await startServer(serverReply(T0 + 5000));
    const client = new UdpNtpClient({
      port: server.port,
      lookup: loopback,
      clock: new FakeClock(T0),
    });

    const sample = await client.query("ntp.test", { timeoutMs: 2000 });

    expect(sample.server).toBe("ntp.test");
    expect(sample.address).toBe("127.0.0.1");
    expect(sample.stratum).toBe(1);
    expect(sample.offsetMs).toBeCloseTo(5000, 3);
    expect(sample.roundTripMs).toBe(0);
    expect(server.received).toHaveLength(1);
    expect(server.received[0]?.[0]).toBe(0x23);
  });

  it("times out when the server stays silent", async () => {
    const server = await startServer(() => undefined);
    const client = new UdpNtpClient({ port: server.port, lookup: loopback });

    expect(await queryError(client.query("ntp.test", { timeoutMs: 50 }))).toBe(
      "TIMEOUT"
    );
  });

  it("maps lookup failures to DNS_RESOLUTION_FAILED", async () => {
    const client = new UdpNtpClient({
      lookup: async () => {
        throw new Error("getaddrinfo ENOTFOUND ntp.invalid");
      },
    });

    expect(
      await queryError(client.query("ntp.invalid", { timeoutMs: 1000 }))
    ).toBe("DNS_RESOLUTION_FAILED");
  });

  it("rejects with ABORTED when the signal is already aborted", async () => {
    const client = new UdpNtpClient({ lookup: loopback });
    const controller = new AbortController();
    controller.abort();

    expect(
      await queryError(
        client.query("ntp.test", {
          timeoutMs: 1000,
          signal: controller.signal,
        })
      )
    ).toBe("ABORTED");
  });

  it("rejects with ABORTED when aborted mid-query", async () => {
    const server = await startServer(() => undefined);
    const client = new UdpNtpClient({ port: server.port, lookup: loopback });
    const controller = new AbortController();

    const pending = client.query("ntp.test", {
      timeoutMs: 5000,
      signal: controller.signal,
    });
    controller.abort();

    expect(await queryError(pending)).toBe("ABORTED");
  });

  it("rejects a reply that is not in server mode", async () => {
    const server = await startServer(serverReply(T0, 0x23));
    const client = new UdpNtpClient({
      port: server.port,
      lookup: loopback,
      clock: new FakeClock(T0),
    });

    expect(
      await queryError(client.query("ntp.test", { timeoutMs: 2000 }))
    ).toBe("INVALID_RESPONSE");
  });
});
