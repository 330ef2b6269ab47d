// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/health`
 * Purpose: HTTP server for orchestrator probes, metrics scraping, snapshot reads and manual resync.
 * Scope: /livez, /readyz, /version, /metrics, /snapshot, POST /sync. Does not compute anything itself.
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz and /snapshot return 503 until a snapshot exists or while shutting down
 * - POST /sync shares an in-flight sync instead of starting a second one
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * Links: src/main.ts, src/engine/snapshot-store.ts
 * @internal
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";

import type { SyncResult } from "@concentric/time-sync";
import type { Registry } from "prom-client";

import type { Snapshot } from "./engine/temporal-model-engine.js";
import type { Logger } from "./observability/logger.js";

export interface HealthState {
  ready: boolean;
}

export interface HealthServerDeps {
  readonly state: HealthState;
  readonly snapshots: { get(): Snapshot | undefined };
  readonly timeSync: { sync(): Promise<SyncResult> };
  readonly registry: Registry;
  readonly logger: Logger;
}

/** Build metadata from env vars (set at build time or runtime) */
const versionInfo = {
  sha: process.env.GIT_SHA ?? "unknown",
  service: "ring-engine",
  buildTs: process.env.BUILD_TS ?? "unknown",
  imageDigest: process.env.IMAGE_DIGEST ?? "unknown",
};

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(body);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function syncResultBody(result: SyncResult): Record<string, unknown> {
  if (result.ok) return { ...result };
  return {
    ok: false,
    status: result.status,
    error: { code: result.error.code, message: result.error.message },
  };
}

async function route(
  deps: HealthServerDeps,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const { pathname } = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  if (pathname === "/sync") {
    if (method !== "POST") {
      res.setHeader("Allow", "POST");
      sendText(res, 405, "method not allowed");
      return;
    }
    const result = await deps.timeSync.sync();
    sendJson(res, result.ok ? 200 : 503, syncResultBody(result));
    return;
  }

  if (method !== "GET") {
    res.setHeader("Allow", "GET");
    sendText(res, 405, "method not allowed");
    return;
  }

  const snapshot = deps.state.ready ? deps.snapshots.get() : undefined;

  switch (pathname) {
    case "/livez":
      sendText(res, 200, "ok");
      return;
    case "/readyz":
      if (snapshot) sendText(res, 200, "ok");
      else sendText(res, 503, "not ready");
      return;
    case "/version":
      sendJson(res, 200, versionInfo);
      return;
    case "/metrics":
      res.writeHead(200, { "Content-Type": deps.registry.contentType });
      res.end(await deps.registry.metrics());
      return;
    case "/snapshot":
      if (snapshot) sendJson(res, 200, snapshot);
      else sendJson(res, 503, { error: "no snapshot yet" });
      return;
    default:
      sendText(res, 404, "not found");
  }
}

export function startHealthServer(deps: HealthServerDeps, port: number): Server {
  const server = createServer((req, res) => {
    route(deps, req, res).catch((err: unknown) => {
      deps.logger.error({ err, url: req.url }, "health request failed");
      if (!res.headersSent) sendText(res, 500, "internal error");
      else res.end();
    });
  });

  server.listen(port);
  return server;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
