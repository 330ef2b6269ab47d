// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction, no side-effects beyond process.env read.
 * Invariants:
 * - Ring behaviour lives in the YAML file named by RING_CONFIG_PATH, not in env
 * - Fails fast with every issue listed on invalid config
 * Side-effects: Reads process.env
 * Links: src/config/load-engine-config.ts
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** Path to the ring engine YAML config, relative to the working directory */
  RING_CONFIG_PATH: z.string().min(1).default("config/rings.yaml"),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: ring-engine) */
  SERVICE_NAME: z.string().default("ring-engine"),

  /** Health, metrics and snapshot HTTP port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),

  /** Destination UDP port for NTP queries (default: 123) */
  NTP_PORT: z.coerce.number().int().min(1).max(65535).default(123),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses an environment record. Exposed for tests; runtime code calls env().
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
