// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/config/load-engine-config`
 * Purpose: Reads and validates the ring engine YAML config before any tick runs.
 * Scope: File IO, YAML parsing, schema validation, error mapping. Does not construct engine components.
 * Invariants: Every failure surfaces as ConfigurationError listing all issues.
 * Side-effects: IO (reads the config file)
 * Links: src/config/engine-config.schema.ts, config/rings.yaml
 * @public
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { ConfigurationError } from "@concentric/temporal-core";
import { parse, YAMLParseError } from "yaml";

import {
  type EngineConfig,
  EngineConfigFileSchema,
  toEngineConfig,
} from "./engine-config.schema.js";

export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      }))
    );
  }
  return toEngineConfig(result.data);
}

export function parseEngineConfigYaml(content: string): EngineConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigurationError([
        { path: "", message: `Invalid YAML: ${error.message}` },
      ]);
    }
    throw error;
  }
  return parseEngineConfig(raw);
}

export async function loadEngineConfig(
  configPath: string
): Promise<EngineConfig> {
  const resolved = path.resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(resolved, "utf8");
  } catch (error) {
    throw new ConfigurationError([
      {
        path: "",
        message: `Cannot read ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      },
    ]);
  }
  return parseEngineConfigYaml(content);
}
