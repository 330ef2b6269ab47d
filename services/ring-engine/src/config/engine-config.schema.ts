// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/config/engine-config.schema`
 * Purpose: Zod schema for the ring engine YAML file and its camelCase runtime shape.
 * Scope: Validation and key mapping only. Does not read files.
 * Invariants:
 * - File keys are snake_case; EngineConfig keys are camelCase
 * - timezone must be a known IANA zone; coordinates within range; periods and intervals positive
 * - Pulsar ids are unique; an empty pulsar list selects the default catalog
 * - Unknown keys are rejected
 * Side-effects: none
 * Links: config/rings.yaml, src/config/load-engine-config.ts
 * @public
 */

import {
  DEFAULT_PULSARS,
  type GeoLocation,
  isValidTimeZone,
  type Landmark,
  type PulsarConfig,
  type RingId,
} from "@concentric/temporal-core";
import { z } from "zod";

export const DEFAULT_NTP_SERVERS = [
  "pool.ntp.org",
  "time.google.com",
  "time.windows.com",
  "time.nist.gov",
] as const;

const positiveMs = z.number().int().positive();

const locationShape = {
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
};

const PulsarSchema = z
  .object({
    id: z.string().min(1),
    display_name: z.string().min(1),
    period_ms: z.number().positive(),
    phase_offset_ms: z.number().finite().default(0),
  })
  .strict();

const NtpSchema = z
  .object({
    servers: z.array(z.string().min(1)).min(1).default([...DEFAULT_NTP_SERVERS]),
    timeout_ms: positiveMs.default(2000),
    sync_interval_ms: positiveMs.default(60_000),
    staleness_threshold_ms: positiveMs.default(600_000),
  })
  .strict();

const RingsSchema = z
  .object({
    local_time: z.boolean().default(true),
    hebrew: z.boolean().default(true),
    atomic_time: z.boolean().default(true),
    pulsar: z.boolean().default(true),
    earth_rotation: z.boolean().default(true),
    astronomical_year: z.boolean().default(true),
  })
  .strict();

export const EngineConfigFileSchema = z
  .object({
    timezone: z
      .string()
      .min(1)
      .refine(isValidTimeZone, (tz) => ({
        message: `Unknown IANA timezone "${tz}"`,
      })),
    location: z.object(locationShape).strict(),
    tick_interval_ms: positiveMs.default(100),
    ntp: NtpSchema.default({}),
    pulsars: z
      .array(PulsarSchema)
      .default([])
      .superRefine((pulsars, ctx) => {
        const seen = new Set<string>();
        pulsars.forEach((p, i) => {
          if (seen.has(p.id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [i, "id"],
              message: `Duplicate pulsar id "${p.id}"`,
            });
          }
          seen.add(p.id);
        });
      }),
    landmarks: z
      .array(z.object({ name: z.string().min(1), ...locationShape }).strict())
      .default([]),
    rings: RingsSchema.default({}),
  })
  .strict();

export type EngineConfigFile = z.input<typeof EngineConfigFileSchema>;

export interface NtpConfig {
  readonly servers: readonly string[];
  readonly timeoutMs: number;
  readonly syncIntervalMs: number;
  readonly stalenessThresholdMs: number;
}

export interface EngineConfig {
  readonly timeZone: string;
  readonly location: GeoLocation;
  readonly tickIntervalMs: number;
  readonly ntp: NtpConfig;
  readonly pulsars: readonly PulsarConfig[];
  readonly landmarks: readonly Landmark[];
  readonly rings: Readonly<Record<RingId, boolean>>;
}

export function toEngineConfig(
  file: z.output<typeof EngineConfigFileSchema>
): EngineConfig {
  return {
    timeZone: file.timezone,
    location: file.location,
    tickIntervalMs: file.tick_interval_ms,
    ntp: {
      servers: file.ntp.servers,
      timeoutMs: file.ntp.timeout_ms,
      syncIntervalMs: file.ntp.sync_interval_ms,
      stalenessThresholdMs: file.ntp.staleness_threshold_ms,
    },
    pulsars:
      file.pulsars.length > 0
        ? file.pulsars.map((p) => ({
            id: p.id,
            displayName: p.display_name,
            periodMs: p.period_ms,
            phaseOffsetMs: p.phase_offset_ms,
          }))
        : DEFAULT_PULSARS,
    landmarks: file.landmarks,
    rings: {
      localTime: file.rings.local_time,
      hebrew: file.rings.hebrew,
      atomicTime: file.rings.atomic_time,
      pulsar: file.rings.pulsar,
      earthRotation: file.rings.earth_rotation,
      astronomicalYear: file.rings.astronomical_year,
    },
  };
}
