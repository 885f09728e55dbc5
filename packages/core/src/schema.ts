/**
 * unitmedic config schema — runtime validation via Zod.
 *
 * The canonical type is UnitmedicConfig in types.ts. Only `service` and
 * `processPattern` are required; everything else is filled in by
 * applyDefaults, some of it derived from the service name.
 */

import { z } from "zod";
import type { PermissionRule, UnitmedicConfig } from "./types.js";
import {
  DEFAULT_EXCLUDES,
  DEFAULT_LOG,
  DEFAULT_MIN_DATABASE_BYTES,
  DEFAULT_OPTIONAL_CONFIG,
  DEFAULT_OWNERSHIP,
  DEFAULT_REQUIRED_CONFIG,
  DEFAULT_STATUS_LINES,
  DEFAULT_TIMING,
  DEFAULT_UNIT_DIRECTORY,
} from "./constants.js";

const relativePath = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith("/"), { message: "must be relative to the deployment directory" })
  .refine((p) => !p.split("/").includes(".."), { message: "must stay inside the deployment directory" });

const modeString = z.string().regex(/^[0-7]{3}$/, "must be a three-digit octal mode");

const positiveMs = z.number().int().positive();

const rawConfigSchema = z.object({
  version: z.literal(1),
  service: z.string().regex(/^[A-Za-z0-9@._-]+$/, "must be a bare unit name"),
  processPattern: z.string().min(1),
  ownership: z.object({ user: z.string().min(1), group: z.string().min(1) }).optional(),
  permissions: z
    .array(
      z.object({
        path: relativePath,
        mode: modeString,
        recursive: z.boolean().optional(),
      }),
    )
    .optional(),
  database: z
    .object({
      path: relativePath.optional(),
      minBytes: z.number().int().nonnegative().optional(),
    })
    .optional(),
  configFiles: z
    .object({
      required: z.array(relativePath).optional(),
      optional: z.array(relativePath).optional(),
    })
    .optional(),
  unit: z
    .object({
      source: relativePath.optional(),
      directory: z.string().startsWith("/").optional(),
    })
    .optional(),
  timing: z
    .object({
      stopTimeoutMs: positiveMs.optional(),
      startTimeoutMs: positiveMs.optional(),
      settleMs: z.number().int().nonnegative().optional(),
      pollIntervalMs: positiveMs.optional(),
    })
    .optional(),
  log: z
    .object({
      path: relativePath.optional(),
      lines: z.number().int().positive().optional(),
    })
    .optional(),
  statusLines: z.number().int().positive().optional(),
  deploy: z
    .object({
      host: z.string().min(1).optional(),
      user: z.string().min(1).optional(),
      path: z.string().startsWith("/").optional(),
      exclude: z.array(z.string().min(1)).optional(),
      restart: z.enum(["service", "remediate"]).optional(),
    })
    .optional(),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

function applyDefaults(raw: RawConfig): UnitmedicConfig {
  const databasePath = raw.database?.path ?? `${raw.service}.db`;

  const permissions: PermissionRule[] = raw.permissions
    ? raw.permissions.map((p) => ({ path: p.path, mode: p.mode, recursive: p.recursive ?? false }))
    : [
        { path: ".", mode: "775", recursive: false },
        { path: databasePath, mode: "664", recursive: false },
        { path: "venv/bin", mode: "755", recursive: true },
      ];

  return {
    version: 1,
    service: raw.service,
    processPattern: raw.processPattern,
    ownership: raw.ownership ?? { ...DEFAULT_OWNERSHIP },
    permissions,
    database: {
      path: databasePath,
      minBytes: raw.database?.minBytes ?? DEFAULT_MIN_DATABASE_BYTES,
    },
    configFiles: {
      required: raw.configFiles?.required ?? [...DEFAULT_REQUIRED_CONFIG],
      optional: raw.configFiles?.optional ?? [...DEFAULT_OPTIONAL_CONFIG],
    },
    unit: {
      source: raw.unit?.source ?? `deploy/${raw.service}.service`,
      directory: raw.unit?.directory ?? DEFAULT_UNIT_DIRECTORY,
    },
    timing: {
      stopTimeoutMs: raw.timing?.stopTimeoutMs ?? DEFAULT_TIMING.stopTimeoutMs,
      startTimeoutMs: raw.timing?.startTimeoutMs ?? DEFAULT_TIMING.startTimeoutMs,
      settleMs: raw.timing?.settleMs ?? DEFAULT_TIMING.settleMs,
      pollIntervalMs: raw.timing?.pollIntervalMs ?? DEFAULT_TIMING.pollIntervalMs,
    },
    log: {
      path: raw.log?.path ?? DEFAULT_LOG.path,
      lines: raw.log?.lines ?? DEFAULT_LOG.lines,
    },
    statusLines: raw.statusLines ?? DEFAULT_STATUS_LINES,
    deploy: {
      host: raw.deploy?.host,
      user: raw.deploy?.user ?? "root",
      path: raw.deploy?.path ?? `/var/www/${raw.service}`,
      exclude: raw.deploy?.exclude ?? [...DEFAULT_EXCLUDES],
      restart: raw.deploy?.restart ?? "service",
    },
  };
}

export const unitmedicConfigSchema: z.ZodType<UnitmedicConfig, z.ZodTypeDef, unknown> =
  rawConfigSchema.transform(applyDefaults);

/**
 * Parse and validate a unitmedic.json config object.
 */
export function parseConfig(raw: unknown): UnitmedicConfig {
  return unitmedicConfigSchema.parse(raw);
}

/** Minimal config body written by `unitmedic init` */
export function starterConfig(service: string, processPattern: string): Record<string, unknown> {
  return {
    version: 1,
    service,
    processPattern,
    ownership: { ...DEFAULT_OWNERSHIP },
    database: { path: `${service}.db`, minBytes: DEFAULT_MIN_DATABASE_BYTES },
    log: { ...DEFAULT_LOG },
  };
}
