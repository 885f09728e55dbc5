/**
 * unitmedic init — write a starter unitmedic.json into the deployment directory.
 *
 * Never overwrites an existing config. The written file is parsed back
 * through the schema, so init can't leave an invalid config behind.
 */

import type { SystemOperations } from "./system-ops.js";
import type { FileSystemError, Result, UnitmedicConfig } from "./types.js";
import { ok, err } from "./result.js";
import { CONFIG_FILENAME } from "./constants.js";
import { parseConfig, starterConfig } from "./schema.js";

export type InitOptions = {
  ops: SystemOperations;
  service: string;
  processPattern: string;
};

export type InitError =
  | { kind: "already_exists"; path: string }
  | { kind: "invalid"; message: string }
  | { kind: "write_failed"; error: FileSystemError };

export type InitResult = {
  path: string;
  config: UnitmedicConfig;
};

export async function init(options: InitOptions): Promise<Result<InitResult, InitError>> {
  const { ops, service, processPattern } = options;

  const existing = await ops.exists(CONFIG_FILENAME);
  if (existing.ok && existing.value) {
    return err({ kind: "already_exists", path: CONFIG_FILENAME });
  }

  const body = starterConfig(service, processPattern);
  let config: UnitmedicConfig;
  try {
    config = parseConfig(body);
  } catch (e) {
    return err({ kind: "invalid", message: e instanceof Error ? e.message : String(e) });
  }

  const written = await ops.writeFile(CONFIG_FILENAME, JSON.stringify(body, null, 2) + "\n");
  if (!written.ok) return err({ kind: "write_failed", error: written.error });

  return ok({ path: CONFIG_FILENAME, config });
}
