/**
 * Read and validate unitmedic.json from a deployment directory.
 *
 * Used at the CLI edge only; failures throw with a message fit for the
 * terminal, and the command handlers turn that into exit code 1.
 */

import { ZodError } from "zod";
import type { SystemOperations } from "./system-ops.js";
import type { UnitmedicConfig } from "./types.js";
import { formatError } from "./types.js";
import { CONFIG_FILENAME } from "./constants.js";
import { parseConfig } from "./schema.js";

export async function loadConfig(ops: SystemOperations): Promise<UnitmedicConfig> {
  const raw = await ops.readFile(CONFIG_FILENAME);
  if (!raw.ok) {
    if (raw.error.kind === "not_found") {
      throw new Error(`No ${CONFIG_FILENAME} found in ${ops.workspace} (run \`unitmedic init\`)`);
    }
    throw new Error(`Cannot read ${CONFIG_FILENAME}: ${formatError(raw.error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.value);
  } catch (e) {
    throw new Error(`${CONFIG_FILENAME} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  try {
    return parseConfig(json);
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new Error(`Invalid ${CONFIG_FILENAME}:\n${issues.join("\n")}`);
    }
    throw e;
  }
}
