/**
 * CLI command: unitmedic init
 */

import type { ConsoleOutput } from "../console.js";
import type { InitOptions } from "../init.js";
import { init } from "../init.js";
import { formatError } from "../types.js";

export class InitCommand {
  constructor(
    private options: InitOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const result = await init(this.options);

    if (!result.ok) {
      const e = result.error;
      switch (e.kind) {
        case "already_exists":
          this.out.error(`${e.path} already exists in ${this.options.ops.workspace}; not overwriting.`);
          break;
        case "invalid":
          this.out.error(`Invalid settings: ${e.message}`);
          break;
        case "write_failed":
          this.out.error(`Failed to write config: ${formatError(e.error)}`);
          break;
      }
      return 1;
    }

    const { path, config } = result.value;
    this.out.heading(`unitmedic init — ${this.options.ops.workspace}`);
    this.out.success(`  Wrote ${path}`);
    this.out.info(`  service ${config.service}, pattern ${config.processPattern}`);
    this.out.info(`  unit source ${config.unit.source}, database ${config.database.path}`);
    this.out.write("");
    this.out.info("Next: unitmedic check");
    return 0;
  }
}
