/**
 * The short repair. Never aborts.
 */

import type { ConsoleOutput } from "../console.js";
import { quickRestart } from "../restart.js";
import type { RemediateCommandOptions } from "./remediate-command.js";
import { StepPrinter } from "./step-printer.js";

export class RestartCommand {
  constructor(
    private opts: RemediateCommandOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const printer = new StepPrinter(this.out);

    this.out.heading(`unitmedic restart — ${this.opts.config.service}`);
    this.out.write("");

    const report = await quickRestart({ ...this.opts, onStep: (step) => printer.print(step) });

    if (report.outcome === "healthy") {
      this.out.success("✅ Restarted");
      return 0;
    }
    this.out.warn("⚠️  Restart finished with problems, run `unitmedic remediate` for the full repair");
    return this.opts.strict ? 1 : 0;
  }
}
