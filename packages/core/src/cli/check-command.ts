/**
 * CheckCommand — pretty-prints the result of `check()`.
 * Exits 1 when anything at error level or above turned up.
 */

import type { ConsoleOutput } from "../console.js";
import type { CheckOptions } from "../check.js";
import { check } from "../check.js";
import { StepPrinter } from "./step-printer.js";

export class CheckCommand {
  constructor(
    private opts: CheckOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const result = await check(this.opts);
    const printer = new StepPrinter(this.out);

    this.out.heading(`unitmedic check — ${this.opts.config.service} (${this.opts.ops.workspace})`);
    this.out.write("");

    for (const step of result.steps) printer.print(step);

    const count = result.steps.reduce((n, s) => n + s.findings.length, 0);
    if (result.healthy) {
      this.out.success(count === 0 ? "All checks passed." : `Healthy, ${count} warning(s).`);
      return 0;
    }
    this.out.error(`Unhealthy: ${count} finding(s). Run \`unitmedic remediate\` to repair.`);
    return 1;
  }
}
