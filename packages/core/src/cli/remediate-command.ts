/**
 * RemediateCommand — runs remediate, printing each step as it completes.
 */

import type { ConsoleOutput } from "../console.js";
import type { RemediationOptions } from "../remediate.js";
import { remediate } from "../remediate.js";
import { STEP_ORDER, STEP_TITLES } from "../findings.js";
import { StepPrinter } from "./step-printer.js";

export type RemediateCommandOptions = Omit<RemediationOptions, "onStep"> & {
  /** Exit 1 unless exactly one stable process ends up running */
  strict?: boolean;
};

export class RemediateCommand {
  constructor(
    private opts: RemediateCommandOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const { config, ops } = this.opts;
    const printer = new StepPrinter(this.out);

    this.out.heading(`unitmedic remediate — ${config.service} (${ops.workspace})`);
    this.out.write("");

    const report = await remediate({ ...this.opts, onStep: (step) => printer.print(step) });

    if (report.abortedAt) {
      const index = STEP_ORDER.indexOf(report.abortedAt) + 1;
      this.out.error(`❌ Aborted at step ${index} (${STEP_TITLES[report.abortedAt]})`);
      return 1;
    }

    if (report.outcome === "healthy") {
      this.out.success("✅ Remediation complete — exactly 1 process running");
    } else {
      this.out.warn("⚠️  Remediation finished with problems, see above");
    }
    this.out.info(`Follow the log: tail -f ${ops.workspace}/${config.log.path}`);

    return this.opts.strict && report.outcome !== "healthy" ? 1 : 0;
  }
}
