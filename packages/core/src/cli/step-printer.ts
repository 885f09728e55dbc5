/**
 * StepPrinter — renders StepReports as the numbered runbook output.
 */

import type { ConsoleOutput } from "../console.js";
import type { StepReport } from "../findings.js";
import { STEP_ORDER, STEP_TITLES, formatFinding, severityOf } from "../findings.js";

export class StepPrinter {
  constructor(private out: ConsoleOutput) {}

  print(report: StepReport): void {
    this.out.step(STEP_ORDER.indexOf(report.step) + 1, STEP_TITLES[report.step]);

    for (const note of report.notes) {
      this.out.info(`   ${note}`);
    }

    for (const f of report.findings) {
      const text = formatFinding(f);
      switch (severityOf(f)) {
        case "info":
          this.out.success(`   🔧 ${text}`);
          break;
        case "warning":
          this.out.warn(`   ⚠️  ${text}`);
          break;
        case "error":
        case "fatal":
          this.out.error(`   ❌ ${text}`);
          break;
      }
    }

    if (report.status === "ok" || report.status === "changed") {
      this.out.success("   ✅ OK");
    }
    this.out.write("");
  }
}
