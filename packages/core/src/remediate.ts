/**
 * unitmedic remediate — make sure exactly one healthy instance runs.
 *
 * 1. Stop the unit and kill stragglers (survivors abort the run)
 * 2. Reset ownership and modes
 * 3. Database size heuristic
 * 4. Config files (a missing required one aborts the run)
 * 5. Install the unit file if systemd lacks it, daemon-reload
 * 6. Enable and start
 * 7. Poll for exactly one stable process, capture `systemctl status`
 * 8. Tail the log
 *
 * No retries and no rollback: an aborted run leaves the host as the last
 * completed step left it, and the report names that step.
 */

import type { ProcessInfo } from "./types.js";
import type { StepName, StepReport } from "./findings.js";
import { isFatal } from "./findings.js";
import type { StepContext } from "./steps.js";
import {
  stopAll,
  fixPermissions,
  checkDatabase,
  checkConfigFiles,
  ensureUnit,
  startService,
  verifyHealth,
  collectLogs,
} from "./steps.js";

export type RemediationOutcome = "healthy" | "degraded" | "aborted";

export type RemediationReport = {
  steps: StepReport[];
  outcome: RemediationOutcome;
  /** Step whose fatal finding stopped the run */
  abortedAt?: StepName;
  /** Matching processes at the end of the health step */
  processes: ProcessInfo[];
};

export type RemediationOptions = StepContext & {
  /** Called as soon as each step finishes */
  onStep?: (report: StepReport) => void;
};

type PlannedStep = () => Promise<StepReport>;

/**
 * Run planned steps in order. With `abortOnFatal`, a fatal finding
 * stops the run after reporting that step.
 */
export async function runSteps(
  plan: PlannedStep[],
  opts: { abortOnFatal: boolean; onStep?: (report: StepReport) => void },
): Promise<{ steps: StepReport[]; abortedAt?: StepName }> {
  const steps: StepReport[] = [];
  for (const run of plan) {
    const step = await run();
    steps.push(step);
    opts.onStep?.(step);
    if (opts.abortOnFatal && step.findings.some(isFatal)) {
      return { steps, abortedAt: step.step };
    }
  }
  return { steps };
}

/** Healthy means the health step ran and found nothing to report */
export function outcomeOf(steps: StepReport[], abortedAt?: StepName): RemediationOutcome {
  if (abortedAt) return "aborted";
  const health = steps.find((s) => s.step === "health");
  return health?.status === "ok" ? "healthy" : "degraded";
}

export async function remediate(options: RemediationOptions): Promise<RemediationReport> {
  const { onStep, ...ctx } = options;
  let processes: ProcessInfo[] = [];

  const plan: PlannedStep[] = [
    () => stopAll(ctx),
    () => fixPermissions(ctx),
    () => checkDatabase(ctx),
    () => checkConfigFiles(ctx),
    () => ensureUnit(ctx),
    () => startService(ctx),
    async () => {
      const health = await verifyHealth(ctx);
      processes = health.processes;
      return health.report;
    },
    () => collectLogs(ctx),
  ];

  const { steps, abortedAt } = await runSteps(plan, { abortOnFatal: true, onStep });
  return { steps, outcome: outcomeOf(steps, abortedAt), abortedAt, processes };
}
