/**
 * unitmedic restart — the short repair.
 *
 * Stop, kill, fix permissions, start, status, log tail. Skips the
 * database, config and unit checks and never aborts: survivors of the
 * kill are reported and the start is attempted anyway.
 */

import type { ProcessInfo } from "./types.js";
import { stopAll, fixPermissions, startService, verifyHealth, collectLogs } from "./steps.js";
import type { RemediationOptions, RemediationReport } from "./remediate.js";
import { runSteps, outcomeOf } from "./remediate.js";

export async function quickRestart(options: RemediationOptions): Promise<RemediationReport> {
  const { onStep, ...ctx } = options;
  let processes: ProcessInfo[] = [];

  const { steps } = await runSteps(
    [
      () => stopAll(ctx),
      () => fixPermissions(ctx),
      () => startService(ctx, { enable: false }),
      async () => {
        const health = await verifyHealth(ctx);
        processes = health.processes;
        return health.report;
      },
      () => collectLogs(ctx),
    ],
    { abortOnFatal: false, onStep },
  );

  return { steps, outcome: outcomeOf(steps), processes };
}
