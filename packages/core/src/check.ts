/**
 * unitmedic check — report what remediate would fix, without touching anything.
 *
 * Check detects, remediate fixes. Reports reuse the remediation step
 * names so the same printer renders both.
 */

import type { Finding, StepReport } from "./findings.js";
import { severityOf, stepStatus } from "./findings.js";
import type { StepContext } from "./steps.js";
import { checkConfigFiles, checkDatabase, detectDrift, unitFileName } from "./steps.js";
import { valueOr } from "./result.js";

export type CheckOptions = Omit<StepContext, "clock">;

export type CheckReport = {
  steps: StepReport[];
  /** No error or fatal finding anywhere */
  healthy: boolean;
};

async function checkProcesses(opts: CheckOptions): Promise<StepReport> {
  const { processes, services, config } = opts;
  const findings: Finding[] = [];
  const notes: string[] = [];

  const listed = await processes.list(config.processPattern);
  if (!listed.ok) {
    findings.push({ kind: "command_failed", operation: "list processes", error: listed.error });
  } else {
    notes.push(`running processes: ${listed.value.length}`);
    if (listed.value.length === 0) findings.push({ kind: "not_running" });
    if (listed.value.length > 1) findings.push({ kind: "too_many", processes: listed.value });
  }

  const state = await services.activeState(config.service);
  if (!state.ok) {
    findings.push({ kind: "command_failed", operation: "query unit state", error: state.error });
  } else {
    notes.push(`unit state: ${state.value}`);
    if (state.value !== "active") findings.push({ kind: "unit_inactive", state: state.value });
  }

  return { step: "health", status: stepStatus(findings, false), findings, notes };
}

async function checkPermissions(opts: CheckOptions): Promise<StepReport> {
  const findings = await detectDrift(opts);
  return { step: "permissions", status: stepStatus(findings, false), findings, notes: [] };
}

async function checkUnit(opts: CheckOptions): Promise<StepReport> {
  const unitFile = unitFileName(opts.config);
  const path = `${opts.unitOps.workspace}/${unitFile}`;
  const findings: Finding[] = valueOr(await opts.unitOps.exists(unitFile), false)
    ? []
    : [{ kind: "unit_missing", path }];
  return { step: "unit", status: stepStatus(findings, false), findings, notes: [] };
}

export async function check(opts: CheckOptions): Promise<CheckReport> {
  const steps = [
    await checkProcesses(opts),
    await checkPermissions(opts),
    await checkDatabase(opts),
    await checkConfigFiles(opts),
    await checkUnit(opts),
  ];

  const healthy = steps
    .flatMap((s) => s.findings)
    .every((f) => severityOf(f) !== "error" && severityOf(f) !== "fatal");
  return { steps, healthy };
}
