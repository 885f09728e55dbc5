/**
 * The individual remediation steps.
 *
 * Each step inspects or patches host state through the adapters in `Host`
 * and returns a StepReport. Steps never throw; anything that goes wrong
 * becomes a finding whose severity decides whether the run continues.
 */

import type { SystemOperations } from "./system-ops.js";
import type { ProcessTable } from "./process-table.js";
import type { ServiceManager } from "./service-manager.js";
import type { Clock } from "./poll.js";
import { pollUntil } from "./poll.js";
import type { ProcessInfo, UnitmedicConfig } from "./types.js";
import type { Finding, StepName, StepReport } from "./findings.js";
import { stepStatus } from "./findings.js";
import { valueOr } from "./result.js";

/** Everything a step may touch on the host */
export type Host = {
  /** Rooted at the deployment directory */
  ops: SystemOperations;
  /** Rooted at the systemd unit directory */
  unitOps: SystemOperations;
  processes: ProcessTable;
  services: ServiceManager;
  clock: Clock;
};

export type StepContext = Host & { config: UnitmedicConfig };

function report(step: StepName, findings: Finding[], notes: string[], changed = false): StepReport {
  return { step, status: stepStatus(findings, changed), findings, notes };
}

export function unitFileName(config: UnitmedicConfig): string {
  return `${config.service}.service`;
}

// ── 1. stop ────────────────────────────────────────────────────────────

/**
 * Stop the unit, SIGKILL whatever still matches, then wait for the
 * process table to empty. Survivors are fatal.
 */
export async function stopAll(ctx: StepContext): Promise<StepReport> {
  const { config, services, processes, clock } = ctx;
  const notes: string[] = [];

  const stopped = await services.stop(config.service);
  if (!stopped.ok) notes.push(`systemctl stop ignored: ${stopped.error.message}`);

  const killed = await processes.kill(config.processPattern, "KILL");
  if (killed.ok && killed.value > 0) notes.push(`sent SIGKILL to ${killed.value} process(es)`);
  if (!killed.ok) notes.push(`pkill ignored: ${killed.error.message}`);

  const outcome = await pollUntil(
    () => processes.list(config.processPattern),
    (listed) => listed.ok && listed.value.length === 0,
    { timeoutMs: config.timing.stopTimeoutMs, intervalMs: config.timing.pollIntervalMs, clock },
  );

  const listed = outcome.value;
  if (!listed.ok) {
    return report("stop", [{ kind: "process_query_failed", error: listed.error }], notes);
  }
  if (listed.value.length > 0) {
    return report("stop", [{ kind: "still_running", processes: listed.value }], notes);
  }
  notes.push("all processes stopped");
  return report("stop", [], notes, killed.ok && killed.value > 0);
}

// ── 2. permissions ─────────────────────────────────────────────────────

/**
 * Compare the deployment directory and every permission rule against
 * the configured ownership and modes. Missing paths are skipped; the
 * fix step reports them.
 */
export async function detectDrift(ctx: Pick<StepContext, "ops" | "config">): Promise<Finding[]> {
  const { ops, config } = ctx;
  const expectedOwner = `${config.ownership.user}:${config.ownership.group}`;
  const findings: Finding[] = [];

  const root = await ops.stat(".");
  if (root.ok) {
    const actual = `${root.value.ownership.user}:${root.value.ownership.group}`;
    if (actual !== expectedOwner) {
      findings.push({ kind: "ownership_drift", path: ".", expected: expectedOwner, actual });
    }
  }

  for (const rule of config.permissions) {
    const s = await ops.stat(rule.path);
    if (!s.ok) continue;
    if (s.value.ownership.mode !== rule.mode) {
      findings.push({ kind: "mode_drift", path: rule.path, expected: rule.mode, actual: s.value.ownership.mode });
    }
  }
  return findings;
}

/**
 * chown -R the deployment directory, then apply every chmod rule.
 * Applied unconditionally so recursive rules also fix nested entries;
 * drift seen beforehand is reported as what changed.
 */
export async function fixPermissions(ctx: StepContext): Promise<StepReport> {
  const { ops, config } = ctx;
  const findings: Finding[] = [];
  const notes: string[] = [];

  const drift = await detectDrift(ctx);

  const chowned = await ops.chown(".", config.ownership, { recursive: true });
  if (!chowned.ok) {
    findings.push({ kind: "permission_failed", path: ".", operation: "chown", error: chowned.error });
  }

  for (const rule of config.permissions) {
    const chmodded = await ops.chmod(rule.path, rule.mode, { recursive: rule.recursive });
    if (!chmodded.ok) {
      findings.push({ kind: "permission_failed", path: rule.path, operation: "chmod", error: chmodded.error });
    }
  }

  const failed = new Set(findings.flatMap((f) => (f.kind === "permission_failed" ? [f.path] : [])));
  let changed = false;
  for (const d of drift) {
    if (d.kind !== "ownership_drift" && d.kind !== "mode_drift") continue;
    if (failed.has(d.path)) continue;
    changed = true;
    const what = d.kind === "ownership_drift" ? "owner" : "mode";
    notes.push(`fixed ${what} of ${d.path}: ${d.actual} → ${d.expected}`);
  }

  notes.push(`owner ${config.ownership.user}:${config.ownership.group}, ${config.permissions.length} mode rule(s) applied`);
  return report("permissions", findings, notes, changed);
}

// ── 3. database ────────────────────────────────────────────────────────

/** Size heuristic only; the database contents are not inspected */
export async function checkDatabase(ctx: Pick<StepContext, "ops" | "config">): Promise<StepReport> {
  const { ops, config } = ctx;
  const { path, minBytes } = config.database;

  const s = await ops.stat(path);
  if (!s.ok) {
    if (s.error.kind === "not_found") return report("database", [{ kind: "missing_database", path }], []);
    return report("database", [{ kind: "command_failed", operation: `stat ${path}`, error: s.error }], []);
  }

  const notes = [`database size: ${s.value.size} bytes`];
  if (s.value.size < minBytes) {
    return report("database", [{ kind: "small_database", path, size: s.value.size, minBytes }], notes);
  }
  return report("database", [], notes);
}

// ── 4. config ──────────────────────────────────────────────────────────

/** A required file that cannot be confirmed counts as missing */
export async function checkConfigFiles(ctx: Pick<StepContext, "ops" | "config">): Promise<StepReport> {
  const { ops, config } = ctx;
  const findings: Finding[] = [];

  for (const path of config.configFiles.required) {
    if (!valueOr(await ops.exists(path), false)) {
      findings.push({ kind: "missing_required_config", path });
    }
  }
  for (const path of config.configFiles.optional) {
    if (!valueOr(await ops.exists(path), false)) {
      findings.push({ kind: "missing_optional_config", path });
    }
  }

  const notes = findings.length === 0 ? ["configuration present"] : [];
  return report("config", findings, notes);
}

// ── 5. unit ────────────────────────────────────────────────────────────

/** Install the bundled unit file if systemd doesn't have one, then reload */
export async function ensureUnit(ctx: StepContext): Promise<StepReport> {
  const { ops, unitOps, services, config } = ctx;
  const unitFile = unitFileName(config);
  const installedPath = `${unitOps.workspace}/${unitFile}`;

  if (valueOr(await unitOps.exists(unitFile), false)) {
    return report("unit", [], [`${installedPath} present`]);
  }

  const source = await ops.readFile(config.unit.source);
  if (!source.ok) {
    return report("unit", [{ kind: "unit_source_missing", path: config.unit.source }], []);
  }

  const written = await unitOps.writeFile(unitFile, source.value);
  if (!written.ok) {
    return report("unit", [{ kind: "command_failed", operation: `install ${installedPath}`, error: written.error }], []);
  }

  const findings: Finding[] = [{ kind: "unit_installed", path: installedPath }];
  const reloaded = await services.daemonReload();
  if (!reloaded.ok) {
    findings.push({ kind: "command_failed", operation: "daemon-reload", error: reloaded.error });
  }
  return report("unit", findings, [], true);
}

// ── 6. start ───────────────────────────────────────────────────────────

export async function startService(ctx: StepContext, opts: { enable: boolean } = { enable: true }): Promise<StepReport> {
  const { services, config } = ctx;
  const findings: Finding[] = [];

  if (opts.enable) {
    const enabled = await services.enable(config.service);
    if (!enabled.ok) findings.push({ kind: "command_failed", operation: "enable", error: enabled.error });
  }

  const started = await services.start(config.service);
  if (!started.ok) findings.push({ kind: "command_failed", operation: "start", error: started.error });

  const notes = started.ok ? [`started ${config.service}`] : [];
  return report("start", findings, notes, started.ok);
}

// ── 7. health ──────────────────────────────────────────────────────────

export type HealthResult = {
  report: StepReport;
  /** Matching processes at the last observation */
  processes: ProcessInfo[];
};

/**
 * Wait for exactly one process and an active unit, then re-check after
 * `settleMs`: a different pid means the unit is restarting in a loop.
 */
export async function verifyHealth(ctx: StepContext): Promise<HealthResult> {
  const { processes, services, config, clock } = ctx;
  const findings: Finding[] = [];
  const notes: string[] = [];

  const outcome = await pollUntil(
    async () => ({
      listed: await processes.list(config.processPattern),
      state: await services.activeState(config.service),
    }),
    ({ listed, state }) => listed.ok && listed.value.length === 1 && state.ok && state.value === "active",
    { timeoutMs: config.timing.startTimeoutMs, intervalMs: config.timing.pollIntervalMs, clock },
  );

  let running: ProcessInfo[] = [];
  const { listed, state } = outcome.value;
  if (!listed.ok) {
    findings.push({ kind: "command_failed", operation: "list processes", error: listed.error });
  } else {
    running = listed.value;
    if (outcome.satisfied) {
      const firstPid = running[0]?.pid;
      if (config.timing.settleMs > 0) await clock.sleep(config.timing.settleMs);
      const again = await processes.list(config.processPattern);
      if (again.ok) {
        running = again.value;
        const pid = running[0]?.pid;
        if (running.length === 1 && firstPid !== undefined && pid !== undefined && pid !== firstPid) {
          findings.push({ kind: "unstable", before: firstPid, after: pid });
        }
      } else {
        findings.push({ kind: "command_failed", operation: "list processes", error: again.error });
      }
    } else if (state.ok && state.value !== "active" && running.length === 1) {
      findings.push({ kind: "unit_inactive", state: state.value });
    }

    if (running.length === 0) findings.push({ kind: "not_running" });
    else if (running.length > 1) findings.push({ kind: "too_many", processes: running });
  }

  if (!state.ok) findings.push({ kind: "command_failed", operation: "query unit state", error: state.error });

  notes.push(`running processes: ${running.length}`);
  const status = await services.status(config.service, config.statusLines);
  if (status.ok) notes.push(...status.value);
  else findings.push({ kind: "command_failed", operation: "systemctl status", error: status.error });

  return { report: report("health", findings, notes), processes: running };
}

// ── 8. logs ────────────────────────────────────────────────────────────

export async function collectLogs(ctx: Pick<StepContext, "ops" | "config">): Promise<StepReport> {
  const { ops, config } = ctx;
  const lines = await ops.tail(config.log.path, config.log.lines);
  if (!lines.ok) {
    return report("logs", [{ kind: "log_unavailable", path: config.log.path, error: lines.error }], []);
  }
  return report("logs", [], lines.value);
}
