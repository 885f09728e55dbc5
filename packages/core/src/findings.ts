/**
 * Findings — one anomaly observed by a step, and the per-step report.
 *
 * Severity decides flow: a `fatal` finding aborts the run, everything
 * else is recorded and the run continues.
 */

import type { CommandFailedError, FileSystemError, HostError, ProcessInfo } from "./types.js";
import { formatError } from "./types.js";

export type Severity = "info" | "warning" | "error" | "fatal";

export type Finding =
  | { kind: "still_running"; processes: ProcessInfo[] }
  | { kind: "process_query_failed"; error: CommandFailedError }
  | { kind: "missing_required_config"; path: string }
  | { kind: "missing_optional_config"; path: string }
  | { kind: "small_database"; path: string; size: number; minBytes: number }
  | { kind: "missing_database"; path: string }
  | { kind: "ownership_drift"; path: string; expected: string; actual: string }
  | { kind: "mode_drift"; path: string; expected: string; actual: string }
  | { kind: "permission_failed"; path: string; operation: "chown" | "chmod"; error: FileSystemError }
  | { kind: "unit_installed"; path: string }
  | { kind: "unit_missing"; path: string }
  | { kind: "unit_source_missing"; path: string }
  | { kind: "unit_inactive"; state: string }
  | { kind: "command_failed"; operation: string; error: HostError }
  | { kind: "not_running" }
  | { kind: "too_many"; processes: ProcessInfo[] }
  | { kind: "unstable"; before: number; after: number }
  | { kind: "log_unavailable"; path: string; error: FileSystemError };

export type FindingKind = Finding["kind"];

const SEVERITY: Record<FindingKind, Severity> = {
  still_running: "fatal",
  process_query_failed: "fatal",
  missing_required_config: "fatal",
  missing_optional_config: "warning",
  small_database: "warning",
  missing_database: "warning",
  ownership_drift: "warning",
  mode_drift: "warning",
  permission_failed: "warning",
  unit_installed: "info",
  unit_missing: "warning",
  unit_source_missing: "warning",
  unit_inactive: "error",
  command_failed: "warning",
  not_running: "error",
  too_many: "error",
  unstable: "warning",
  log_unavailable: "warning",
};

export function severityOf(finding: Finding): Severity {
  return SEVERITY[finding.kind];
}

export function isFatal(finding: Finding): boolean {
  return severityOf(finding) === "fatal";
}

/** Human-readable one-liner for a finding */
export function formatFinding(f: Finding): string {
  switch (f.kind) {
    case "still_running":
      return `${f.processes.length} process(es) still running after kill: ${f.processes.map((p) => p.pid).join(", ")}`;
    case "process_query_failed":
      return `cannot verify processes stopped: ${formatError(f.error)}`;
    case "missing_required_config":
      return `missing required config file ${f.path}`;
    case "missing_optional_config":
      return `missing ${f.path}`;
    case "small_database":
      return `database ${f.path} is ${f.size} bytes (< ${f.minBytes}), possibly empty`;
    case "missing_database":
      return `database ${f.path} not found`;
    case "ownership_drift":
      return `${f.path}: owner ${f.actual}, expected ${f.expected}`;
    case "mode_drift":
      return `${f.path}: mode ${f.actual}, expected ${f.expected}`;
    case "permission_failed":
      return `${f.operation} ${f.path} failed (${formatError(f.error)})`;
    case "unit_installed":
      return `installed unit file ${f.path}`;
    case "unit_missing":
      return `unit file ${f.path} is not installed`;
    case "unit_source_missing":
      return `bundled unit file ${f.path} not found, cannot install`;
    case "unit_inactive":
      return `unit is ${f.state}`;
    case "command_failed":
      return `${f.operation} failed: ${formatError(f.error)}`;
    case "not_running":
      return "bot is not running";
    case "too_many":
      return `${f.processes.length} processes running (expected 1): ${f.processes.map((p) => p.pid).join(", ")}`;
    case "unstable":
      return `pid changed from ${f.before} to ${f.after} while settling, possible crash-restart loop`;
    case "log_unavailable":
      return `cannot read log ${f.path} (${formatError(f.error)})`;
  }
}

// ── Step reports ───────────────────────────────────────────────────────

export type StepName =
  | "stop"
  | "permissions"
  | "database"
  | "config"
  | "unit"
  | "start"
  | "health"
  | "logs";

/** Display order and titles; the CLI numbers steps from this list */
export const STEP_TITLES: Record<StepName, string> = {
  stop: "Stopping all processes",
  permissions: "Fixing file permissions",
  database: "Checking database",
  config: "Checking configuration",
  unit: "Checking systemd unit",
  start: "Starting service",
  health: "Verifying process count",
  logs: "Recent log lines",
};

export const STEP_ORDER: StepName[] = [
  "stop",
  "permissions",
  "database",
  "config",
  "unit",
  "start",
  "health",
  "logs",
];

/**
 * ok: nothing to do. changed: something was fixed or installed.
 * warning: non-fatal findings. failed: error-level findings (run went on).
 * aborted: a fatal finding stopped the run here.
 */
export type StepStatus = "ok" | "changed" | "warning" | "failed" | "aborted";

export type StepReport = {
  step: StepName;
  status: StepStatus;
  findings: Finding[];
  /** Informational lines: sizes, status output, log tail */
  notes: string[];
};

/** Derive the step status from its findings */
export function stepStatus(findings: Finding[], changed: boolean): StepStatus {
  const severities = findings.map(severityOf);
  if (severities.includes("fatal")) return "aborted";
  if (severities.includes("error")) return "failed";
  if (severities.includes("warning")) return "warning";
  return changed ? "changed" : "ok";
}
