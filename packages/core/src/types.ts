/**
 * unitmedic core types
 *
 * Config shape, host error types and the OS state the runner inspects.
 * Findings and step reports live in findings.ts.
 */

// ── Config ─────────────────────────────────────────────────────────────

export type Ownership = {
  user: string;
  group: string;
};

/** One chmod rule, path relative to the deployment directory */
export type PermissionRule = {
  path: string;
  /** Octal mode string, e.g. "664" */
  mode: string;
  recursive: boolean;
};

export type RestartMode = "service" | "remediate";

export type DeployConfig = {
  /** Fallback host when no server argument is given */
  host?: string;
  user: string;
  /** Remote deployment directory */
  path: string;
  /** rsync exclude patterns */
  exclude: string[];
  restart: RestartMode;
};

export type TimingConfig = {
  /** How long to wait for matching processes to disappear after kill */
  stopTimeoutMs: number;
  /** How long to wait for exactly one process and an active unit */
  startTimeoutMs: number;
  /** Delay before the PID stability re-check */
  settleMs: number;
  pollIntervalMs: number;
};

export type UnitmedicConfig = {
  version: 1;
  /** systemd unit name without the .service suffix */
  service: string;
  /** Regex passed to pgrep/pkill -f */
  processPattern: string;
  ownership: Ownership;
  permissions: PermissionRule[];
  database: { path: string; minBytes: number };
  configFiles: { required: string[]; optional: string[] };
  unit: {
    /** Bundled unit file, relative to the deployment directory */
    source: string;
    /** Absolute systemd unit directory */
    directory: string;
  };
  timing: TimingConfig;
  log: { path: string; lines: number };
  /** Lines of `systemctl status` output to keep */
  statusLines: number;
  deploy: DeployConfig;
};

// ── Host state ─────────────────────────────────────────────────────────

export type FileOwnership = Ownership & {
  /** Three-digit octal string, e.g. "775" */
  mode: string;
};

/** A process-table row matching the monitored pattern */
export type ProcessInfo = {
  pid: number;
  command: string;
};

// ── Errors ─────────────────────────────────────────────────────────────

export type NotFoundError = { kind: "not_found"; path: string };
export type PermissionDeniedError = { kind: "permission_denied"; path: string; operation: string };
export type IOError = { kind: "io_error"; path: string; message: string };

/** An external command exited non-zero or could not be spawned */
export type CommandFailedError = {
  kind: "command_failed";
  command: string;
  exitCode: number | null;
  message: string;
};

export type FileSystemError = NotFoundError | PermissionDeniedError | IOError;

export type HostError = FileSystemError | CommandFailedError;

export function formatError(e: HostError): string {
  switch (e.kind) {
    case "not_found":
      return `${e.path}: not found`;
    case "permission_denied":
      return `${e.path}: permission denied (${e.operation})`;
    case "io_error":
      return e.path ? `${e.path}: ${e.message}` : e.message;
    case "command_failed":
      return `${e.command} exited with ${e.exitCode ?? "signal"}: ${e.message}`;
  }
}

// Result re-exported for convenience
export type { Result } from "./result.js";
