// Shared primitives
export type {
  UnitmedicConfig,
  Ownership,
  PermissionRule,
  DeployConfig,
  RestartMode,
  TimingConfig,
  FileOwnership,
  ProcessInfo,
  // Errors
  FileSystemError,
  NotFoundError,
  PermissionDeniedError,
  IOError,
  CommandFailedError,
  HostError,
} from "./types.js";
export { formatError } from "./types.js";

// Result (generic pattern)
export type { Result } from "./result.js";
export { ok, err, valueOr } from "./result.js";

// Config
export { unitmedicConfigSchema, parseConfig, starterConfig } from "./schema.js";
export { loadConfig } from "./load-config.js";
export {
  CONFIG_FILENAME,
  DEFAULT_EXCLUDES,
  DEFAULT_TIMING,
  VERSION,
} from "./constants.js";

// Host adapters
export type { SystemOperations, FileStat } from "./system-ops.js";
export { NodeSystemOps } from "./system-ops-node.js";
export { MockSystemOps } from "./system-ops-mock.js";
export type { RecordedOp } from "./system-ops-mock.js";
export type { ProcessTable, Signal } from "./process-table.js";
export { NodeProcessTable } from "./process-table-node.js";
export type { ProcessTools } from "./process-table-node.js";
export { MockProcessTable } from "./process-table-mock.js";
export type { ServiceManager, UnitState } from "./service-manager.js";
export { SystemctlServiceManager } from "./service-manager-node.js";
export { MockServiceManager } from "./service-manager-mock.js";
export type { MockServiceOptions } from "./service-manager-mock.js";
export { runFile } from "./exec.js";
export type { ExecOutput } from "./exec.js";
export type { Clock, PollOutcome } from "./poll.js";
export { systemClock, ManualClock, pollUntil } from "./poll.js";

// Findings
export type { Finding, FindingKind, Severity, StepName, StepReport, StepStatus } from "./findings.js";
export { formatFinding, severityOf, isFatal, STEP_ORDER, STEP_TITLES } from "./findings.js";

// Remediation
export type { Host, StepContext } from "./steps.js";
export { remediate } from "./remediate.js";
export type { RemediationOptions, RemediationReport, RemediationOutcome } from "./remediate.js";
export { quickRestart } from "./restart.js";
export { check } from "./check.js";
export type { CheckOptions, CheckReport } from "./check.js";
export { init } from "./init.js";
export type { InitOptions, InitResult, InitError } from "./init.js";

// Console output
export type { ConsoleOutput } from "./console.js";
export { LiveConsoleOutput } from "./console-live.js";
export { MockConsoleOutput } from "./console-mock.js";
export type { CapturedLine } from "./console-mock.js";

// CLI commands
export { RemediateCommand } from "./cli/remediate-command.js";
export type { RemediateCommandOptions } from "./cli/remediate-command.js";
export { RestartCommand } from "./cli/restart-command.js";
export { CheckCommand } from "./cli/check-command.js";
export { InitCommand } from "./cli/init-command.js";
export { StepPrinter } from "./cli/step-printer.js";
