/**
 * ServiceManager — the subset of systemctl the runner drives.
 */

import type { CommandFailedError, Result } from "./types.js";

/** systemd ActiveState, e.g. "active", "inactive", "failed", "activating" */
export type UnitState = string;

export interface ServiceManager {
  stop(unit: string): Promise<Result<void, CommandFailedError>>;
  start(unit: string): Promise<Result<void, CommandFailedError>>;
  restart(unit: string): Promise<Result<void, CommandFailedError>>;
  enable(unit: string): Promise<Result<void, CommandFailedError>>;
  daemonReload(): Promise<Result<void, CommandFailedError>>;

  /** Current ActiveState of the unit */
  activeState(unit: string): Promise<Result<UnitState, CommandFailedError>>;

  /** First `lines` lines of `systemctl status`, whatever the unit state */
  status(unit: string, lines: number): Promise<Result<string[], CommandFailedError>>;
}
