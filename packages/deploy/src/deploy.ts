/**
 * unitmedic deploy — mirror the working tree to the server, then restart.
 *
 * 1. rsync the tree (excluding venv, database, logs, VCS, caches, tests, secrets)
 * 2. Restart remotely over ssh: a plain `systemctl restart`, or the full
 *    `unitmedic remediate` sequence
 *
 * No retries and no verification beyond exit codes; a failed transfer
 * skips the restart.
 */

import type { CommandFailedError, Result, RestartMode } from "@unitmedic/core";
import { ok, err } from "@unitmedic/core";
import type { CommandRunner } from "./command-runner.js";
import type { TransferTarget } from "./transfer.js";
import { buildRsyncArgs, sshDestination } from "./transfer.js";

export type DeployOptions = {
  runner: CommandRunner;
  /** Local working tree */
  source: string;
  target: TransferTarget;
  service: string;
  exclude: string[];
  restart: RestartMode;
};

export type DeployError =
  | { kind: "transfer_failed"; exitCode: number }
  | { kind: "restart_failed"; mode: RestartMode; exitCode: number }
  | { kind: "spawn_failed"; error: CommandFailedError };

export type DeployResult = {
  restart: RestartMode;
  /** The remote command that was run */
  remoteCommand: string;
};

/** Quote for the remote shell that ssh hands its command to */
export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

export function remoteRestartCommand(mode: RestartMode, service: string, path: string): string {
  return mode === "remediate"
    ? `unitmedic remediate ${shellQuote(path)}`
    : `systemctl restart ${shellQuote(service)}`;
}

export async function deploy(options: DeployOptions): Promise<Result<DeployResult, DeployError>> {
  const { runner, source, target, exclude, restart, service } = options;

  const transfer = await runner.run("rsync", buildRsyncArgs(source, target, exclude), { inherit: true });
  if (!transfer.ok) return err({ kind: "spawn_failed", error: transfer.error });
  if (transfer.value.exitCode !== 0) {
    return err({ kind: "transfer_failed", exitCode: transfer.value.exitCode });
  }

  const remoteCommand = remoteRestartCommand(restart, service, target.path);
  const restarted = await runner.run("ssh", [sshDestination(target), remoteCommand], { inherit: true });
  if (!restarted.ok) return err({ kind: "spawn_failed", error: restarted.error });
  if (restarted.value.exitCode !== 0) {
    return err({ kind: "restart_failed", mode: restart, exitCode: restarted.value.exitCode });
  }

  return ok({ restart, remoteCommand });
}
