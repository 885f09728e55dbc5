/**
 * Mock CommandRunner — records invocations and replays scripted exit codes.
 */

import type { CommandFailedError, ExecOutput, Result } from "@unitmedic/core";
import { ok, err } from "@unitmedic/core";
import type { CommandRunner, RunOptions } from "./command-runner.js";

export type RecordedCommand = { command: string; args: string[]; opts: RunOptions };

export class MockCommandRunner implements CommandRunner {
  public calls: RecordedCommand[] = [];
  private exitCodes: Map<string, number> = new Map();
  private missing: Set<string> = new Set();

  /** Script the exit code for every invocation of `command` */
  exitWith(command: string, code: number): void {
    this.exitCodes.set(command, code);
  }

  /** Make spawning `command` fail as if it were not installed */
  notInstalled(command: string): void {
    this.missing.add(command);
  }

  async run(
    command: string,
    args: string[],
    opts: RunOptions = {},
  ): Promise<Result<ExecOutput, CommandFailedError>> {
    this.calls.push({ command, args, opts });
    if (this.missing.has(command)) {
      return err({ kind: "command_failed", command, exitCode: null, message: `spawn ${command} ENOENT` });
    }
    return ok({ stdout: "", stderr: "", exitCode: this.exitCodes.get(command) ?? 0 });
  }
}
