/**
 * CommandRunner — runs the local rsync and ssh processes.
 *
 * `inherit` streams the child's output straight to the terminal (rsync
 * --progress); otherwise output is captured.
 */

import { spawn } from "node:child_process";
import type { CommandFailedError, ExecOutput, Result } from "@unitmedic/core";
import { ok, err, runFile } from "@unitmedic/core";

export type RunOptions = { inherit?: boolean };

export interface CommandRunner {
  run(command: string, args: string[], opts?: RunOptions): Promise<Result<ExecOutput, CommandFailedError>>;
}

export class NodeCommandRunner implements CommandRunner {
  async run(
    command: string,
    args: string[],
    opts: RunOptions = {},
  ): Promise<Result<ExecOutput, CommandFailedError>> {
    if (!opts.inherit) return runFile(command, args);

    return new Promise((resolve) => {
      const child = spawn(command, args, { stdio: "inherit" });
      child.on("error", (e) =>
        resolve(
          err({ kind: "command_failed", command: [command, ...args].join(" "), exitCode: null, message: e.message }),
        ),
      );
      child.on("close", (code, signal) => {
        if (code === null) {
          resolve(
            err({
              kind: "command_failed",
              command: [command, ...args].join(" "),
              exitCode: null,
              message: `killed by ${signal ?? "signal"}`,
            }),
          );
          return;
        }
        resolve(ok({ stdout: "", stderr: "", exitCode: code }));
      });
    });
  }
}
