/**
 * Thin execFile wrapper shared by the node host adapters.
 *
 * A process that ran and exited (any exit code) is `ok`; only a spawn
 * failure or a signal kill is an error. Callers decide what a non-zero
 * exit means for their command.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CommandFailedError, Result } from "./types.js";
import { ok, err } from "./result.js";

const execFileAsync = promisify(execFile);

export type ExecOutput = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export async function runFile(
  command: string,
  args: string[],
  options: { timeoutMs?: number } = {},
): Promise<Result<ExecOutput, CommandFailedError>> {
  const display = [command, ...args].join(" ");
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options.timeoutMs,
      maxBuffer: 10 * 1024 * 1024,
    });
    return ok({ stdout, stderr, exitCode: 0 });
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && typeof e.code === "number") {
      const stdout = "stdout" in e && typeof e.stdout === "string" ? e.stdout : "";
      const stderr = "stderr" in e && typeof e.stderr === "string" ? e.stderr : "";
      return ok({ stdout, stderr, exitCode: e.code });
    }
    return err({
      kind: "command_failed",
      command: display,
      exitCode: null,
      message: e instanceof Error ? e.message : String(e),
    });
  }
}

/** Turn a non-zero exit into a command_failed error */
export function requireSuccess(
  command: string,
  result: Result<ExecOutput, CommandFailedError>,
): Result<ExecOutput, CommandFailedError> {
  if (!result.ok) return result;
  if (result.value.exitCode === 0) return result;
  return err({
    kind: "command_failed",
    command,
    exitCode: result.value.exitCode,
    message: result.value.stderr.trim() || result.value.stdout.trim() || "no output",
  });
}
