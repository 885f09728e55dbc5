/**
 * pgrep/pkill via execFile.
 *
 * Both tools exit 1 when nothing matches; that is an empty result,
 * not an error.
 */

import type { ProcessTable, Signal } from "./process-table.js";
import { parsePgrep } from "./process-table.js";
import type { CommandFailedError, ProcessInfo, Result } from "./types.js";
import { ok, err } from "./result.js";
import { runFile } from "./exec.js";

export type ProcessTools = { pgrep: string; pkill: string };

export class NodeProcessTable implements ProcessTable {
  constructor(private readonly tools: ProcessTools = { pgrep: "pgrep", pkill: "pkill" }) {}

  async list(pattern: string): Promise<Result<ProcessInfo[], CommandFailedError>> {
    const result = await runFile(this.tools.pgrep, ["-af", pattern]);
    if (!result.ok) return result;
    const { exitCode, stdout, stderr } = result.value;
    if (exitCode === 1) return ok([]);
    if (exitCode !== 0) {
      return err({
        kind: "command_failed",
        command: `pgrep -af ${pattern}`,
        exitCode,
        message: stderr.trim(),
      });
    }
    return ok(parsePgrep(stdout));
  }

  async kill(pattern: string, signal: Signal): Promise<Result<number, CommandFailedError>> {
    const before = await this.list(pattern);
    if (!before.ok) return before;
    if (before.value.length === 0) return ok(0);

    const result = await runFile(this.tools.pkill, [`-${signal}`, "-f", pattern]);
    if (!result.ok) return result;
    const { exitCode, stderr } = result.value;
    if (exitCode > 1) {
      return err({
        kind: "command_failed",
        command: `pkill -${signal} -f ${pattern}`,
        exitCode,
        message: stderr.trim(),
      });
    }
    return ok(before.value.length);
  }
}
