/**
 * Mock ProcessTable for testing — an in-memory process list.
 *
 * Patterns are applied as JavaScript regexes against the command line,
 * close enough to pgrep's extended regex for the patterns we use.
 */

import type { ProcessTable, Signal } from "./process-table.js";
import type { CommandFailedError, ProcessInfo, Result } from "./types.js";
import { ok, err } from "./result.js";

export class MockProcessTable implements ProcessTable {
  private processes: ProcessInfo[] = [];
  private nextPid = 1000;
  /** pids that survive every signal (e.g. stuck in uninterruptible sleep) */
  private unkillable: Set<number> = new Set();
  public signals: Array<{ pattern: string; signal: Signal }> = [];
  /** When set, list() fails with this message */
  public failList?: string;

  /** Add a simulated process, returning its pid */
  spawn(command: string, opts: { unkillable?: boolean } = {}): number {
    const pid = this.nextPid++;
    this.processes.push({ pid, command });
    if (opts.unkillable) this.unkillable.add(pid);
    return pid;
  }

  /** Remove a process by pid (simulates exit) */
  exit(pid: number): void {
    this.processes = this.processes.filter((p) => p.pid !== pid);
  }

  get all(): ProcessInfo[] {
    return [...this.processes];
  }

  async list(pattern: string): Promise<Result<ProcessInfo[], CommandFailedError>> {
    if (this.failList !== undefined) {
      return err({ kind: "command_failed", command: `pgrep -af ${pattern}`, exitCode: 2, message: this.failList });
    }
    const re = new RegExp(pattern);
    return ok(this.processes.filter((p) => re.test(p.command)));
  }

  async kill(pattern: string, signal: Signal): Promise<Result<number, CommandFailedError>> {
    this.signals.push({ pattern, signal });
    const re = new RegExp(pattern);
    const matching = this.processes.filter((p) => re.test(p.command));
    this.processes = this.processes.filter((p) => !re.test(p.command) || this.unkillable.has(p.pid));
    return ok(matching.length);
  }
}
