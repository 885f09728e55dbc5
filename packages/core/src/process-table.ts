/**
 * ProcessTable — query and signal processes by command-line pattern.
 *
 * Patterns are matched against the full command line, the way
 * `pgrep -f` / `pkill -f` do.
 */

import type { CommandFailedError, ProcessInfo, Result } from "./types.js";

export type Signal = "TERM" | "KILL";

export interface ProcessTable {
  /** All processes whose command line matches `pattern` */
  list(pattern: string): Promise<Result<ProcessInfo[], CommandFailedError>>;

  /** Signal every matching process; returns how many were signalled */
  kill(pattern: string, signal: Signal): Promise<Result<number, CommandFailedError>>;
}

/**
 * Parse `pgrep -af` output: one "<pid> <command line>" per line.
 * Our own pid is dropped so a pattern that matches unitmedic's own
 * command line never counts itself.
 */
export function parsePgrep(stdout: string, selfPid: number = process.pid): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of stdout.split("\n")) {
    const match = line.trim().match(/^(\d+)\s+(.*)$/);
    if (!match) continue;
    const pid = Number(match[1]);
    if (pid === selfPid) continue;
    processes.push({ pid, command: match[2] ?? "" });
  }
  return processes;
}
