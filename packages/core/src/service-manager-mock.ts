/**
 * Mock ServiceManager for testing.
 *
 * Drives a MockProcessTable the way systemd drives the real one: start
 * spawns the unit's process(es), stop takes them away. Every call is
 * recorded in order so tests can assert sequencing.
 */

import type { ServiceManager, UnitState } from "./service-manager.js";
import type { MockProcessTable } from "./process-table-mock.js";
import type { SystemOperations } from "./system-ops.js";
import type { CommandFailedError, Result } from "./types.js";
import { ok, err } from "./result.js";

export type MockServiceOptions = {
  /** Command line of the process a start spawns */
  command?: string;
  /** Processes spawned per start (0 = crashes at once, 2 = duplicate launcher) */
  spawnCount?: number;
  /** Replace the unit's process with a new pid on every activeState query */
  crashLoop?: boolean;
  /** When set, start fails unless `<unit>.service` exists here */
  unitOps?: SystemOperations;
  /** Commands that fail, e.g. ["enable"] */
  failing?: string[];
};

export class MockServiceManager implements ServiceManager {
  public calls: string[] = [];
  private states: Map<string, UnitState> = new Map();
  private owned: Map<string, number[]> = new Map();

  constructor(
    private readonly processes: MockProcessTable,
    private readonly opts: MockServiceOptions = {},
  ) {}

  /** Seed a unit as already running (owns its processes) */
  markRunning(unit: string, pids: number[]): void {
    this.states.set(unit, "active");
    this.owned.set(unit, pids);
  }

  stateOf(unit: string): UnitState {
    return this.states.get(unit) ?? "inactive";
  }

  private fail(verb: string, unit?: string): Result<never, CommandFailedError> {
    return err({
      kind: "command_failed",
      command: ["systemctl", verb, unit].filter(Boolean).join(" "),
      exitCode: 1,
      message: `mock ${verb} failure`,
    });
  }

  private spawnFor(unit: string): void {
    const command = this.opts.command ?? "python3 main.py";
    const count = this.opts.spawnCount ?? 1;
    const pids: number[] = [];
    for (let i = 0; i < count; i++) pids.push(this.processes.spawn(command));
    this.owned.set(unit, pids);
    this.states.set(unit, count > 0 ? "active" : "failed");
  }

  private reap(unit: string): void {
    for (const pid of this.owned.get(unit) ?? []) this.processes.exit(pid);
    this.owned.delete(unit);
  }

  async stop(unit: string): Promise<Result<void, CommandFailedError>> {
    this.calls.push(`stop ${unit}`);
    if (this.opts.failing?.includes("stop")) return this.fail("stop", unit);
    this.reap(unit);
    this.states.set(unit, "inactive");
    return ok(undefined);
  }

  async start(unit: string): Promise<Result<void, CommandFailedError>> {
    this.calls.push(`start ${unit}`);
    if (this.opts.failing?.includes("start")) return this.fail("start", unit);
    if (this.opts.unitOps) {
      const installed = await this.opts.unitOps.exists(`${unit}.service`);
      if (!installed.ok || !installed.value) return this.fail("start", unit);
    }
    if (this.stateOf(unit) === "active") return ok(undefined);
    this.spawnFor(unit);
    return ok(undefined);
  }

  async restart(unit: string): Promise<Result<void, CommandFailedError>> {
    this.calls.push(`restart ${unit}`);
    if (this.opts.failing?.includes("restart")) return this.fail("restart", unit);
    this.reap(unit);
    this.spawnFor(unit);
    return ok(undefined);
  }

  async enable(unit: string): Promise<Result<void, CommandFailedError>> {
    this.calls.push(`enable ${unit}`);
    if (this.opts.failing?.includes("enable")) return this.fail("enable", unit);
    return ok(undefined);
  }

  async daemonReload(): Promise<Result<void, CommandFailedError>> {
    this.calls.push("daemon-reload");
    if (this.opts.failing?.includes("daemon-reload")) return this.fail("daemon-reload");
    return ok(undefined);
  }

  async activeState(unit: string): Promise<Result<UnitState, CommandFailedError>> {
    const state = this.stateOf(unit);
    if (this.opts.crashLoop && state === "active") {
      this.reap(unit);
      this.spawnFor(unit);
    }
    return ok(state);
  }

  async status(unit: string, lines: number): Promise<Result<string[], CommandFailedError>> {
    const state = this.stateOf(unit);
    const pids = this.owned.get(unit) ?? [];
    const output = [
      `● ${unit}.service`,
      `     Active: ${state}`,
      ...pids.map((pid) => `   Main PID: ${pid}`),
    ];
    return ok(output.slice(0, lines));
  }
}
