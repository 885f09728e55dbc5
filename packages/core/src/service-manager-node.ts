/**
 * SystemctlServiceManager — ServiceManager backed by the systemctl binary.
 */

import type { ServiceManager, UnitState } from "./service-manager.js";
import type { CommandFailedError, Result } from "./types.js";
import { ok, err } from "./result.js";
import { runFile, requireSuccess } from "./exec.js";

export class SystemctlServiceManager implements ServiceManager {
  constructor(private readonly binary: string = "systemctl") {}

  private async systemctl(args: string[]): Promise<Result<void, CommandFailedError>> {
    const command = [this.binary, ...args].join(" ");
    const result = requireSuccess(command, await runFile(this.binary, args));
    if (!result.ok) return result;
    return ok(undefined);
  }

  stop(unit: string): Promise<Result<void, CommandFailedError>> {
    return this.systemctl(["stop", unit]);
  }

  start(unit: string): Promise<Result<void, CommandFailedError>> {
    return this.systemctl(["start", unit]);
  }

  restart(unit: string): Promise<Result<void, CommandFailedError>> {
    return this.systemctl(["restart", unit]);
  }

  enable(unit: string): Promise<Result<void, CommandFailedError>> {
    return this.systemctl(["enable", unit]);
  }

  daemonReload(): Promise<Result<void, CommandFailedError>> {
    return this.systemctl(["daemon-reload"]);
  }

  async activeState(unit: string): Promise<Result<UnitState, CommandFailedError>> {
    // `show` exits 0 even for unknown units (ActiveState=inactive)
    const command = `${this.binary} show ${unit} --property=ActiveState --value`;
    const result = requireSuccess(
      command,
      await runFile(this.binary, ["show", unit, "--property=ActiveState", "--value"]),
    );
    if (!result.ok) return result;
    return ok(result.value.stdout.trim() || "unknown");
  }

  async status(unit: string, lines: number): Promise<Result<string[], CommandFailedError>> {
    const result = await runFile(this.binary, ["status", unit, "--no-pager", "-l"]);
    if (!result.ok) return result;
    // status exits 3 for inactive units and 4 for unknown ones; output is still useful
    const { stdout, stderr, exitCode } = result.value;
    if (stdout.trim() === "" && exitCode !== 0) {
      return err({
        kind: "command_failed",
        command: `${this.binary} status ${unit}`,
        exitCode,
        message: stderr.trim(),
      });
    }
    return ok(stdout.replace(/\n$/, "").split("\n").slice(0, lines));
  }
}
