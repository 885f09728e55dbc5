/**
 * NodeProcessTable against stub pgrep/pkill scripts in a temp directory.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, chmod, readFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NodeProcessTable } from "./process-table-node.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "unitmedic-ps-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function stub(name: string, body: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, `#!/bin/sh\n${body}\n`);
  await chmod(path, 0o755);
  return path;
}

/** pkill stub that records its arguments one per line */
function recordingPkill(exitCode: number): Promise<string> {
  return stub("pkill", `printf '%s\\n' "$@" > "${join(dir, "pkill.args")}"\nexit ${exitCode}`);
}

async function table(pgrepBody: string, pkillExit = 0): Promise<NodeProcessTable> {
  return new NodeProcessTable({ pgrep: await stub("pgrep", pgrepBody), pkill: await recordingPkill(pkillExit) });
}

const ONE = "printf '9999901 python3 main.py\\n'";

describe("NodeProcessTable", () => {
  describe("list", () => {
    test("parses matching processes", async () => {
      const ps = await table("printf '9999901 python3 main.py\\n9999902 python3 main.py --worker\\n'");

      expect(await ps.list("main\\.py")).toEqual({
        ok: true,
        value: [
          { pid: 9999901, command: "python3 main.py" },
          { pid: 9999902, command: "python3 main.py --worker" },
        ],
      });
    });

    test("exit 1 means nothing matched", async () => {
      const ps = await table("exit 1");
      expect(await ps.list("main\\.py")).toEqual({ ok: true, value: [] });
    });

    test("exit 2 is an error carrying stderr", async () => {
      const ps = await table("echo 'pgrep: invalid regex' >&2\nexit 2");

      expect(await ps.list("main\\.py")).toEqual({
        ok: false,
        error: { kind: "command_failed", command: "pgrep -af main\\.py", exitCode: 2, message: "pgrep: invalid regex" },
      });
    });
  });

  describe("kill", () => {
    test("signals by pattern and returns how many matched", async () => {
      const ps = await table(ONE);

      expect(await ps.kill("main\\.py", "KILL")).toEqual({ ok: true, value: 1 });
      expect(await readFile(join(dir, "pkill.args"), "utf-8")).toBe("-KILL\n-f\nmain\\.py\n");
    });

    test("does not run pkill when nothing matches", async () => {
      const ps = await table("exit 1");

      expect(await ps.kill("main\\.py", "KILL")).toEqual({ ok: true, value: 0 });
      await expect(stat(join(dir, "pkill.args"))).rejects.toThrow();
    });

    test("pkill exit 1 (already gone) is not an error", async () => {
      const ps = await table(ONE, 1);
      expect(await ps.kill("main\\.py", "TERM")).toEqual({ ok: true, value: 1 });
    });

    test("pkill exit above 1 is an error", async () => {
      const ps = await table(ONE, 3);

      const result = await ps.kill("main\\.py", "KILL");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.exitCode).toBe(3);
      expect(result.error.command).toBe("pkill -KILL -f main\\.py");
    });
  });
});
