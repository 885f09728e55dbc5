import { describe, expect, it } from "vitest";
import { MockSystemOps } from "../system-ops-mock.js";
import { MockProcessTable } from "../process-table-mock.js";
import { MockServiceManager } from "../service-manager-mock.js";
import type { MockServiceOptions } from "../service-manager-mock.js";
import { MockConsoleOutput } from "../console-mock.js";
import { ManualClock } from "../poll.js";
import { parseConfig } from "../schema.js";
import { RemediateCommand } from "./remediate-command.js";
import { RestartCommand } from "./restart-command.js";
import type { RemediateCommandOptions } from "./remediate-command.js";

function setup(
  configure: (ops: MockSystemOps) => void,
  serviceOpts: MockServiceOptions = {},
  strict = false,
): { opts: RemediateCommandOptions; out: MockConsoleOutput } {
  const ops = new MockSystemOps("/var/www/smartbot");
  configure(ops);
  const unitOps = new MockSystemOps("/etc/systemd/system");
  unitOps.addFile("smartbot.service", "[Unit]\n");
  const processes = new MockProcessTable();
  const opts: RemediateCommandOptions = {
    ops,
    unitOps,
    processes,
    services: new MockServiceManager(processes, { command: "python3 main.py", ...serviceOpts }),
    clock: new ManualClock(),
    config: parseConfig({ version: 1, service: "smartbot", processPattern: "main\\.py" }),
    strict,
  };
  return { opts, out: new MockConsoleOutput() };
}

const complete = (ops: MockSystemOps) => {
  ops.addFile(".env", "BOT_TOKEN=test-secret\n");
  ops.addFile("google_credentials.json", "{}");
  ops.addFile("smartbot.db", "", { size: 20_000 });
};

describe("RemediateCommand", () => {
  it("returns 0 and confirms a single process", async () => {
    const { opts, out } = setup(complete);

    const code = await new RemediateCommand(opts, out).execute();

    expect(code).toBe(0);
    expect(out.textsAt("heading")).toEqual(["unitmedic remediate — smartbot (/var/www/smartbot)"]);
    expect(out.textsAt("step")).toEqual([
      "1. Stopping all processes",
      "2. Fixing file permissions",
      "3. Checking database",
      "4. Checking configuration",
      "5. Checking systemd unit",
      "6. Starting service",
      "7. Verifying process count",
      "8. Recent log lines",
    ]);
    expect(out.hasText("✅ Remediation complete — exactly 1 process running")).toBe(true);
    expect(out.textsAt("info").at(-1)).toBe("Follow the log: tail -f /var/www/smartbot/bot.log");
  });

  it("returns 1 and names the step when aborted", async () => {
    const { opts, out } = setup(() => {});

    const code = await new RemediateCommand(opts, out).execute();

    expect(code).toBe(1);
    expect(out.textsAt("step")).toHaveLength(4);
    expect(out.textsAt("error").at(-1)).toBe("❌ Aborted at step 4 (Checking configuration)");
  });

  it("returns 0 for a degraded run unless strict", async () => {
    const lenient = setup(complete, { spawnCount: 2 });
    expect(await new RemediateCommand(lenient.opts, lenient.out).execute()).toBe(0);
    expect(lenient.out.textsAt("warn").at(-1)).toBe("⚠️  Remediation finished with problems, see above");

    const strict = setup(complete, { spawnCount: 2 }, true);
    expect(await new RemediateCommand(strict.opts, strict.out).execute()).toBe(1);
  });
});

describe("RestartCommand", () => {
  it("returns 0 after a clean restart", async () => {
    const { opts, out } = setup(() => {});

    const code = await new RestartCommand(opts, out).execute();

    expect(code).toBe(0);
    expect(out.textsAt("heading")).toEqual(["unitmedic restart — smartbot"]);
    expect(out.textsAt("success").at(-1)).toBe("✅ Restarted");
  });

  it("exits 1 under strict when the bot did not come up", async () => {
    const { opts, out } = setup(() => {}, { spawnCount: 0 }, true);

    expect(await new RestartCommand(opts, out).execute()).toBe(1);
    expect(out.hasText("run `unitmedic remediate` for the full repair")).toBe(true);
  });
});
