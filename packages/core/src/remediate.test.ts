import { describe, expect, test } from "vitest";
import { remediate } from "./remediate.js";
import type { RemediationOptions } from "./remediate.js";
import { MockSystemOps } from "./system-ops-mock.js";
import { MockProcessTable } from "./process-table-mock.js";
import { MockServiceManager } from "./service-manager-mock.js";
import type { MockServiceOptions } from "./service-manager-mock.js";
import { ManualClock } from "./poll.js";
import { parseConfig } from "./schema.js";
import { formatFinding } from "./findings.js";
import type { StepName, StepReport } from "./findings.js";

const WORKSPACE = "/var/www/smartbot";
const UNIT_DIR = "/etc/systemd/system";
const BOT = "python3 main.py";

function makeHost(serviceOpts: MockServiceOptions = {}) {
  const ops = new MockSystemOps(WORKSPACE);
  const unitOps = new MockSystemOps(UNIT_DIR);
  const processes = new MockProcessTable();
  const services = new MockServiceManager(processes, { unitOps, command: BOT, ...serviceOpts });
  const clock = new ManualClock();
  const config = parseConfig({ version: 1, service: "smartbot", processPattern: "python3 main\\.py" });
  const options: RemediationOptions = { ops, unitOps, processes, services, clock, config };
  return { ops, unitOps, processes, services, clock, options };
}

/** A deployment tree with everything in place but wrong ownership and modes */
function addTree(ops: MockSystemOps, skip: string[] = []): void {
  const files: Array<[string, string, { owner?: string; group?: string; mode?: string; size?: number }]> = [
    ["main.py", "print('bot')\n", { owner: "deploy", group: "deploy", mode: "600" }],
    [".env", "BOT_TOKEN=test-secret\n", {}],
    ["google_credentials.json", "{}", {}],
    ["smartbot.db", "", { size: 50_000 }],
    ["venv/bin/python3", "", { mode: "700" }],
    ["deploy/smartbot.service", "[Unit]\nDescription=smartbot\n", {}],
    ["bot.log", "started\npolling\n", {}],
  ];
  ops.addDir("venv/bin");
  for (const [path, content, opts] of files) {
    if (!skip.includes(path)) ops.addFile(path, content, opts);
  }
}

function stepOf(steps: StepReport[], name: StepName): StepReport | undefined {
  return steps.find((s) => s.step === name);
}

describe("remediate", () => {
  test("replaces duplicate instances with exactly one", async () => {
    const { ops, processes, services, options } = makeHost();
    addTree(ops);
    const managed = processes.spawn(BOT);
    processes.spawn(BOT);
    services.markRunning("smartbot", [managed]);

    const report = await remediate(options);

    expect(report.outcome).toBe("healthy");
    expect(report.abortedAt).toBeUndefined();
    expect(report.steps.map((s) => s.step)).toEqual([
      "stop",
      "permissions",
      "database",
      "config",
      "unit",
      "start",
      "health",
      "logs",
    ]);
    expect(report.processes).toEqual([{ pid: 1002, command: BOT }]);
    expect(processes.all).toEqual([{ pid: 1002, command: BOT }]);

    const stop = stepOf(report.steps, "stop");
    expect(stop?.status).toBe("changed");
    expect(stop?.notes).toEqual(["sent SIGKILL to 1 process(es)", "all processes stopped"]);
  });

  test("installs the unit and reloads systemd before starting", async () => {
    const { ops, unitOps, services, options } = makeHost();
    addTree(ops);

    const report = await remediate(options);

    expect(services.calls).toEqual(["stop smartbot", "daemon-reload", "enable smartbot", "start smartbot"]);
    expect(await unitOps.readFile("smartbot.service")).toEqual({
      ok: true,
      value: "[Unit]\nDescription=smartbot\n",
    });
    const unit = stepOf(report.steps, "unit");
    expect(unit?.status).toBe("changed");
    expect(unit?.findings.map(formatFinding)).toEqual(["installed unit file /etc/systemd/system/smartbot.service"]);
  });

  test("resets ownership and modes whatever they were", async () => {
    const { ops, options } = makeHost();
    addTree(ops);

    const report = await remediate(options);

    expect(ops.ownershipOf(".")).toEqual({ owner: "www-data", group: "www-data", mode: "775" });
    expect(ops.ownershipOf("smartbot.db")).toEqual({ owner: "www-data", group: "www-data", mode: "664" });
    expect(ops.ownershipOf("venv/bin/python3")).toEqual({ owner: "www-data", group: "www-data", mode: "755" });
    expect(ops.ownershipOf("main.py")).toEqual({ owner: "www-data", group: "www-data", mode: "600" });
    expect(stepOf(report.steps, "permissions")?.notes).toEqual([
      "fixed owner of .: root:root → www-data:www-data",
      "fixed mode of .: 755 → 775",
      "fixed mode of smartbot.db: 644 → 664",
      "owner www-data:www-data, 3 mode rule(s) applied",
    ]);
  });

  test("a second run finds nothing to fix", async () => {
    const { ops, services, options } = makeHost();
    addTree(ops);

    await remediate(options);
    const second = await remediate(options);

    expect(second.outcome).toBe("healthy");
    expect(second.processes).toHaveLength(1);
    expect(stepOf(second.steps, "stop")?.status).toBe("ok");
    expect(stepOf(second.steps, "permissions")?.status).toBe("ok");
    expect(stepOf(second.steps, "unit")?.notes).toEqual(["/etc/systemd/system/smartbot.service present"]);
    expect(services.calls.filter((c) => c === "daemon-reload")).toHaveLength(1);
  });

  test("reports status lines and the log tail", async () => {
    const { ops, options } = makeHost();
    addTree(ops);

    const report = await remediate(options);

    expect(stepOf(report.steps, "health")?.notes).toEqual([
      "running processes: 1",
      "● smartbot.service",
      "     Active: active",
      "   Main PID: 1000",
    ]);
    expect(stepOf(report.steps, "logs")?.notes).toEqual(["started", "polling"]);
  });

  test("waits settleMs before the stability re-check", async () => {
    const { ops, clock, options } = makeHost();
    addTree(ops);

    await remediate(options);

    expect(clock.sleeps).toEqual([1000]);
  });

  // ── aborts ──────────────────────────────────────────────────────────

  test("aborts before starting when .env is missing", async () => {
    const { ops, services, processes, options } = makeHost();
    addTree(ops, [".env"]);

    const report = await remediate(options);

    expect(report.outcome).toBe("aborted");
    expect(report.abortedAt).toBe("config");
    expect(report.steps).toHaveLength(4);
    expect(stepOf(report.steps, "config")?.findings.map(formatFinding)).toEqual([
      "missing required config file .env",
    ]);
    expect(services.calls).toEqual(["stop smartbot"]);
    expect(processes.all).toEqual([]);
  });

  test("aborts when a process survives SIGKILL", async () => {
    const { ops, services, processes, clock, options } = makeHost();
    addTree(ops);
    processes.spawn(BOT, { unkillable: true });

    const report = await remediate(options);

    expect(report.abortedAt).toBe("stop");
    expect(report.steps).toHaveLength(1);
    expect(report.steps[0]?.findings.map(formatFinding)).toEqual([
      "1 process(es) still running after kill: 1000",
    ]);
    expect(clock.sleeps).toEqual([500, 500, 500, 500, 500, 500]);
    expect(services.calls).toEqual(["stop smartbot"]);
  });

  test("aborts when the process table cannot be read", async () => {
    const { ops, processes, options } = makeHost();
    addTree(ops);
    processes.failList = "pgrep: cannot open /proc";

    const report = await remediate(options);

    expect(report.abortedAt).toBe("stop");
    expect(report.steps[0]?.findings[0]?.kind).toBe("process_query_failed");
  });

  // ── soft anomalies ──────────────────────────────────────────────────

  test("missing optional credentials and a small database only warn", async () => {
    const { ops, options } = makeHost();
    addTree(ops, ["google_credentials.json", "smartbot.db"]);
    ops.addFile("smartbot.db", "", { size: 512 });

    const report = await remediate(options);

    expect(report.outcome).toBe("healthy");
    expect(stepOf(report.steps, "database")?.findings.map(formatFinding)).toEqual([
      "database smartbot.db is 512 bytes (< 10000), possibly empty",
    ]);
    expect(stepOf(report.steps, "config")?.findings.map(formatFinding)).toEqual([
      "missing google_credentials.json",
    ]);
  });

  test("a missing database warns and the run goes on", async () => {
    const { ops, options } = makeHost();
    addTree(ops, ["smartbot.db"]);

    const report = await remediate(options);

    expect(report.outcome).toBe("healthy");
    expect(stepOf(report.steps, "database")?.status).toBe("warning");
  });

  test("a permission failure is a warning, not an abort", async () => {
    const { ops, options } = makeHost();
    addTree(ops);
    ops.lock("smartbot.db");

    const report = await remediate(options);

    const permissions = stepOf(report.steps, "permissions");
    expect(permissions?.status).toBe("warning");
    expect(permissions?.findings.map(formatFinding)).toEqual([
      "chmod smartbot.db failed (smartbot.db: permission denied (chmod))",
    ]);
    expect(permissions?.notes).not.toContain("fixed mode of smartbot.db: 644 → 664");
    expect(report.outcome).toBe("healthy");
  });

  test("two processes after start is degraded", async () => {
    const { ops, options } = makeHost({ spawnCount: 2 });
    addTree(ops);

    const report = await remediate(options);

    expect(report.outcome).toBe("degraded");
    expect(report.steps).toHaveLength(8);
    const health = stepOf(report.steps, "health");
    expect(health?.status).toBe("failed");
    expect(health?.findings.map(formatFinding)).toEqual(["2 processes running (expected 1): 1000, 1001"]);
  });

  test("no process after start is degraded", async () => {
    const { ops, options } = makeHost({ spawnCount: 0 });
    addTree(ops);

    const report = await remediate(options);

    expect(report.outcome).toBe("degraded");
    expect(stepOf(report.steps, "health")?.findings.map(formatFinding)).toEqual(["bot is not running"]);
    expect(report.processes).toEqual([]);
  });

  test("a pid that changes while settling is flagged as a crash loop", async () => {
    const { ops, options } = makeHost({ crashLoop: true });
    addTree(ops);

    const report = await remediate(options);

    expect(report.outcome).toBe("degraded");
    expect(stepOf(report.steps, "health")?.findings.map(formatFinding)).toEqual([
      "pid changed from 1000 to 1001 while settling, possible crash-restart loop",
    ]);
  });

  test("a process list that fails after settling is not reported healthy", async () => {
    const { ops, processes, options } = makeHost();
    addTree(ops);
    let now = 0;
    const clock = {
      now: () => now,
      sleep: async (ms: number) => {
        now += ms;
        processes.failList = "pgrep: cannot open /proc";
      },
    };

    const report = await remediate({ ...options, clock });

    expect(report.outcome).toBe("degraded");
    expect(stepOf(report.steps, "health")?.findings.map(formatFinding)).toEqual([
      "list processes failed: pgrep -af python3 main\\.py exited with 2: pgrep: cannot open /proc",
    ]);
  });

  test("without a unit file anywhere the start fails and is reported", async () => {
    const { ops, options } = makeHost();
    addTree(ops, ["deploy/smartbot.service"]);

    const report = await remediate(options);

    expect(stepOf(report.steps, "unit")?.findings.map(formatFinding)).toEqual([
      "bundled unit file deploy/smartbot.service not found, cannot install",
    ]);
    expect(stepOf(report.steps, "start")?.findings.map(formatFinding)).toEqual([
      "start failed: systemctl start smartbot exited with 1: mock start failure",
    ]);
    expect(report.outcome).toBe("degraded");
  });

  test("onStep sees every step as it completes", async () => {
    const { ops, options } = makeHost();
    addTree(ops);
    const seen: string[] = [];

    await remediate({ ...options, onStep: (s) => seen.push(s.step) });

    expect(seen).toEqual(["stop", "permissions", "database", "config", "unit", "start", "health", "logs"]);
  });
});
