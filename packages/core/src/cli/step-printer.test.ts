import { describe, expect, it } from "vitest";
import { MockConsoleOutput } from "../console-mock.js";
import { StepPrinter } from "./step-printer.js";

describe("StepPrinter", () => {
  it("numbers the step, prints notes and confirms ok", () => {
    const out = new MockConsoleOutput();

    new StepPrinter(out).print({ step: "stop", status: "ok", findings: [], notes: ["all processes stopped"] });

    expect(out.lines).toEqual([
      { level: "step", text: "1. Stopping all processes" },
      { level: "info", text: "   all processes stopped" },
      { level: "success", text: "   ✅ OK" },
      { level: "write", text: "" },
    ]);
  });

  it("prints warnings without the ok marker", () => {
    const out = new MockConsoleOutput();

    new StepPrinter(out).print({
      step: "database",
      status: "warning",
      findings: [{ kind: "small_database", path: "bot.db", size: 512, minBytes: 10_000 }],
      notes: ["database size: 512 bytes"],
    });

    expect(out.lines).toEqual([
      { level: "step", text: "3. Checking database" },
      { level: "info", text: "   database size: 512 bytes" },
      { level: "warn", text: "   ⚠️  database bot.db is 512 bytes (< 10000), possibly empty" },
      { level: "write", text: "" },
    ]);
  });

  it("marks installs as fixes and errors as failures", () => {
    const out = new MockConsoleOutput();

    new StepPrinter(out).print({
      step: "unit",
      status: "changed",
      findings: [{ kind: "unit_installed", path: "/etc/systemd/system/bot.service" }],
      notes: [],
    });
    new StepPrinter(out).print({ step: "health", status: "failed", findings: [{ kind: "not_running" }], notes: [] });

    expect(out.textsAt("success")).toEqual(["   🔧 installed unit file /etc/systemd/system/bot.service", "   ✅ OK"]);
    expect(out.textsAt("error")).toEqual(["   ❌ bot is not running"]);
  });
});
