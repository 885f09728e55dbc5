#!/usr/bin/env node
/**
 * unitmedic CLI entry point.
 */

import { Command } from "commander";
import { resolve } from "node:path";
import { LiveConsoleOutput } from "./console-live.js";
import { RemediateCommand } from "./cli/remediate-command.js";
import { RestartCommand } from "./cli/restart-command.js";
import { CheckCommand } from "./cli/check-command.js";
import { InitCommand } from "./cli/init-command.js";
import { NodeSystemOps } from "./system-ops-node.js";
import { NodeProcessTable } from "./process-table-node.js";
import { SystemctlServiceManager } from "./service-manager-node.js";
import { systemClock } from "./poll.js";
import { loadConfig } from "./load-config.js";
import type { StepContext } from "./steps.js";
import { VERSION } from "./constants.js";

async function makeContext(workspace: string): Promise<StepContext> {
  const ops = new NodeSystemOps(resolve(workspace));
  const config = await loadConfig(ops);
  return {
    ops,
    unitOps: new NodeSystemOps(config.unit.directory),
    processes: new NodeProcessTable(),
    services: new SystemctlServiceManager(),
    clock: systemClock,
    config,
  };
}

/** Shared action wrapper: config errors and unexpected throws exit 1 */
async function runAction(body: (out: LiveConsoleOutput) => Promise<number>): Promise<void> {
  const out = new LiveConsoleOutput();
  try {
    process.exitCode = await body(out);
  } catch (e) {
    out.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
}

const program = new Command()
  .name("unitmedic")
  .description("Stop, repair, restart and verify a systemd-managed bot")
  .version(VERSION);

program
  .command("remediate")
  .description("Full repair: stop, fix permissions, validate, start, verify exactly one process")
  .argument("[workspace]", "deployment directory", process.cwd())
  .option("--strict", "exit 1 unless exactly one stable process is running at the end")
  .action((workspace: string, opts: { strict?: boolean }) =>
    runAction(async (out) => {
      const ctx = await makeContext(workspace);
      return new RemediateCommand({ ...ctx, strict: opts.strict }, out).execute();
    }),
  );

program
  .command("restart")
  .description("Short repair: stop, kill, fix permissions, start, show status and log")
  .argument("[workspace]", "deployment directory", process.cwd())
  .option("--strict", "exit 1 unless exactly one stable process is running at the end")
  .action((workspace: string, opts: { strict?: boolean }) =>
    runAction(async (out) => {
      const ctx = await makeContext(workspace);
      return new RestartCommand({ ...ctx, strict: opts.strict }, out).execute();
    }),
  );

program
  .command("check")
  .description("Report process, permission, config and unit problems without changing anything")
  .argument("[workspace]", "deployment directory", process.cwd())
  .action((workspace: string) =>
    runAction(async (out) => {
      const ctx = await makeContext(workspace);
      return new CheckCommand(ctx, out).execute();
    }),
  );

program
  .command("init")
  .description("Write a starter unitmedic.json")
  .argument("[workspace]", "deployment directory", process.cwd())
  .requiredOption("--service <name>", "systemd unit name (without .service)")
  .requiredOption("--pattern <regex>", "process command-line pattern for pgrep/pkill")
  .action((workspace: string, opts: { service: string; pattern: string }) =>
    runAction(async (out) => {
      const ops = new NodeSystemOps(resolve(workspace));
      return new InitCommand({ ops, service: opts.service, processPattern: opts.pattern }, out).execute();
    }),
  );

await program.parseAsync();
