#!/usr/bin/env node
/**
 * unitmedic-deploy CLI entry point.
 */

import { Command } from "commander";
import { resolve } from "node:path";
import { LiveConsoleOutput, NodeSystemOps, VERSION, loadConfig } from "@unitmedic/core";
import type { RestartMode } from "@unitmedic/core";
import { NodeCommandRunner } from "./command-runner.js";
import { DeployCommand } from "./deploy-command.js";
import { resolveTarget } from "./transfer.js";

type DeployFlags = {
  full?: boolean;
  dryRun?: boolean;
  user?: string;
  path?: string;
  source: string;
};

const program = new Command()
  .name("unitmedic-deploy")
  .description("Mirror the working tree to the server with rsync, then restart the bot over ssh")
  .version(VERSION)
  .argument("[server]", "server address (defaults to deploy.host in unitmedic.json)")
  .option("--full", "run `unitmedic remediate` remotely instead of a plain service restart")
  .option("--dry-run", "list the files that would be sent, transfer nothing")
  .option("--user <user>", "ssh user (defaults to deploy.user)")
  .option("--path <path>", "remote deployment directory (defaults to deploy.path)")
  .option("--source <dir>", "local working tree", process.cwd())
  .action(async (server: string | undefined, flags: DeployFlags) => {
    const out = new LiveConsoleOutput();
    try {
      const source = resolve(flags.source);
      const config = await loadConfig(new NodeSystemOps(source));
      const restart: RestartMode = flags.full ? "remediate" : config.deploy.restart;
      const cmd = new DeployCommand(
        {
          runner: new NodeCommandRunner(),
          config,
          source,
          target: resolveTarget(config.deploy, { host: server, user: flags.user, path: flags.path }),
          restart,
          dryRun: flags.dryRun,
        },
        out,
      );
      process.exitCode = await cmd.execute();
    } catch (e) {
      out.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
