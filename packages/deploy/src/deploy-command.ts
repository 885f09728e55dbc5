/**
 * Transfer plus remote restart, or a dry-run payload listing.
 */

import type { ConsoleOutput, RestartMode, UnitmedicConfig } from "@unitmedic/core";
import { formatError } from "@unitmedic/core";
import type { CommandRunner } from "./command-runner.js";
import type { LocalEntry, TransferTarget } from "./transfer.js";
import { listLocalFiles, planTransfer, sshDestination } from "./transfer.js";
import { deploy } from "./deploy.js";

export type DeployCommandOptions = {
  runner: CommandRunner;
  config: UnitmedicConfig;
  source: string;
  /** Undefined when neither the argument nor the config names a host */
  target?: TransferTarget;
  restart: RestartMode;
  dryRun?: boolean;
  /** Local tree lister (injectable for tests) */
  list?: (root: string) => Promise<LocalEntry[]>;
};

export class DeployCommand {
  constructor(
    private opts: DeployCommandOptions,
    private out: ConsoleOutput,
  ) {}

  async execute(): Promise<number> {
    const { config, source, target, restart } = this.opts;

    if (this.opts.dryRun) return this.dryRun();

    if (!target) {
      this.out.error("No server given and deploy.host is not set in unitmedic.json.");
      return 1;
    }

    this.out.heading(`🚀 Uploading ${source} to ${sshDestination(target)}:${target.path}`);
    const result = await deploy({
      runner: this.opts.runner,
      source,
      target,
      service: config.service,
      exclude: config.deploy.exclude,
      restart,
    });

    if (!result.ok) {
      const e = result.error;
      switch (e.kind) {
        case "transfer_failed":
          this.out.error(`❌ rsync exited with ${e.exitCode}; not restarting.`);
          break;
        case "restart_failed":
          this.out.error(`❌ Files uploaded, but the remote ${e.mode} exited with ${e.exitCode}.`);
          break;
        case "spawn_failed":
          this.out.error(`❌ ${formatError(e.error)}`);
          break;
      }
      return 1;
    }

    this.out.write("");
    this.out.success("✅ Files uploaded");
    this.out.success(`✅ Restarted (${result.value.remoteCommand})`);
    this.out.write("");
    this.out.info("Send the bot /start to check it answers, then follow the log:");
    this.out.info(`   ssh ${sshDestination(target)} 'tail -f ${target.path}/${config.log.path}'`);
    return 0;
  }

  private async dryRun(): Promise<number> {
    const { config, source } = this.opts;
    const list = this.opts.list ?? listLocalFiles;
    const plan = planTransfer(await list(source), config.deploy.exclude);

    this.out.heading(`Transfer plan for ${source} (dry run)`);
    this.out.write("");
    for (const file of plan.included) this.out.write(`  ${file}`);
    this.out.write("");
    for (const path of plan.excluded) this.out.info(`  excluded: ${path}`);
    this.out.write("");
    this.out.success(`${plan.included.length} file(s) would be sent, ${plan.excluded.length} path(s) excluded.`);
    return 0;
  }
}
