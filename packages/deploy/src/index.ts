/**
 * @unitmedic/deploy — push a working tree to the server and restart the bot.
 */

export { deploy, remoteRestartCommand, shellQuote } from "./deploy.js";
export type { DeployOptions, DeployResult, DeployError } from "./deploy.js";

export { buildRsyncArgs, planTransfer, listLocalFiles, resolveTarget, sshDestination } from "./transfer.js";
export type { LocalEntry, TransferPlan, TransferTarget } from "./transfer.js";

export { createExcludeMatcher, excludedPrefix, isExcluded } from "./exclude.js";
export type { ExcludeMatcher } from "./exclude.js";

export { NodeCommandRunner } from "./command-runner.js";
export type { CommandRunner, RunOptions } from "./command-runner.js";
export { MockCommandRunner } from "./command-runner-mock.js";
export type { RecordedCommand } from "./command-runner-mock.js";

export { DeployCommand } from "./deploy-command.js";
export type { DeployCommandOptions } from "./deploy-command.js";
