/**
 * Transfer planning and rsync argument building.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { DeployConfig } from "@unitmedic/core";
import type { ExcludeMatcher } from "./exclude.js";
import { createExcludeMatcher, excludedPrefix } from "./exclude.js";

export type LocalEntry = { path: string; isDirectory: boolean };

export type TransferPlan = {
  /** Files rsync would send, sorted */
  included: string[];
  /** Top-most excluded paths (an excluded directory hides its contents), sorted */
  excluded: string[];
};

export type TransferTarget = {
  host: string;
  user: string;
  /** Remote deployment directory */
  path: string;
};

export function sshDestination(target: TransferTarget): string {
  return `${target.user}@${target.host}`;
}

/**
 * `rsync -avz --progress --exclude=... <source>/ <user>@<host>:<path>/`
 * The trailing slash on the source copies its contents, not the directory.
 */
export function buildRsyncArgs(
  source: string,
  target: TransferTarget,
  exclude: string[],
  opts: { dryRun?: boolean } = {},
): string[] {
  const from = `${source.replace(/\/+$/, "") || "."}/`;
  const to = `${sshDestination(target)}:${target.path.replace(/\/+$/, "")}/`;
  return [
    "-avz",
    "--progress",
    ...(opts.dryRun ? ["--dry-run"] : []),
    ...exclude.map((pattern) => `--exclude=${pattern}`),
    from,
    to,
  ];
}

/** Split a local file listing into what would and would not be sent */
export function planTransfer(entries: LocalEntry[], exclude: string[]): TransferPlan {
  const matchers: ExcludeMatcher[] = exclude.map(createExcludeMatcher);
  const included: string[] = [];
  const excluded = new Set<string>();

  for (const entry of entries) {
    const prefix = excludedPrefix(entry.path, entry.isDirectory, matchers);
    if (prefix !== undefined) excluded.add(prefix);
    else if (!entry.isDirectory) included.push(entry.path);
  }

  return { included: included.sort(), excluded: [...excluded].sort() };
}

/** Recursive listing of `root`, paths relative and `/`-separated */
export async function listLocalFiles(root: string): Promise<LocalEntry[]> {
  const entries: LocalEntry[] = [];

  async function walk(dir: string, prefix: string): Promise<void> {
    const children = await readdir(dir, { withFileTypes: true });
    for (const child of children) {
      const rel = prefix ? `${prefix}/${child.name}` : child.name;
      const isDirectory = child.isDirectory();
      entries.push({ path: rel, isDirectory });
      if (isDirectory) await walk(join(dir, child.name), rel);
    }
  }

  await walk(root, "");
  return entries;
}

/** Resolve the transfer target from the CLI argument and deploy config */
export function resolveTarget(
  deploy: DeployConfig,
  overrides: { host?: string; user?: string; path?: string },
): TransferTarget | undefined {
  const host = overrides.host ?? deploy.host;
  if (!host) return undefined;
  return { host, user: overrides.user ?? deploy.user, path: overrides.path ?? deploy.path };
}
