/**
 * Mock SystemOperations for testing.
 *
 * Takes a root directory; all paths are relative (resolved internally).
 * Records all mutation operations for assertion.
 */

import { resolve, relative } from "node:path";
import type { FileStat, SystemOperations } from "./system-ops.js";
import { lastLines } from "./system-ops.js";
import type { FileSystemError, IOError, Ownership, Result } from "./types.js";
import { ok, err } from "./result.js";

export type RecordedOp =
  | { kind: "chown"; path: string; owner: Ownership; recursive: boolean }
  | { kind: "chmod"; path: string; mode: string; recursive: boolean }
  | { kind: "writeFile"; path: string };

type MockEntry = {
  content: string;
  owner: string;
  group: string;
  mode: string;
  isDirectory: boolean;
  /** Overrides content length when set, for size checks */
  size?: number;
};

type EntryOpts = { owner?: string; group?: string; mode?: string; size?: number };

export class MockSystemOps implements SystemOperations {
  public readonly workspace: string;
  private entries: Map<string, MockEntry> = new Map();
  /** Paths where chown/chmod fail with permission_denied */
  private locked: Set<string> = new Set();
  public ops: RecordedOp[] = [];

  constructor(workspace: string) {
    this.workspace = workspace;
    this.entries.set(resolve(workspace), {
      content: "",
      owner: "root",
      group: "root",
      mode: "755",
      isDirectory: true,
    });
  }

  private resolve(path: string): string {
    return resolve(this.workspace, path);
  }

  /** Add a simulated file (relative path) */
  addFile(path: string, content: string, opts: EntryOpts = {}): void {
    this.entries.set(this.resolve(path), {
      content,
      owner: opts.owner ?? "root",
      group: opts.group ?? "root",
      mode: opts.mode ?? "644",
      isDirectory: false,
      size: opts.size,
    });
  }

  /** Add a simulated directory (relative path) */
  addDir(path: string, opts: EntryOpts = {}): void {
    this.entries.set(this.resolve(path), {
      content: "",
      owner: opts.owner ?? "root",
      group: opts.group ?? "root",
      mode: opts.mode ?? "755",
      isDirectory: true,
    });
  }

  /** Make chown/chmod on a path fail with permission_denied */
  lock(path: string): void {
    this.locked.add(this.resolve(path));
  }

  /** Absolute keys at or below `full` */
  private subtree(full: string): string[] {
    return [...this.entries.keys()].filter((key) => {
      const rel = relative(full, key);
      return rel === "" || (!rel.startsWith("..") && !rel.startsWith("/"));
    });
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    return ok(this.entries.has(this.resolve(path)));
  }

  async stat(path: string): Promise<Result<FileStat, FileSystemError>> {
    const entry = this.entries.get(this.resolve(path));
    if (!entry) return err({ kind: "not_found", path });
    return ok({
      path,
      ownership: { user: entry.owner, group: entry.group, mode: entry.mode },
      size: entry.size ?? Buffer.byteLength(entry.content),
      isDirectory: entry.isDirectory,
    });
  }

  async chown(
    path: string,
    owner: Ownership,
    opts: { recursive?: boolean } = {},
  ): Promise<Result<void, FileSystemError>> {
    const full = this.resolve(path);
    if (!this.entries.has(full)) return err({ kind: "not_found", path });
    if (this.locked.has(full)) return err({ kind: "permission_denied", path, operation: "chown" });
    const recursive = opts.recursive ?? false;
    this.ops.push({ kind: "chown", path, owner, recursive });
    for (const key of recursive ? this.subtree(full) : [full]) {
      const entry = this.entries.get(key);
      if (!entry) continue;
      entry.owner = owner.user;
      entry.group = owner.group;
    }
    return ok(undefined);
  }

  async chmod(
    path: string,
    mode: string,
    opts: { recursive?: boolean } = {},
  ): Promise<Result<void, FileSystemError>> {
    const full = this.resolve(path);
    if (!this.entries.has(full)) return err({ kind: "not_found", path });
    if (this.locked.has(full)) return err({ kind: "permission_denied", path, operation: "chmod" });
    const recursive = opts.recursive ?? false;
    this.ops.push({ kind: "chmod", path, mode, recursive });
    for (const key of recursive ? this.subtree(full) : [full]) {
      const entry = this.entries.get(key);
      if (entry) entry.mode = mode;
    }
    return ok(undefined);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const entry = this.entries.get(this.resolve(path));
    if (!entry || entry.isDirectory) return err({ kind: "not_found", path });
    return ok(entry.content);
  }

  async writeFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    this.ops.push({ kind: "writeFile", path });
    this.entries.set(this.resolve(path), {
      content,
      owner: "root",
      group: "root",
      mode: "644",
      isDirectory: false,
    });
    return ok(undefined);
  }

  async tail(path: string, lines: number): Promise<Result<string[], FileSystemError>> {
    const content = await this.readFile(path);
    if (!content.ok) return content;
    return ok(lastLines(content.value, lines));
  }

  /** Current ownership of a path, for assertions */
  ownershipOf(path: string): { owner: string; group: string; mode: string } | undefined {
    const entry = this.entries.get(this.resolve(path));
    if (!entry) return undefined;
    return { owner: entry.owner, group: entry.group, mode: entry.mode };
  }
}
