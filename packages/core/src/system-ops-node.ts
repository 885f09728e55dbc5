/**
 * NodeSystemOps — real OS-level file operations via Node.js APIs.
 *
 * Takes a root directory; all paths are relative and validated
 * against traversal. Maps errno codes to typed Result errors.
 */

import { resolve, relative, dirname } from "node:path";
import {
  stat as fsStat,
  readFile as fsReadFile,
  chmod as fsChmod,
  writeFile as fsWriteFile,
  mkdir as fsMkdir,
  open,
  access,
} from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { FileStat, SystemOperations } from "./system-ops.js";
import { lastLines } from "./system-ops.js";
import type { FileSystemError, IOError, Ownership, Result } from "./types.js";
import { ok, err } from "./result.js";

const execFileAsync = promisify(execFile);

/** First read size for tail(); doubled until enough lines are in view */
export const TAIL_CHUNK_BYTES = 64 * 1024;

/** Map Node.js errno (or a failed chown/chmod child) to our typed errors */
function mapError(e: unknown, path: string, operation: string): FileSystemError {
  if (e instanceof Error && "code" in e) {
    const code = e.code;
    if (code === "ENOENT") return { kind: "not_found", path };
    if (code === "EACCES" || code === "EPERM") {
      return { kind: "permission_denied", path, operation };
    }
  }
  if (e instanceof Error && "stderr" in e && typeof e.stderr === "string") {
    const stderr = e.stderr;
    if (stderr.includes("No such file")) return { kind: "not_found", path };
    if (stderr.includes("Operation not permitted") || stderr.includes("Permission denied")) {
      return { kind: "permission_denied", path, operation };
    }
  }
  const message = e instanceof Error ? e.message : String(e);
  return { kind: "io_error", path, message };
}

/** Look up username for a uid via `id -un` */
async function uidToName(uid: number): Promise<string> {
  try {
    const { stdout } = await execFileAsync("id", ["-un", String(uid)]);
    return stdout.trim();
  } catch {
    return String(uid);
  }
}

/** Look up group name for a gid via getent */
async function gidToName(gid: number): Promise<string> {
  try {
    const { stdout } = await execFileAsync("getent", ["group", String(gid)]);
    const name = stdout.split(":")[0];
    return name || String(gid);
  } catch {
    return String(gid);
  }
}

/** Convert octal mode to 3-digit string (e.g. 0o100664 → "664") */
function modeToString(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, "0");
}

export class NodeSystemOps implements SystemOperations {
  public readonly workspace: string;

  constructor(workspace: string) {
    this.workspace = resolve(workspace);
  }

  /** Resolve a relative path, rejecting traversal outside the root */
  private resolvePath(path: string): Result<string, IOError> {
    const full = resolve(this.workspace, path);
    const rel = relative(this.workspace, full);
    if (rel.startsWith("..")) {
      return err({
        kind: "io_error",
        path,
        message: "Path traversal outside workspace",
      });
    }
    return ok(full);
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return ok(false);
    try {
      await access(resolved.value);
      return ok(true);
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        return ok(false);
      }
      return err({
        kind: "io_error",
        path,
        message: `exists: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  async stat(path: string): Promise<Result<FileStat, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    try {
      const s = await fsStat(resolved.value);
      const [user, group] = await Promise.all([uidToName(s.uid), gidToName(s.gid)]);

      return ok({
        path,
        ownership: { user, group, mode: modeToString(s.mode) },
        size: s.size,
        isDirectory: s.isDirectory(),
      });
    } catch (e) {
      return err(mapError(e, path, "stat"));
    }
  }

  async chown(
    path: string,
    owner: Ownership,
    opts: { recursive?: boolean } = {},
  ): Promise<Result<void, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    const args = opts.recursive ? ["-R"] : [];
    try {
      await execFileAsync("chown", [...args, `${owner.user}:${owner.group}`, resolved.value]);
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "chown"));
    }
  }

  async chmod(
    path: string,
    mode: string,
    opts: { recursive?: boolean } = {},
  ): Promise<Result<void, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    try {
      if (opts.recursive) {
        await execFileAsync("chmod", ["-R", mode, resolved.value]);
      } else {
        await fsChmod(resolved.value, parseInt(mode, 8));
      }
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "chmod"));
    }
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    try {
      const content = await fsReadFile(resolved.value, "utf-8");
      return ok(content);
    } catch (e) {
      return err(mapError(e, path, "readFile"));
    }
  }

  async writeFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;
    try {
      await fsMkdir(dirname(resolved.value), { recursive: true });
      await fsWriteFile(resolved.value, content, "utf-8");
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "writeFile"));
    }
  }

  /**
   * Reads backwards from the end of the file. The first line of a partial
   * chunk may be cut, so it only counts once the chunk reaches offset 0.
   */
  async tail(path: string, lines: number): Promise<Result<string[], FileSystemError>> {
    const resolved = this.resolvePath(path);
    if (!resolved.ok) return resolved;

    let handle: FileHandle | undefined;
    try {
      handle = await open(resolved.value, "r");
      const { size } = await handle.stat();
      let length = Math.min(size, TAIL_CHUNK_BYTES);
      for (;;) {
        const buffer = Buffer.alloc(length);
        await handle.read(buffer, 0, length, size - length);
        const text = buffer.toString("utf-8");
        if (length === size) return ok(lastLines(text, lines));

        const firstBreak = text.indexOf("\n");
        if (firstBreak !== -1) {
          const complete = lastLines(text.slice(firstBreak + 1), lines);
          if (complete.length >= lines) return ok(complete);
        }
        length = Math.min(size, length * 2);
      }
    } catch (e) {
      return err(mapError(e, path, "tail"));
    } finally {
      await handle?.close();
    }
  }
}
