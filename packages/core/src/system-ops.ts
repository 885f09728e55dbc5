/**
 * SystemOperations — abstraction over OS-level file operations.
 *
 * Takes a root directory at construction time; all paths are relative.
 * Each method declares exactly which errors it can return.
 */

import type { FileOwnership, FileSystemError, IOError, Ownership, Result } from "./types.js";

export type FileStat = {
  path: string;
  ownership: FileOwnership;
  /** Size in bytes */
  size: number;
  isDirectory: boolean;
};

export interface SystemOperations {
  /** The directory this instance operates on */
  readonly workspace: string;

  /** Check if a path exists (relative path) */
  exists(path: string): Promise<Result<boolean, IOError>>;

  /** Get ownership, mode and size (relative path) */
  stat(path: string): Promise<Result<FileStat, FileSystemError>>;

  /** Change owner and group. Does not set mode. */
  chown(
    path: string,
    owner: Ownership,
    opts?: { recursive?: boolean },
  ): Promise<Result<void, FileSystemError>>;

  /** Change permission bits */
  chmod(
    path: string,
    mode: string,
    opts?: { recursive?: boolean },
  ): Promise<Result<void, FileSystemError>>;

  /** Read file contents */
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  /** Write content to a file. Creates parent dirs if needed. */
  writeFile(path: string, content: string): Promise<Result<void, FileSystemError>>;

  /** Last `lines` lines of a text file */
  tail(path: string, lines: number): Promise<Result<string[], FileSystemError>>;
}

/**
 * Last `count` lines of `content`, ignoring the trailing newline.
 * Shared by the node and mock implementations.
 */
export function lastLines(content: string, count: number): string[] {
  if (content === "") return [];
  const lines = content.replace(/\r?\n$/, "").split(/\r?\n/);
  return lines.slice(Math.max(0, lines.length - count));
}
