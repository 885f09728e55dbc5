/**
 * rsync-style exclude matching, used to plan (and test) the transfer payload.
 *
 * Supported subset of rsync's filter rules:
 * - `*` matches within one path segment, `**` across segments, `?` one char
 * - a leading `/` anchors the pattern at the transfer root
 * - otherwise the pattern matches the end of the path at a segment boundary
 *   (so `venv` matches `venv` and `sub/venv`; `deploy/*.md` matches `deploy/x.md`)
 * - a trailing `/` only matches directories
 * - an excluded directory excludes everything below it
 */

export type ExcludeMatcher = (path: string, isDirectory: boolean) => boolean;

function globToRegex(glob: string): string {
  const escape = (s: string) => s.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  return glob
    .split(/(\*\*|\*|\?)/)
    .map((part) => {
      if (part === "**") return ".*";
      if (part === "*") return "[^/]*";
      if (part === "?") return "[^/]";
      return escape(part);
    })
    .join("");
}

/** Compile one exclude pattern */
export function createExcludeMatcher(pattern: string): ExcludeMatcher {
  let body = pattern;
  const dirOnly = body.endsWith("/");
  if (dirOnly) body = body.slice(0, -1);
  const anchored = body.startsWith("/");
  if (anchored) body = body.slice(1);

  const regex = new RegExp(`${anchored ? "^" : "(?:^|/)"}${globToRegex(body)}$`);
  return (path: string, isDirectory: boolean) => {
    if (dirOnly && !isDirectory) return false;
    return regex.test(path);
  };
}

/**
 * The shortest prefix of `path` (relative, `/`-separated) that an exclude
 * pattern hits: the path itself or one of its parent directories.
 */
export function excludedPrefix(
  path: string,
  isDirectory: boolean,
  matchers: ExcludeMatcher[],
): string | undefined {
  const segments = path.split("/").filter((s) => s !== "" && s !== ".");
  for (let i = 1; i <= segments.length; i++) {
    const prefix = segments.slice(0, i).join("/");
    const prefixIsDir = i < segments.length || isDirectory;
    if (matchers.some((m) => m(prefix, prefixIsDir))) return prefix;
  }
  return undefined;
}

export function isExcluded(path: string, isDirectory: boolean, matchers: ExcludeMatcher[]): boolean {
  return excludedPrefix(path, isDirectory, matchers) !== undefined;
}
