import { describe, expect, test } from "vitest";
import { createExcludeMatcher, excludedPrefix, isExcluded } from "./exclude.js";

function matches(pattern: string, path: string, isDirectory = false): boolean {
  return createExcludeMatcher(pattern)(path, isDirectory);
}

describe("createExcludeMatcher", () => {
  test("a bare name matches at any depth, on segment boundaries", () => {
    expect(matches("venv", "venv", true)).toBe(true);
    expect(matches("venv", "tools/venv", true)).toBe(true);
    expect(matches("venv", "myvenv", true)).toBe(false);
  });

  test("* stays within a segment", () => {
    expect(matches("*.db", "smartbot.db")).toBe(true);
    expect(matches("*.db", "data/cache.db")).toBe(true);
    expect(matches("*.db", "smartbot.db.bak")).toBe(false);
    expect(matches("deploy/*.md", "deploy/README.md")).toBe(true);
    expect(matches("deploy/*.md", "deploy/notes/README.md")).toBe(false);
    expect(matches("deploy/*.md", "README.md")).toBe(false);
  });

  test("** crosses segments", () => {
    expect(matches("assets/**/*.png", "assets/img/icons/a.png")).toBe(true);
    expect(matches("assets/**/*.png", "assets/a.png")).toBe(false);
  });

  test("? is exactly one character", () => {
    expect(matches("log?.txt", "log1.txt")).toBe(true);
    expect(matches("log?.txt", "log10.txt")).toBe(false);
  });

  test("a leading slash anchors at the transfer root", () => {
    expect(matches("/build", "build", true)).toBe(true);
    expect(matches("/build", "src/build", true)).toBe(false);
  });

  test("a trailing slash only matches directories", () => {
    expect(matches("logs/", "logs", true)).toBe(true);
    expect(matches("logs/", "logs", false)).toBe(false);
  });

  test(".env does not hide .env.example", () => {
    expect(matches(".env", ".env")).toBe(true);
    expect(matches(".env", ".env.example")).toBe(false);
  });

  test("regex metacharacters in patterns are literal", () => {
    expect(matches("*credentials*.json", "google_credentials.json")).toBe(true);
    expect(matches("*credentials*.json", "google_credentialsXjson")).toBe(false);
  });
});

describe("excludedPrefix", () => {
  const matchers = ["venv", "__pycache__"].map(createExcludeMatcher);

  test("returns the excluded parent directory", () => {
    expect(excludedPrefix("venv/bin/python3", false, matchers)).toBe("venv");
    expect(excludedPrefix("handlers/__pycache__/start.pyc", false, matchers)).toBe("handlers/__pycache__");
  });

  test("undefined for a path that is sent", () => {
    expect(excludedPrefix("handlers/start.py", false, matchers)).toBeUndefined();
    expect(isExcluded("handlers/start.py", false, matchers)).toBe(false);
  });
});
