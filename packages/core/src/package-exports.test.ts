/**
 * Built binaries import @unitmedic/core by name, so the package must resolve
 * to compiled JavaScript under Node while tests and the type-check use sources.
 */

import { describe, expect, test } from "vitest";
import { readFile } from "node:fs/promises";
import { z } from "zod";

const manifest = z.object({
  exports: z.object({ ".": z.record(z.string()) }),
});

async function readJson(relative: string): Promise<unknown> {
  return JSON.parse(await readFile(new URL(relative, import.meta.url), "utf-8"));
}

describe("workspace package exports", () => {
  test.each(["../package.json", "../../deploy/package.json"])("%s resolves to dist for node", async (path) => {
    const conditions = manifest.parse(await readJson(path)).exports["."];

    expect(conditions).toEqual({
      source: "./src/index.ts",
      types: "./dist/index.d.ts",
      default: "./dist/index.js",
    });
    expect(Object.keys(conditions).at(-1)).toBe("default");
  });

  test("root bins point at the per-package build output", async () => {
    expect(await readJson("../../../package.json")).toMatchObject({
      bin: {
        unitmedic: "packages/core/dist/cli.js",
        "unitmedic-deploy": "packages/deploy/dist/cli.js",
      },
    });
  });
});
