import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { z } from "zod";

const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../..");
const packageNames = ["core", "provider-github", "renderer-markdown", "cli"];

const manifestSchema = z.object({
  name: z.string(),
  main: z.string().optional(),
  types: z.string().optional(),
  exports: z.record(z.object({ types: z.string(), import: z.string() })).optional(),
  bin: z.record(z.string()).optional(),
  scripts: z.record(z.string()).optional(),
  dependencies: z.record(z.string()).optional()
});

const buildConfigSchema = z.object({
  extends: z.string(),
  compilerOptions: z.object({ composite: z.literal(true), rootDir: z.string(), outDir: z.string() }),
  references: z.array(z.object({ path: z.string() })).optional()
});

async function readJson<T>(schema: z.ZodType<T>, ...segments: string[]): Promise<T> {
  const raw = await readFile(path.join(rootDir, ...segments), "utf-8");
  return schema.parse(JSON.parse(raw));
}

describe("packaging", () => {
  it.each(packageNames)("points %s at built JavaScript at run time and at sources for types", async (name) => {
    const manifest = await readJson(manifestSchema, "packages", name, "package.json");
    const build = await readJson(buildConfigSchema, "packages", name, "tsconfig.build.json");
    const { rootDir: srcDir, outDir } = build.compilerOptions;

    expect(manifest.main).toBe(`./${outDir}/index.js`);
    expect(manifest.exports?.["."]).toEqual({ types: `./${srcDir}/index.ts`, import: `./${outDir}/index.js` });
    await expect(access(path.join(rootDir, "packages", name, srcDir, "index.ts"))).resolves.toBeUndefined();
  });

  it("builds every workspace dependency before the package that imports it", async () => {
    for (const name of packageNames) {
      const manifest = await readJson(manifestSchema, "packages", name, "package.json");
      const build = await readJson(buildConfigSchema, "packages", name, "tsconfig.build.json");
      const workspaceDeps = Object.keys(manifest.dependencies ?? {})
        .filter((dep) => dep.startsWith("@weekly-status/"))
        .map((dep) => `../${dep.slice("@weekly-status/".length)}/tsconfig.build.json`);

      expect((build.references ?? []).map((ref) => ref.path).sort()).toEqual(workspaceDeps.sort());
    }
  });

  it("runs the compiled cli entry point from the root bin", async () => {
    const root = await readJson(manifestSchema, "package.json");
    const cli = await readJson(buildConfigSchema, "packages", "cli", "tsconfig.build.json");

    expect(root.scripts?.["build"]).toBe("tsc -b packages/cli/tsconfig.build.json");
    expect(root.bin).toEqual({ "weekly-status": `packages/cli/${cli.compilerOptions.outDir}/bin.js` });
    await expect(
      access(path.join(rootDir, "packages", "cli", cli.compilerOptions.rootDir, "bin.ts"))
    ).resolves.toBeUndefined();
  });
});
