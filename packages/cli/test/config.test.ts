import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  expandEnv,
  formatConfigError,
  loadConfig,
  loadToken,
  mergeConfigDocuments,
  parseConfigString,
  toReportOptions
} from "../src/config.js";

const minimal = "github:\n  owner: org\n  projectNumber: 5\nteam: Platform\n";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  tempDirs.length = 0;
});

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "weekly-status-config-"));
  tempDirs.push(dir);
  return dir;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error("expected an error");
}

describe("config", () => {
  it("applies defaults around the required keys", () => {
    const config = parseConfigString(minimal, {});
    expect(config.github).toEqual({
      baseUrl: "https://api.github.com",
      owner: "org",
      ownerType: "organization",
      projectNumber: 5,
      tokenEnv: "GITHUB_TOKEN",
      tuning: { issueCount: 100, labelCount: 20, fieldValueCount: 20 }
    });
    expect(config.outputDirectory).toBe(".");
    expect(config.reportWindow.startOnWeekday).toBe("sunday");
    expect(config.labelSection).toEqual({ enabled: true, renderOrder: 100 });
    expect(config.summary.enabled).toBe(false);
    expect(config.unclassified).toEqual({ name: "Unclassified Items", renderOrder: 1000, omitIfEmpty: true });
    expect(config.sections).toEqual([]);
  });

  it("reports missing keys by path", () => {
    const error = captureError(() => parseConfigString("team: Platform\n", {}));
    expect(formatConfigError(error)).toBe("github: Required");
  });

  it("rejects a section with an invalid pattern", () => {
    const raw = `${minimal}sections:
  - name: Bad
    renderOrder: 10
    matchOn:
      labels: ["[abc"]
`;
    const error = captureError(() => parseConfigString(raw, {}));
    expect(formatConfigError(error)).toBe(
      "sections[0].matchOn: section 'Bad': invalid pattern '[abc' (unterminated character class)"
    );
  });

  it("rejects a branch rule without a branch", () => {
    const raw = `${minimal}sections:
  - name: Main
    renderOrder: 10
    matchOn:
      branches:
        - org: org
          repo: repo
`;
    const error = captureError(() => parseConfigString(raw, {}));
    expect(formatConfigError(error)).toBe("sections[0].matchOn.branches[0].branch: Required");
  });

  it("rejects blocks that share a render order", () => {
    const raw = `${minimal}sections:
  - name: Deployments
    renderOrder: 100
`;
    const error = captureError(() => parseConfigString(raw, {}));
    expect(formatConfigError(error)).toBe(
      "labelSection.renderOrder: Sections 'Deployments' and 'By Label' share render order 100"
    );
  });

  it("allows a disabled label section to reuse a render order", () => {
    const raw = `${minimal}labelSection:
  enabled: false
sections:
  - name: Deployments
    renderOrder: 100
`;
    expect(parseConfigString(raw, {}).sections).toHaveLength(1);
  });

  it("expands environment references before parsing", () => {
    expect(expandEnv("team: ${TEAM_NAME}\nowner: ${MISSING}", { TEAM_NAME: "Platform" })).toBe(
      "team: Platform\nowner: "
    );

    const config = parseConfigString("github:\n  owner: ${OWNER}\n  projectNumber: ${PROJECT}\nteam: Platform\n", {
      OWNER: "org",
      PROJECT: "7"
    });
    expect(config.github.owner).toBe("org");
    expect(config.github.projectNumber).toBe(7);
  });

  it("merges objects and replaces arrays", () => {
    const merged = mergeConfigDocuments([
      { github: { owner: "org", projectNumber: 1 }, sections: [{ name: "A" }], team: "One" },
      { github: { owner: "other" }, sections: [] },
      null
    ]);
    expect(merged).toEqual({ github: { owner: "other", projectNumber: 1 }, sections: [], team: "One" });
  });

  it("loads several files in order", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, "base.yml"), minimal, "utf-8");
    await writeFile(path.join(dir, "local.yml"), "team: Infra\noutputDirectory: reports\n", "utf-8");

    const config = await loadConfig(dir, ["base.yml", "local.yml"], {});
    expect(config.team).toBe("Infra");
    expect(config.outputDirectory).toBe("reports");
    expect(config.github.owner).toBe("org");
  });

  it("reads the token from the environment before .env", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, ".env"), "# local\nGITHUB_TOKEN=\"test-secret\"\n", "utf-8");

    await expect(loadToken(dir, "GITHUB_TOKEN", {})).resolves.toBe("test-secret");
    await expect(loadToken(dir, "GITHUB_TOKEN", { GITHUB_TOKEN: "env-secret" })).resolves.toBe("env-secret");
    await expect(loadToken(dir, "OTHER_TOKEN", {})).resolves.toBeUndefined();
  });

  it("accepts exported and single-quoted .env entries", async () => {
    const dir = await createTempDir();
    await writeFile(path.join(dir, ".env"), "export GITHUB_TOKEN='test-secret'\nnot a line\nOTHER_TOKEN = plain\n", "utf-8");

    await expect(loadToken(dir, "GITHUB_TOKEN", {})).resolves.toBe("test-secret");
    await expect(loadToken(dir, "OTHER_TOKEN", {})).resolves.toBe("plain");
  });

  it("names the whole document when an issue has no path", () => {
    const error = captureError(() => parseConfigString("- github\n", {}));
    expect(formatConfigError(error)).toBe("config: Expected object, received array");
  });

  it("converts sections into report options", () => {
    const raw = `${minimal}reportWindow:
  startOnWeekday: monday
sections:
  - name: Deployments
    renderOrder: 10
    omitIfEmpty: true
    matchOn:
      labels: [deployment]
`;
    expect(toReportOptions(parseConfigString(raw, {}))).toEqual({
      sections: [
        {
          name: "Deployments",
          renderOrder: 10,
          omitIfEmpty: true,
          match: { labels: ["deployment"], prefixes: [], branches: [] }
        }
      ],
      unclassified: { name: "Unclassified Items", renderOrder: 1000, omitIfEmpty: true },
      anchorWeekday: "monday"
    });
  });
});
