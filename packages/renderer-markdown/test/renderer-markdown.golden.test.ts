import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import type { Item, SectionBucket, WeeklyReport } from "@weekly-status/core";
import { renderWeeklyReport, reportFileName } from "../src/index.js";

const repo = { name: "repo", slug: "org/repo", url: "https://github.com/org/repo" };

function createItem(partial: Partial<Item> & { id: string; title: string }): Item {
  const { title, ...rest } = partial;
  return {
    archived: false,
    kind: "issue",
    number: 0,
    url: "",
    labels: [],
    fields: {
      Title: { kind: "text", name: "Title", text: title },
      Status: { kind: "text", name: "Status", text: "Done" }
    },
    ...rest
  };
}

function bucket(name: string, renderOrder: number, items: Item[], omitIfEmpty = true): SectionBucket {
  return { name, renderOrder, omitIfEmpty, unclassified: false, items };
}

function normalizeEol(input: string): string {
  return input.replace(/\r\n/g, "\n").trimEnd();
}

async function readGoldenFile(name: string): Promise<string> {
  const url = new URL(`./fixtures/${name}`, import.meta.url);
  const raw = await readFile(url, "utf-8");
  return normalizeEol(raw);
}

describe("renderWeeklyReport golden tests", () => {
  it("renders sections, labels and summary in render order", async () => {
    const issue = createItem({
      id: "i88",
      title: "An example item title.",
      number: 88,
      url: "https://github.com/org/repo/issues/88",
      repo: { ...repo, branch: "" },
      labels: ["infra", "deployment"]
    });
    const pull = createItem({
      id: "p23",
      title: "Update Something",
      kind: "pull_request",
      number: 23,
      url: "https://github.com/org/repo/pull/23",
      repo: { ...repo, branch: "main" }
    });
    const draft = createItem({ id: "d1", title: "Plan the offsite", kind: "draft_issue" });

    // insertion order differs from render order on purpose
    const sections = new Map<number, SectionBucket>([
      [20, bucket("Updates", 20, [pull, draft])],
      [10, bucket("Deployments", 10, [issue])],
      [30, bucket("Empty", 30, [], false)],
      [40, bucket("Omitted", 40, [])],
      [1000, { ...bucket("Unclassified Items", 1000, []), unclassified: true }]
    ]);
    const report: WeeklyReport = {
      start: new Date("2022-07-31T00:00:00Z"),
      end: new Date("2022-08-07T00:00:00Z"),
      items: [issue, pull, draft],
      sections,
      labels: new Map([
        ["infra", 1],
        ["deployment", 1]
      ])
    };

    const rendered = normalizeEol(
      renderWeeklyReport(report, {
        team: "Platform",
        labelSection: { enabled: true, renderOrder: 100 },
        summary: { enabled: true, name: "Notes", body: "Quiet week.", renderOrder: 5 }
      })
    );
    expect(rendered).toBe(await readGoldenFile("full-report.md"));
  });

  it("renders only the header when every block is omitted", () => {
    const report: WeeklyReport = {
      start: new Date("2022-07-24T00:00:00Z"),
      end: new Date("2022-07-31T00:00:00Z"),
      items: [],
      sections: new Map([[1000, { ...bucket("Unclassified Items", 1000, []), unclassified: true }]]),
      labels: new Map()
    };

    const rendered = renderWeeklyReport(report, {
      team: "Platform",
      labelSection: { enabled: false, renderOrder: 100 }
    });
    expect(rendered).toBe("# Status Report: Jul 24, 2022 ... Jul 30, 2022\n\n## Platform\n\n");
  });
});

describe("reportFileName", () => {
  it("names the file after the first and last covered day", () => {
    expect(
      reportFileName({ start: new Date("2022-12-25T00:00:00Z"), end: new Date("2023-01-01T00:00:00Z") })
    ).toBe("2022.12.25-2022.12.31.md");
  });
});
