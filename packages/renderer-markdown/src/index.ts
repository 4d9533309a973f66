import { itemTitle, sortedLabelCounts } from "@weekly-status/core";
import type { Item, SectionBucket, WeeklyReport } from "@weekly-status/core";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface LabelSectionOptions {
  enabled: boolean;
  renderOrder: number;
}

export interface SummarySectionOptions {
  enabled: boolean;
  name: string;
  body: string;
  renderOrder: number;
}

export interface MarkdownRendererOptions {
  team: string;
  labelSection?: LabelSectionOptions;
  summary?: SummarySectionOptions;
}

interface Block {
  renderOrder: number;
  text: string;
}

const headerDate = new Intl.DateTimeFormat("en-US", {
  month: "short",
  day: "numeric",
  year: "numeric",
  timeZone: "UTC"
});

/** Last day covered by the report; `end` itself is exclusive. */
function lastDay(report: Pick<WeeklyReport, "end">): Date {
  return new Date(report.end.getTime() - DAY_MS);
}

function formatItem(item: Item): string {
  const title = itemTitle(item);
  if (item.kind === "draft_issue" || !item.repo) {
    return `- ${title}`;
  }
  return `- ${title} **[[#${item.number}](${item.url})]** ([${item.repo.slug}](${item.repo.url}))`;
}

function formatSection(bucket: SectionBucket): string {
  const lines = bucket.items.map((item) => `${formatItem(item)}\n`);
  return `\n## ${bucket.name} (${bucket.items.length})\n\n${lines.join("")}`;
}

function formatLabels(report: WeeklyReport): string {
  const lines = sortedLabelCounts(report.labels).map(([label, count]) => `- ${label} (${count})\n`);
  return `\n## By Label\n\n${lines.join("")}`;
}

export function renderWeeklyReport(report: WeeklyReport, options: MarkdownRendererOptions): string {
  const blocks: Block[] = [];

  for (const bucket of report.sections.values()) {
    if (bucket.omitIfEmpty && bucket.items.length === 0) {
      continue;
    }
    blocks.push({ renderOrder: bucket.renderOrder, text: formatSection(bucket) });
  }

  if (options.labelSection?.enabled) {
    blocks.push({ renderOrder: options.labelSection.renderOrder, text: formatLabels(report) });
  }

  const summary = options.summary;
  if (summary?.enabled) {
    blocks.push({ renderOrder: summary.renderOrder, text: `\n## ${summary.name}\n\n${summary.body}\n\n` });
  }

  blocks.sort((a, b) => a.renderOrder - b.renderOrder);

  const header =
    `# Status Report: ${headerDate.format(report.start)} ... ${headerDate.format(lastDay(report))}\n\n` +
    `## ${options.team}\n\n`;
  return header + blocks.map((block) => block.text).join("");
}

function fileDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}.${month}.${day}`;
}

export function reportFileName(report: Pick<WeeklyReport, "start" | "end">): string {
  return `${fileDate(report.start)}-${fileDate(lastDay(report))}.md`;
}
