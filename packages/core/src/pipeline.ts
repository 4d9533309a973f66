import { DuplicateRenderOrderError } from "./errors.js";
import { countLabels } from "./rules/label-counter.js";
import { classifyCompiled, compileSections } from "./rules/section-classifier.js";
import { splitByWeeks } from "./rules/week-splitter.js";
import type { Item, ReportOptions, SectionBucket, WeeklyReport } from "./types.js";

export interface PipelineContext extends ReportOptions {
  now?: Date;
}

export interface PipelineSteps<TRenderResult> {
  collect: (ctx: PipelineContext) => Promise<Item[]> | Item[];
  render: (report: WeeklyReport, ctx: PipelineContext) => Promise<TRenderResult> | TRenderResult;
}

export interface PipelineRunResult<TRenderResult> {
  reports: WeeklyReport[];
  outputs: TRenderResult[];
  archiveIds: string[];
}

export function assertUniqueRenderOrders(options: Pick<ReportOptions, "sections" | "unclassified">): void {
  const seen = new Map<number, string>();
  for (const entry of [...options.sections, options.unclassified]) {
    const existing = seen.get(entry.renderOrder);
    if (existing !== undefined) {
      throw new DuplicateRenderOrderError(entry.renderOrder, existing, entry.name);
    }
    seen.set(entry.renderOrder, entry.name);
  }
}

export function buildWeeklyReports(items: Item[], now: Date, options: ReportOptions): WeeklyReport[] {
  assertUniqueRenderOrders(options);
  const compiled = compileSections(options.sections);
  const active = items.filter((item) => !item.archived);

  return splitByWeeks(active, now, options).map((window) => {
    const classification = classifyCompiled(window.items, compiled);
    const sections = new Map<number, SectionBucket>();

    options.sections.forEach((section, index) => {
      sections.set(section.renderOrder, {
        name: section.name,
        renderOrder: section.renderOrder,
        omitIfEmpty: section.omitIfEmpty,
        unclassified: false,
        items: classification.sections[index] ?? []
      });
    });

    sections.set(options.unclassified.renderOrder, {
      ...options.unclassified,
      unclassified: true,
      items: classification.remaining
    });

    return {
      ...window,
      sections,
      labels: countLabels(window.items)
    };
  });
}

export function collectArchiveIds(reports: WeeklyReport[]): string[] {
  const ids = new Set<string>();
  for (const report of reports) {
    for (const item of report.items) {
      ids.add(item.id);
    }
  }
  return Array.from(ids);
}

export async function runPipeline<TRenderResult>(
  steps: PipelineSteps<TRenderResult>,
  ctx: PipelineContext
): Promise<PipelineRunResult<TRenderResult>> {
  // fail on bad configuration before any I/O
  assertUniqueRenderOrders(ctx);
  compileSections(ctx.sections);

  const items = await steps.collect(ctx);
  const reports = buildWeeklyReports(items, ctx.now ?? new Date(), ctx);

  const outputs: TRenderResult[] = [];
  for (const report of reports) {
    outputs.push(await steps.render(report, ctx));
  }

  return { reports, outputs, archiveIds: collectArchiveIds(reports) };
}
