import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export interface RenderedReport {
  fileName: string;
  content: string;
}

export interface WriteReportsOptions {
  cwd: string;
  outputDirectory: string;
  reports: RenderedReport[];
}

/** Writes one file per week; an existing file for the same week is replaced. */
export async function writeReportFiles(options: WriteReportsOptions): Promise<string[]> {
  const outputRoot = path.resolve(options.cwd, options.outputDirectory);
  await mkdir(outputRoot, { recursive: true });

  const written: string[] = [];
  for (const report of options.reports) {
    const file = path.join(outputRoot, report.fileName);
    await writeFile(file, report.content, "utf-8");
    written.push(file);
  }
  return written;
}
