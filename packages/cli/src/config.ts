import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  compileMatch,
  DuplicateRenderOrderError,
  InvalidPatternError,
  type ReportOptions
} from "@weekly-status/core";
import { parse, stringify } from "yaml";
import { z } from "zod";

export const CONFIG_FILE_NAME = ".weekly-status.yml";

const weekdaySchema = z.enum(["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"]);

const branchRuleSchema = z.object({
  org: z.string().min(1),
  repo: z.string().min(1),
  branch: z.string().min(1)
});

const matchSchema = z
  .object({
    labels: z.array(z.string().min(1)).default([]),
    prefixes: z.array(z.string().min(1)).default([]),
    branches: z.array(branchRuleSchema).default([])
  })
  .default({});

const sectionSchema = z.object({
  name: z.string().min(1),
  renderOrder: z.number().int(),
  omitIfEmpty: z.boolean().default(false),
  matchOn: matchSchema
});

const tuningSchema = z
  .object({
    issueCount: z.number().int().min(1).max(100).default(100),
    labelCount: z.number().int().min(1).max(100).default(20),
    fieldValueCount: z.number().int().min(1).max(100).default(20)
  })
  .default({});

export const weeklyStatusConfigSchema = z
  .object({
    github: z.object({
      baseUrl: z.string().url().default("https://api.github.com"),
      owner: z.string().min(1),
      ownerType: z.enum(["organization", "user"]).default("organization"),
      projectNumber: z.number().int().positive(),
      tokenEnv: z.string().min(1).default("GITHUB_TOKEN"),
      tuning: tuningSchema
    }),
    team: z.string().min(1),
    outputDirectory: z.string().min(1).default("."),
    reportWindow: z
      .object({
        startOnWeekday: weekdaySchema.default("sunday")
      })
      .default({}),
    labelSection: z
      .object({
        enabled: z.boolean().default(true),
        renderOrder: z.number().int().default(100)
      })
      .default({}),
    summary: z
      .object({
        enabled: z.boolean().default(false),
        name: z.string().min(1).default("Summary"),
        body: z.string().default(""),
        renderOrder: z.number().int().default(0)
      })
      .default({}),
    unclassified: z
      .object({
        name: z.string().min(1).default("Unclassified Items"),
        renderOrder: z.number().int().default(1000),
        omitIfEmpty: z.boolean().default(true)
      })
      .default({}),
    sections: z.array(sectionSchema).default([])
  })
  .superRefine((config, ctx) => {
    config.sections.forEach((section, index) => {
      try {
        compileMatch(section.matchOn, `section '${section.name}'`);
      } catch (error: unknown) {
        if (!(error instanceof InvalidPatternError)) {
          throw error;
        }
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sections", index, "matchOn"],
          message: error.message
        });
      }
    });

    // every rendered block needs its own slot
    const owners = new Map<number, string>();
    const claim = (renderOrder: number, name: string, issuePath: Array<string | number>): void => {
      const existing = owners.get(renderOrder);
      if (existing !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: issuePath,
          message: new DuplicateRenderOrderError(renderOrder, existing, name).message
        });
        return;
      }
      owners.set(renderOrder, name);
    };

    config.sections.forEach((section, index) => {
      claim(section.renderOrder, section.name, ["sections", index, "renderOrder"]);
    });
    claim(config.unclassified.renderOrder, config.unclassified.name, ["unclassified", "renderOrder"]);
    if (config.labelSection.enabled) {
      claim(config.labelSection.renderOrder, "By Label", ["labelSection", "renderOrder"]);
    }
    if (config.summary.enabled) {
      claim(config.summary.renderOrder, config.summary.name, ["summary", "renderOrder"]);
    }
  });

export type WeeklyStatusConfig = z.infer<typeof weeklyStatusConfigSchema>;
export type WeeklyStatusConfigInput = z.input<typeof weeklyStatusConfigSchema>;

export type EnvSource = Readonly<Record<string, string | undefined>>;

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replaces `${NAME}` with the variable's value, or nothing when it is unset. */
export function expandEnv(raw: string, env: EnvSource = process.env): string {
  return raw.replace(ENV_REFERENCE, (_match, name: string) => env[name] ?? "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Later documents win; objects merge key by key, everything else is replaced. */
export function mergeConfigDocuments(documents: unknown[]): unknown {
  return documents.reduce<unknown>((merged, next) => {
    if (next === undefined || next === null) {
      return merged;
    }
    if (!isRecord(merged) || !isRecord(next)) {
      return next;
    }
    const result: Record<string, unknown> = { ...merged };
    for (const [key, value] of Object.entries(next)) {
      result[key] = mergeConfigDocuments([result[key], value]);
    }
    return result;
  }, undefined);
}

export function parseConfigDocument(raw: string, env: EnvSource = process.env): unknown {
  const doc: unknown = parse(expandEnv(raw, env));
  return doc ?? {};
}

export function parseConfigString(raw: string, env: EnvSource = process.env): WeeklyStatusConfig {
  return weeklyStatusConfigSchema.parse(parseConfigDocument(raw, env));
}

export async function loadConfig(
  cwd: string,
  files: string[] = [],
  env: EnvSource = process.env
): Promise<WeeklyStatusConfig> {
  const paths = files.length > 0 ? files : [CONFIG_FILE_NAME];
  const documents: unknown[] = [];
  for (const file of paths) {
    const raw = await readFile(path.resolve(cwd, file), "utf-8");
    documents.push(parseConfigDocument(raw, env));
  }
  return weeklyStatusConfigSchema.parse(mergeConfigDocuments(documents) ?? {});
}

export function toReportOptions(config: WeeklyStatusConfig): ReportOptions {
  return {
    sections: config.sections.map((section) => ({
      name: section.name,
      renderOrder: section.renderOrder,
      omitIfEmpty: section.omitIfEmpty,
      match: section.matchOn
    })),
    unclassified: config.unclassified,
    anchorWeekday: config.reportWindow.startOnWeekday
  };
}

export function serializeConfig(config: WeeklyStatusConfig | WeeklyStatusConfigInput): string {
  return stringify(config, {
    lineWidth: 0,
    defaultStringType: "PLAIN"
  });
}

function issuePath(segments: Array<string | number>): string {
  if (segments.length === 0) {
    return "config";
  }
  return segments.reduce<string>((acc, segment) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

export function formatConfigError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issuePath(issue.path)}: ${issue.message}`).join("\n");
  }
  return error instanceof Error ? error.message : String(error);
}

const DOTENV_LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

/** `KEY=value` lines, optionally prefixed with `export`; matching quotes are stripped. */
function parseDotEnv(raw: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const match = DOTENV_LINE.exec(line.trim());
    if (!match?.[1]) {
      continue;
    }
    const value = (match[2] ?? "").trim();
    const quoted = /^(["'])(.*)\1$/.exec(value);
    entries[match[1]] = quoted ? (quoted[2] ?? "") : value;
  }
  return entries;
}

async function loadDotEnv(cwd: string): Promise<Record<string, string>> {
  try {
    return parseDotEnv(await readFile(path.join(cwd, ".env"), "utf-8"));
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
}

/** The environment takes precedence over `.env`. */
export async function loadToken(
  cwd: string,
  tokenEnv: string,
  env: EnvSource = process.env
): Promise<string | undefined> {
  const fromEnv = env[tokenEnv];
  if (fromEnv) {
    return fromEnv;
  }
  const envFile = await loadDotEnv(cwd);
  return envFile[tokenEnv] || undefined;
}
