import path from "node:path";
import { runPipeline, type Item } from "@weekly-status/core";
import {
  GithubProjectClient,
  type FetchTuning,
  type GraphqlRequestLogger,
  type ProjectRef
} from "@weekly-status/provider-github";
import { renderWeeklyReport, reportFileName } from "@weekly-status/renderer-markdown";
import { cacheExists, readItemCache, writeItemCache } from "./cache.js";
import {
  formatConfigError,
  loadConfig,
  loadToken,
  serializeConfig,
  toReportOptions,
  type WeeklyStatusConfig
} from "./config.js";
import { parseProjectNumber, runInitPreset, runInitWizard, type PromptAdapter } from "./init.js";
import { writeReportFiles, type RenderedReport } from "./writer.js";

type CliCommand = "report" | "validate" | "show" | "init" | "restore" | "help";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface GithubProjectClientLike {
  resolveProjectId: (ref: ProjectRef) => Promise<string>;
  fetchItems: (projectId: string, tuning: FetchTuning) => Promise<Item[]>;
  archiveItems: (projectId: string, itemIds: string[]) => Promise<number>;
  unarchiveItems: (projectId: string, itemIds: string[]) => Promise<number>;
}

export interface GithubClientFactoryOptions {
  baseUrl: string;
  onRequest?: GraphqlRequestLogger;
}

export interface CliRuntimeOptions {
  prompts?: PromptAdapter;
  io?: CliIO;
  env?: Readonly<Record<string, string | undefined>>;
  createGithubClient?: (token: string, options: GithubClientFactoryOptions) => GithubProjectClientLike;
}

interface ParsedCommand {
  command: CliCommand;
  args: string[];
}

interface ConfigArgs {
  configFiles: string[];
}

interface ReportArgs extends ConfigArgs {
  dryRun: boolean;
  preview: boolean;
  includeEmptyWeeks: boolean;
  debug: boolean;
  cacheFile?: string;
  now?: Date;
}

interface InitArgs {
  yes: boolean;
  owner?: string;
  projectNumber?: number;
  team?: string;
}

interface RestoreArgs extends ConfigArgs {
  debug: boolean;
  itemIds: string[];
}

interface ProjectSession {
  client: GithubProjectClientLike;
  projectId: string;
}

function defaultIO(): CliIO {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}

function parseCommand(argv: string[]): ParsedCommand {
  const command = argv[0] ?? "help";
  const args = argv.slice(1);
  if (
    command === "report" ||
    command === "validate" ||
    command === "show" ||
    command === "init" ||
    command === "restore"
  ) {
    return { command, args };
  }
  return { command: "help", args: [] };
}

function readValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseConfigArgs(args: string[]): ConfigArgs {
  const result: ConfigArgs = { configFiles: [] };
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--config") {
      result.configFiles.push(readValue(args, i, arg));
      i += 1;
      continue;
    }
    throw new Error(`Unknown option: ${arg ?? ""}`);
  }
  return result;
}

function parseReportArgs(args: string[]): ReportArgs {
  const result: ReportArgs = {
    configFiles: [],
    dryRun: false,
    preview: false,
    includeEmptyWeeks: false,
    debug: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--dry-run") {
      result.dryRun = true;
      continue;
    }

    if (arg === "--preview") {
      result.preview = true;
      continue;
    }

    if (arg === "--include-empty-weeks") {
      result.includeEmptyWeeks = true;
      continue;
    }

    if (arg === "--debug") {
      result.debug = true;
      continue;
    }

    if (arg === "--cache-file") {
      result.cacheFile = readValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--config") {
      result.configFiles.push(readValue(args, i, arg));
      i += 1;
      continue;
    }

    if (arg === "--now") {
      const value = readValue(args, i, arg);
      const now = new Date(value);
      if (Number.isNaN(now.getTime())) {
        throw new Error(`Invalid --now value: ${value}`);
      }
      result.now = now;
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return result;
}

function parseInitArgs(args: string[]): InitArgs {
  const result: InitArgs = { yes: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--yes") {
      result.yes = true;
      continue;
    }

    if (arg === "--owner") {
      result.owner = readValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--project") {
      result.projectNumber = parseProjectNumber(readValue(args, i, arg));
      i += 1;
      continue;
    }

    if (arg === "--team") {
      result.team = readValue(args, i, arg);
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return result;
}

function parseRestoreArgs(args: string[]): RestoreArgs {
  const result: RestoreArgs = { configFiles: [], debug: false, itemIds: [] };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--debug") {
      result.debug = true;
      continue;
    }

    if (arg === "--config") {
      result.configFiles.push(readValue(args, i, arg));
      i += 1;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    result.itemIds.push(arg);
  }

  if (result.itemIds.length === 0) {
    throw new Error("Missing item ids. Usage: weekly-status restore <itemId>...");
  }
  return result;
}

async function loadValidatedConfig(
  cwd: string,
  files: string[],
  io: CliIO,
  runtimeOptions: CliRuntimeOptions
): Promise<WeeklyStatusConfig | null> {
  try {
    return await loadConfig(cwd, files, runtimeOptions.env ?? process.env);
  } catch (error: unknown) {
    io.error("Configuration error:");
    io.error(formatConfigError(error));
    return null;
  }
}

function debugLogger(io: CliIO): GraphqlRequestLogger {
  return (operation, variables) => {
    io.log(`[debug] ${operation} ${JSON.stringify(variables)}`);
  };
}

async function openProject(
  cwd: string,
  config: WeeklyStatusConfig,
  runtimeOptions: CliRuntimeOptions,
  onRequest?: GraphqlRequestLogger
): Promise<ProjectSession> {
  const tokenEnv = config.github.tokenEnv;
  const token = await loadToken(cwd, tokenEnv, runtimeOptions.env ?? process.env);
  if (!token) {
    throw new Error(`Missing GitHub token. Set ${tokenEnv} in environment or .env`);
  }

  const factoryOptions: GithubClientFactoryOptions = {
    baseUrl: config.github.baseUrl,
    ...(onRequest ? { onRequest } : {})
  };
  const client =
    runtimeOptions.createGithubClient?.(token, factoryOptions) ??
    new GithubProjectClient({ token, ...factoryOptions });

  const projectId = await client.resolveProjectId({
    owner: config.github.owner,
    ownerType: config.github.ownerType,
    projectNumber: config.github.projectNumber
  });
  return { client, projectId };
}

async function runReport(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  let parsed: ReportArgs;
  try {
    parsed = parseReportArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const config = await loadValidatedConfig(cwd, parsed.configFiles, io, runtimeOptions);
  if (!config) {
    return 1;
  }

  const onRequest = parsed.debug ? debugLogger(io) : undefined;
  let session: ProjectSession | undefined;
  const getSession = async (): Promise<ProjectSession> => {
    if (!session) {
      session = await openProject(cwd, config, runtimeOptions, onRequest);
    }
    return session;
  };

  const cacheFile = parsed.cacheFile ? path.resolve(cwd, parsed.cacheFile) : undefined;
  const collect = async (): Promise<Item[]> => {
    if (cacheFile && (await cacheExists(cacheFile))) {
      const cached = await readItemCache(cacheFile);
      io.log(`Read ${cached.length} items from ${cacheFile}`);
      return cached;
    }

    const { client, projectId } = await getSession();
    const fetched = await client.fetchItems(projectId, config.github.tuning);
    io.log(`Fetched ${fetched.length} items from GitHub.`);
    if (cacheFile) {
      await writeItemCache(cacheFile, fetched);
      io.log(`Cached items to ${cacheFile}`);
    }
    return fetched;
  };

  try {
    const result = await runPipeline<RenderedReport>(
      {
        collect,
        render: (report) => ({
          fileName: reportFileName(report),
          content: renderWeeklyReport(report, {
            team: config.team,
            labelSection: config.labelSection,
            summary: config.summary
          })
        })
      },
      {
        ...toReportOptions(config),
        includeEmptyWeeks: parsed.includeEmptyWeeks,
        ...(parsed.now ? { now: parsed.now } : {})
      }
    );

    if (result.outputs.length === 0) {
      io.log("No completed items to report.");
      return 0;
    }

    if (parsed.preview) {
      for (const output of result.outputs) {
        io.log(`--- ${output.fileName}`);
        io.log(output.content);
      }
      return 0;
    }

    const files = await writeReportFiles({
      cwd,
      outputDirectory: config.outputDirectory,
      reports: result.outputs
    });
    for (const file of files) {
      io.log(`Created ${file}`);
    }

    if (parsed.dryRun) {
      io.log(`Dry run: skipped archiving ${result.archiveIds.length} items.`);
      return 0;
    }

    const { client, projectId } = await getSession();
    const archived = await client.archiveItems(projectId, result.archiveIds);
    io.log(`Archived ${archived} items.`);
    return 0;
  } catch (error: unknown) {
    io.error("Report failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runValidate(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  let parsed: ConfigArgs;
  try {
    parsed = parseConfigArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const config = await loadValidatedConfig(cwd, parsed.configFiles, io, runtimeOptions);
  if (!config) {
    return 1;
  }

  const tokenEnv = config.github.tokenEnv;
  const token = await loadToken(cwd, tokenEnv, runtimeOptions.env ?? process.env);
  if (!token) {
    io.error("Config validation failed.");
    io.error(`Missing token value for ${tokenEnv} in environment or .env.`);
    return 1;
  }

  io.log("Config is valid.");
  io.log(`Project: ${config.github.owner} #${config.github.projectNumber} (${config.github.ownerType})`);
  io.log(`Sections: ${config.sections.length}`);
  return 0;
}

async function runShow(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  let parsed: ConfigArgs;
  try {
    parsed = parseConfigArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const config = await loadValidatedConfig(cwd, parsed.configFiles, io, runtimeOptions);
  if (!config) {
    return 1;
  }

  io.log(serializeConfig(config));
  return 0;
}

async function runInit(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  try {
    const parsed = parseInitArgs(args);

    if (parsed.yes) {
      if (!parsed.owner) {
        throw new Error("Missing required option: --owner");
      }
      if (!parsed.projectNumber) {
        throw new Error("Missing required option: --project");
      }
      if (!parsed.team) {
        throw new Error("Missing required option: --team");
      }

      const result = await runInitPreset({
        cwd,
        owner: parsed.owner,
        ownerType: "organization",
        projectNumber: parsed.projectNumber,
        team: parsed.team
      });
      io.log(`Created ${result.configPath}`);
      return 0;
    }

    const result = await runInitWizard({
      cwd,
      ...(runtimeOptions.prompts ? { prompts: runtimeOptions.prompts } : {}),
      defaults: {
        ...(parsed.owner ? { owner: parsed.owner } : {}),
        ...(parsed.projectNumber ? { projectNumber: parsed.projectNumber } : {}),
        ...(parsed.team ? { team: parsed.team } : {})
      }
    });
    io.log(`Created ${result.configPath}`);
    return 0;
  } catch (error: unknown) {
    io.error("Initialization failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runRestore(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  let parsed: RestoreArgs;
  try {
    parsed = parseRestoreArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const config = await loadValidatedConfig(cwd, parsed.configFiles, io, runtimeOptions);
  if (!config) {
    return 1;
  }

  try {
    const { client, projectId } = await openProject(
      cwd,
      config,
      runtimeOptions,
      parsed.debug ? debugLogger(io) : undefined
    );
    const restored = await client.unarchiveItems(projectId, parsed.itemIds);
    io.log(`Restored ${restored} items.`);
    return 0;
  } catch (error: unknown) {
    io.error("Restore failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

function printHelp(io: CliIO): void {
  io.log("weekly-status CLI");
  io.log("Usage: weekly-status <report|validate|show|init|restore>");
  io.log("Commands:");
  io.log("  report    fetch done project items, write one report per week, archive them");
  io.log("  validate  validate configuration and token availability");
  io.log("  show      print the effective configuration");
  io.log("  init      write a starter .weekly-status.yml");
  io.log("  restore   unarchive project items by id");
  io.log("Report options:");
  io.log("  --dry-run               write reports without archiving");
  io.log("  --preview               print reports without writing or archiving");
  io.log("  --cache-file <path>     read items from this file, or cache fetched items to it");
  io.log("  --now <iso>             reference time for the weekly windows");
  io.log("  --include-empty-weeks   emit a report for weeks without items");
  io.log("  --debug                 log every GitHub request");
  io.log("Common options:");
  io.log("  --config <path>         repeatable; later files override earlier ones");
  io.log("Init options:");
  io.log("  --yes                   non-interactive mode");
  io.log("  --owner <login>");
  io.log("  --project <number>");
  io.log("  --team <name>");
}

export async function runCli(
  argv: string[],
  cwd = process.cwd(),
  runtimeOptions: CliRuntimeOptions = {}
): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  const parsed = parseCommand(argv);

  switch (parsed.command) {
    case "report":
      return runReport(cwd, io, parsed.args, runtimeOptions);
    case "validate":
      return runValidate(cwd, io, parsed.args, runtimeOptions);
    case "show":
      return runShow(cwd, io, parsed.args, runtimeOptions);
    case "init":
      return runInit(cwd, io, parsed.args, runtimeOptions);
    case "restore":
      return runRestore(cwd, io, parsed.args, runtimeOptions);
    default:
      printHelp(io);
      return 0;
  }
}
