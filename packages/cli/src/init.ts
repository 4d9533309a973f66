import { input, select } from "@inquirer/prompts";
import { access, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  CONFIG_FILE_NAME,
  serializeConfig,
  weeklyStatusConfigSchema,
  type WeeklyStatusConfig
} from "./config.js";

export type OwnerType = WeeklyStatusConfig["github"]["ownerType"];

interface SelectOption {
  name: string;
  value: string;
}

export interface PromptAdapter {
  select: (options: { message: string; choices: SelectOption[] }) => Promise<string>;
  input: (options: { message: string; default?: string }) => Promise<string>;
}

export interface InitAnswers {
  owner: string;
  ownerType: OwnerType;
  projectNumber: number;
  team: string;
  outputDirectory?: string;
}

export interface InitWizardOptions {
  cwd: string;
  prompts?: PromptAdapter;
  defaults?: Partial<InitAnswers>;
}

export interface InitPresetOptions extends InitAnswers {
  cwd: string;
}

export interface InitResult {
  configPath: string;
  config: WeeklyStatusConfig;
}

function defaultPrompts(): PromptAdapter {
  return {
    select: (options) => select(options),
    input: (options) => input(options)
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function parseProjectNumber(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid project number: ${value}. Expected a positive integer.`);
  }
  return parsed;
}

export function createStarterConfig(answers: InitAnswers): WeeklyStatusConfig {
  return weeklyStatusConfigSchema.parse({
    github: {
      owner: answers.owner,
      ownerType: answers.ownerType,
      projectNumber: answers.projectNumber
    },
    team: answers.team,
    ...(answers.outputDirectory ? { outputDirectory: answers.outputDirectory } : {}),
    sections: [
      {
        name: "Deployments",
        renderOrder: 10,
        omitIfEmpty: true,
        matchOn: { labels: ["deployment"] }
      }
    ]
  });
}

async function writeStarterConfig(cwd: string, answers: InitAnswers): Promise<InitResult> {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  if (await fileExists(configPath)) {
    throw new Error(`${CONFIG_FILE_NAME} already exists at ${configPath}`);
  }

  const config = createStarterConfig(answers);
  await writeFile(configPath, serializeConfig(config), "utf-8");
  return { configPath, config };
}

export async function runInitWizard(options: InitWizardOptions): Promise<InitResult> {
  const promptImpl = options.prompts ?? defaultPrompts();
  const defaults = options.defaults ?? {};

  const owner = (
    await promptImpl.input({
      message: "Project owner (organization or user login)",
      ...(defaults.owner ? { default: defaults.owner } : {})
    })
  ).trim();
  if (!owner) {
    throw new Error("Project owner is required.");
  }

  const ownerAnswer = await promptImpl.select({
    message: "Owner type",
    choices: [
      { name: "Organization", value: "organization" },
      { name: "User", value: "user" }
    ]
  });
  const ownerType: OwnerType = ownerAnswer === "user" ? "user" : "organization";

  const projectNumber = parseProjectNumber(
    await promptImpl.input({
      message: "Project number",
      ...(defaults.projectNumber ? { default: String(defaults.projectNumber) } : {})
    })
  );

  const team = (
    await promptImpl.input({
      message: "Team name",
      ...(defaults.team ? { default: defaults.team } : {})
    })
  ).trim();
  if (!team) {
    throw new Error("Team name is required.");
  }

  const outputDirectory = (
    await promptImpl.input({
      message: "Output directory",
      default: defaults.outputDirectory ?? "."
    })
  ).trim();

  return writeStarterConfig(options.cwd, {
    owner,
    ownerType,
    projectNumber,
    team,
    ...(outputDirectory ? { outputDirectory } : {})
  });
}

export async function runInitPreset(options: InitPresetOptions): Promise<InitResult> {
  const { cwd, ...answers } = options;
  return writeStarterConfig(cwd, answers);
}
