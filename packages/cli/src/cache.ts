import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Field, Item } from "@weekly-status/core";
import { z } from "zod";

const fieldSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("empty"), name: z.string() }),
  z.object({ kind: z.literal("text"), name: z.string(), text: z.string() }),
  z.object({ kind: z.literal("date"), name: z.string(), date: z.string() }),
  z.object({ kind: z.literal("number"), name: z.string(), number: z.number() }),
  z.object({
    kind: z.literal("iteration"),
    name: z.string(),
    durationDays: z.number(),
    iterationId: z.string(),
    startDate: z.string(),
    title: z.string()
  })
]);

const itemSchema = z.object({
  id: z.string().min(1),
  archived: z.boolean().default(false),
  kind: z.enum(["issue", "pull_request", "draft_issue"]),
  number: z.number().int().default(0),
  url: z.string().default(""),
  completedAt: z.string().optional(),
  repo: z
    .object({
      name: z.string(),
      slug: z.string(),
      url: z.string(),
      branch: z.string().default("")
    })
    .optional(),
  labels: z.array(z.string()).default([]),
  fields: z.record(z.string(), fieldSchema).default({})
});

const cacheSchema = z.array(itemSchema);

function toItem(parsed: z.infer<typeof itemSchema>): Item {
  const fields: Record<string, Field> = { ...parsed.fields };
  return {
    id: parsed.id,
    archived: parsed.archived,
    kind: parsed.kind,
    number: parsed.number,
    url: parsed.url,
    ...(parsed.completedAt ? { completedAt: parsed.completedAt } : {}),
    ...(parsed.repo ? { repo: parsed.repo } : {}),
    labels: parsed.labels,
    fields
  };
}

export async function cacheExists(cacheFile: string): Promise<boolean> {
  try {
    await access(cacheFile);
    return true;
  } catch {
    return false;
  }
}

export async function readItemCache(cacheFile: string): Promise<Item[]> {
  const raw = await readFile(cacheFile, "utf-8");
  const doc: unknown = JSON.parse(raw);
  try {
    return cacheSchema.parse(doc).map(toItem);
  } catch (error: unknown) {
    if (error instanceof z.ZodError) {
      const first = error.issues[0];
      const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
      throw new Error(`Cache file ${cacheFile} is malformed${where}: ${first?.message ?? "invalid"}`);
    }
    throw error;
  }
}

export async function writeItemCache(cacheFile: string, items: Item[]): Promise<void> {
  await mkdir(path.dirname(cacheFile), { recursive: true });
  await writeFile(cacheFile, `${JSON.stringify(items, null, 2)}\n`, "utf-8");
}
