import type { Field, Item } from "./types.js";

function textField(item: Item, name: string): string | undefined {
  const field: Field | undefined = item.fields[name];
  return field?.kind === "text" ? field.text : undefined;
}

export function isDone(item: Item): boolean {
  return textField(item, "Status")?.toLowerCase() === "done";
}

function parseInstant(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? new Date(ms) : undefined;
}

/**
 * Completion instant used for windowing. Only defined for done items with a
 * parseable timestamp; everything else is left out of time-based queries.
 */
export function doneAt(item: Item): Date | undefined {
  return isDone(item) ? parseInstant(item.completedAt) : undefined;
}

export function itemTitle(item: Item): string {
  return textField(item, "Title") ?? "";
}

export function getDone(items: Item[]): Item[] {
  return items
    .map((item) => ({ item, at: doneAt(item) }))
    .filter((entry): entry is { item: Item; at: Date } => entry.at !== undefined)
    .sort((a, b) => a.at.getTime() - b.at.getTime())
    .map((entry) => entry.item);
}
