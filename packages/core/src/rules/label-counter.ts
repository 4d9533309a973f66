import type { Item } from "../types.js";

export function countLabels(items: Item[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    for (const label of item.labels) {
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
  }
  return counts;
}

export function sortedLabelCounts(counts: Map<string, number>): Array<[string, number]> {
  return Array.from(counts.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
