import { doneAt } from "../item.js";
import type { Item, Weekday, WeeklyWindow } from "../types.js";

export interface SplitByWeeksOptions {
  anchorWeekday?: Weekday;
  /** Emit weeks with nothing completed instead of skipping them. */
  includeEmptyWeeks?: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * DAY_MS;

export const WEEKDAYS: readonly Weekday[] = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday"
];

/** Most recent `anchor` weekday at or before `now`, at 00:00 UTC. */
export function closestAnchor(now: Date, anchor: Weekday = "sunday"): Date {
  const midnight = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const daysBack = (now.getUTCDay() - WEEKDAYS.indexOf(anchor) + 7) % 7;
  return new Date(midnight - daysBack * DAY_MS);
}

export function previousAnchor(end: Date): Date {
  return new Date(end.getTime() - WEEK_MS);
}

/**
 * Buckets done items into 7-day windows `[start, end)` walking backward from
 * the last anchor before `now`. Items completed on or after that anchor belong
 * to a week still in progress and are left out. Windows come back newest first.
 */
export function splitByWeeks(
  items: Item[],
  now: Date,
  options: SplitByWeeksOptions = {}
): WeeklyWindow[] {
  let end = closestAnchor(now, options.anchorWeekday);
  const cutoff = end.getTime();

  const pool = items
    .map((item) => ({ item, at: doneAt(item)?.getTime() }))
    .filter((entry): entry is { item: Item; at: number } => entry.at !== undefined && entry.at < cutoff)
    .sort((a, b) => a.at - b.at);

  const windows: WeeklyWindow[] = [];
  let upper = pool.length;
  while (upper > 0) {
    const start = previousAnchor(end);
    const startMs = start.getTime();

    let lower = upper;
    while (lower > 0) {
      const entry = pool[lower - 1];
      if (!entry || entry.at < startMs) {
        break;
      }
      lower -= 1;
    }

    const weekItems = pool.slice(lower, upper).map((entry) => entry.item);
    if (weekItems.length > 0 || options.includeEmptyWeeks) {
      windows.push({ start, end, items: weekItems });
    }

    upper = lower;
    end = start;
  }

  return windows;
}
