import type { Item, Match, SectionDefinition } from "../types.js";
import {
  branchMatches,
  compileMatch,
  labelMatches,
  prefixMatches,
  type CompiledMatch
} from "./matcher.js";

export interface ExtractResult {
  matched: Item[];
  remaining: Item[];
}

export interface Classification {
  /** One bucket per section, in the order the sections were given. */
  sections: Item[][];
  remaining: Item[];
}

function partition(items: Item[], predicate: (item: Item) => boolean): ExtractResult {
  const matched: Item[] = [];
  const remaining: Item[] = [];
  for (const item of items) {
    if (predicate(item)) {
      matched.push(item);
    } else {
      remaining.push(item);
    }
  }
  return { matched, remaining };
}

export function extractCompiled(items: Item[], match: CompiledMatch): ExtractResult {
  const matched: Item[] = [];

  const byLabel = partition(items, (item) => match.labels.some((label) => labelMatches(item, label)));
  matched.push(...byLabel.matched);

  const byPrefix = partition(byLabel.remaining, (item) =>
    match.prefixes.some((prefix) => prefixMatches(item, prefix))
  );
  matched.push(...byPrefix.matched);

  let remaining = byPrefix.remaining;
  for (const branch of match.branches) {
    const byBranch = partition(remaining, (item) => branchMatches(item, branch));
    matched.push(...byBranch.matched);
    remaining = byBranch.remaining;
  }

  return { matched, remaining };
}

export function extract(items: Item[], match: Match): ExtractResult {
  return extractCompiled(items, compileMatch(match));
}

export function compileSections(sections: Array<Pick<SectionDefinition, "name" | "match">>): CompiledMatch[] {
  return sections.map((section) => compileMatch(section.match, `section '${section.name}'`));
}

export function classifyCompiled(items: Item[], sections: CompiledMatch[]): Classification {
  const buckets: Item[][] = [];
  let remaining = items;
  for (const match of sections) {
    const result = extractCompiled(remaining, match);
    buckets.push(result.matched);
    remaining = result.remaining;
  }
  return { sections: buckets, remaining };
}

/**
 * Routes every item into the first section that claims it. Sections are tried
 * in the order given; render order plays no part in precedence. Every pattern
 * is compiled before any item is looked at.
 */
export function classify(
  items: Item[],
  sections: Array<Pick<SectionDefinition, "name" | "match">>
): Classification {
  return classifyCompiled(items, compileSections(sections));
}
