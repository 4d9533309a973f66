import { InvalidPatternError } from "../errors.js";
import { itemTitle } from "../item.js";
import type { BranchRule, Item, Match } from "../types.js";
import { globToRegExp } from "./glob.js";

export type LabelMatcher = { any: true } | { any: false; pattern: RegExp };

export interface BranchMatcher {
  rule: BranchRule;
  slug: RegExp;
  branch: RegExp;
}

export interface CompiledMatch {
  labels: LabelMatcher[];
  prefixes: RegExp[];
  branches: BranchMatcher[];
}

export function compileLabel(pattern: string): LabelMatcher {
  const trimmed = pattern.trim();
  if (trimmed === "*") {
    return { any: true };
  }
  return { any: false, pattern: globToRegExp(trimmed) };
}

export function compilePrefix(pattern: string): RegExp {
  return globToRegExp(pattern.trim(), { prefix: true });
}

export function compileBranch(rule: BranchRule): BranchMatcher {
  return {
    rule,
    slug: globToRegExp(`${rule.org.trim()}/${rule.repo.trim()}`),
    branch: globToRegExp(rule.branch.trim())
  };
}

export function compileMatch(match: Match, context?: string): CompiledMatch {
  try {
    return {
      labels: match.labels.map(compileLabel),
      prefixes: match.prefixes.map(compilePrefix),
      branches: match.branches.map(compileBranch)
    };
  } catch (error: unknown) {
    if (error instanceof InvalidPatternError && context) {
      throw new InvalidPatternError(error.pattern, error.reason, context);
    }
    throw error;
  }
}

export function labelMatches(item: Item, matcher: LabelMatcher): boolean {
  if (matcher.any) {
    return true;
  }
  return item.labels.some((label) => matcher.pattern.test(label.trim()));
}

export function prefixMatches(item: Item, prefix: RegExp): boolean {
  return prefix.test(itemTitle(item).trim());
}

export function branchMatches(item: Item, matcher: BranchMatcher): boolean {
  const slug = item.repo?.slug ?? "";
  const branch = item.repo?.branch ?? "";
  if (!slug || !branch) {
    return false;
  }
  return matcher.slug.test(slug) && matcher.branch.test(branch);
}

export function matchesLabel(item: Item, pattern: string): boolean {
  return labelMatches(item, compileLabel(pattern));
}

export function matchesPrefix(item: Item, pattern: string): boolean {
  return prefixMatches(item, compilePrefix(pattern));
}

export function matchesBranch(item: Item, org: string, repo: string, branchPattern: string): boolean {
  return branchMatches(item, compileBranch({ org, repo, branch: branchPattern }));
}
