import { InvalidPatternError } from "../errors.js";

export interface GlobOptions {
  /** Match the start of the input only instead of the whole input. */
  prefix?: boolean;
}

const LITERAL_SPECIALS = new Set(["\\", "^", "$", ".", "|", "+", "(", ")", "[", "]", "{", "}", "/", "*", "?"]);
const CLASS_SPECIALS = new Set(["\\", "]", "[", "^", "-"]);

function escapeLiteral(ch: string): string {
  return LITERAL_SPECIALS.has(ch) ? `\\${ch}` : ch;
}

function escapeClassChar(ch: string): string {
  return CLASS_SPECIALS.has(ch) ? `\\${ch}` : ch;
}

function readClass(pattern: string, open: number): { source: string; end: number } {
  let index = open + 1;
  let negate = false;
  const marker = pattern.charAt(index);
  if (marker === "!" || marker === "^") {
    negate = true;
    index += 1;
  }

  let body = "";
  let first = true;
  while (index < pattern.length) {
    const ch = pattern.charAt(index);
    if (ch === "]" && !first) {
      return { source: `[${negate ? "^" : ""}${body}]`, end: index };
    }

    if (ch === "\\") {
      const next = pattern.charAt(index + 1);
      if (!next) {
        throw new InvalidPatternError(pattern, "dangling escape");
      }
      body += escapeClassChar(next);
      index += 2;
      first = false;
      continue;
    }

    // '-' keeps its range meaning inside a class
    body += ch === "-" ? ch : escapeClassChar(ch);
    index += 1;
    first = false;
  }

  throw new InvalidPatternError(pattern, "unterminated character class");
}

export function globToRegExp(pattern: string, options: GlobOptions = {}): RegExp {
  let source = "";

  for (let i = 0; i < pattern.length; i += 1) {
    const ch = pattern.charAt(i);
    if (ch === "*") {
      source += ".*";
      continue;
    }

    if (ch === "?") {
      source += ".";
      continue;
    }

    if (ch === "\\") {
      const next = pattern.charAt(i + 1);
      if (!next) {
        throw new InvalidPatternError(pattern, "dangling escape");
      }
      source += escapeLiteral(next);
      i += 1;
      continue;
    }

    if (ch === "[") {
      const parsed = readClass(pattern, i);
      source += parsed.source;
      i = parsed.end;
      continue;
    }

    source += escapeLiteral(ch);
  }

  const anchored = `^${source}${options.prefix ? "" : "$"}`;
  try {
    return new RegExp(anchored, "isu");
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPatternError(pattern, reason);
  }
}
