/**
 * Wildcard → regular expression translation.
 */

import { PatternError } from "./errors.js";

export type PatternMode = "wildcard" | "regex";

export interface CompiledPattern {
  /** Pattern text as the user typed it. */
  readonly source: string;
  readonly mode: PatternMode;
  /** Regular expression text: translated for wildcards, verbatim for regex mode. */
  readonly expression: string;
  /** Whole-name matcher built from `expression`. */
  readonly regex: RegExp;
  readonly groupCount: number;
}

// Characters with syntactic meaning outside a class; escaping anything else is
// a syntax error under the `u` flag.
const REGEX_SYNTAX = new Set(["^", "$", "\\", ".", "*", "+", "?", "(", ")", "[", "]", "{", "}", "|", "/"]);

/**
 * `*` → `(.*)`, `?` → `(.)`, space → `\s`, `[...]` copied as a class (`[!` → `[^`).
 * The result is not anchored.
 */
export function wildcardToExpression(pattern: string): string {
  const chars = Array.from(pattern);
  let out = "";
  let inClass = false;

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (inClass) {
      if (ch === "]") inClass = false;
      out += ch;
      continue;
    }
    switch (ch) {
      case "*":
        out += "(.*)";
        break;
      case "?":
        out += "(.)";
        break;
      case ".":
        out += "\\.";
        break;
      case " ":
        out += "\\s";
        break;
      case "[":
        inClass = true;
        out += "[";
        if (chars[i + 1] === "!") {
          out += "^";
          i++;
        }
        break;
      case "]":
        out += "]";
        break;
      default:
        out += REGEX_SYNTAX.has(ch) ? `\\${ch}` : ch;
    }
  }
  return out;
}

function countGroups(expression: string, flags: string): number {
  // An empty alternative always matches, so the result array has one slot per group.
  const m = new RegExp(`${expression}|`, flags).exec("");
  return m ? m.length - 1 : 0;
}

// `u` first so matching works on code points; without it for identity escapes
// such as `\-` that only the legacy syntax accepts.
const FLAG_CANDIDATES = ["u", ""] as const;

export function compilePattern(source: string, mode: PatternMode): CompiledPattern {
  if (source === "") {
    throw new PatternError(source, "Pattern cannot be empty.");
  }
  const expression = mode === "wildcard" ? wildcardToExpression(source) : source;
  let reason = "";
  for (const flags of FLAG_CANDIDATES) {
    try {
      // The expression must be valid on its own before it is anchored.
      new RegExp(expression, flags);
      const groupCount = countGroups(expression, flags);
      const regex =
        mode === "wildcard"
          ? new RegExp(`^${expression}$`, flags)
          : new RegExp(`^(?:${expression})$`, flags);
      return { source, mode, expression, regex, groupCount };
    } catch (err: unknown) {
      reason = err instanceof Error ? err.message : String(err);
    }
  }
  throw new PatternError(source, `Invalid ${mode} pattern "${source}": ${reason}`);
}
