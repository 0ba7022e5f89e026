/**
 * Replacement templates: literal text with `#k` placeholders referring to
 * capture group k (`#0` is the whole name).
 */

import { TemplateError } from "./errors.js";
import type { MatchResult } from "./matcher.js";

export type TemplateToken =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "group"; readonly index: number; readonly raw: string };

export interface ReplacementTemplate {
  readonly source: string;
  readonly tokens: readonly TemplateToken[];
  /** Highest placeholder index, or -1 without placeholders. */
  readonly maxIndex: number;
}

/** `keep` leaves an out-of-range token as literal text, `reject` throws. */
export type MissingGroupPolicy = "keep" | "reject";

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

export function parseTemplate(source: string): ReplacementTemplate {
  const tokens: TemplateToken[] = [];
  let literal = "";
  let maxIndex = -1;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (ch !== "#" || !isDigit(source[i + 1])) {
      literal += ch;
      i++;
      continue;
    }
    let end = i + 1;
    while (isDigit(source[end])) end++;
    if (literal !== "") {
      tokens.push({ kind: "literal", text: literal });
      literal = "";
    }
    const raw = source.slice(i, end);
    const index = Number.parseInt(raw.slice(1), 10);
    tokens.push({ kind: "group", index, raw });
    maxIndex = Math.max(maxIndex, index);
    i = end;
  }
  if (literal !== "") tokens.push({ kind: "literal", text: literal });

  return { source, tokens, maxIndex };
}

/**
 * Single pass over the parsed tokens; captured text is copied as-is and never
 * scanned for placeholders again.
 */
export function expandTemplate(
  template: ReplacementTemplate,
  match: MatchResult,
  policy: MissingGroupPolicy = "keep",
): string {
  let out = "";
  for (const token of template.tokens) {
    if (token.kind === "literal") {
      out += token.text;
      continue;
    }
    const value = match.captures[token.index];
    if (value !== undefined) {
      out += value;
    } else if (policy === "reject") {
      throw new TemplateError(
        template.source,
        `Placeholder ${token.raw} has no capture group (pattern has ${match.captures.length - 1}).`,
      );
    } else {
      out += token.raw;
    }
  }
  return out;
}
