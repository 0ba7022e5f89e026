import type { CompiledPattern } from "./pattern.js";

/** Captured strings; index 0 is the whole name, 1..N the groups by opening parenthesis. */
export interface MatchResult {
  readonly captures: readonly string[];
}

/**
 * Whole-name match. `null` means the name did not match; a group that did not
 * take part in the match is reported as "".
 */
export function matchName(pattern: CompiledPattern, name: string): MatchResult | null {
  const m = pattern.regex.exec(name);
  if (m === null) return null;
  const captures: string[] = [];
  for (let i = 0; i < m.length; i++) {
    captures.push(m[i] ?? "");
  }
  return { captures };
}

export function countMatches(names: readonly string[], pattern: CompiledPattern): number {
  let count = 0;
  for (const name of names) {
    if (pattern.regex.test(name)) count++;
  }
  return count;
}
