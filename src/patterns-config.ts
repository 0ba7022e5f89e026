/**
 * Presets: built-in patterns and global user config (~/.ren/patterns.json).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

export interface RenamePattern {
  name: string;
  pattern: string;
  replacement: string;
  /** `pattern` is a regular expression rather than a wildcard. */
  regex: boolean;
}

export const BUILT_IN_PRESETS: RenamePattern[] = [
  {
    name: "Screenshot timestamp",
    pattern: "Screenshot from * ??-??-??.png",
    replacement: "Screenshot_#1_(#2#3:#4#5:#6#7).png",
    regex: false,
  },
  { name: "JPEG to JPG extension", pattern: "*.jpeg", replacement: "#1.jpg", regex: false },
  { name: "Drop copy suffix", pattern: "* (copy).*", replacement: "#1.#2", regex: false },
  { name: "Swap around dash", pattern: "* - *.*", replacement: "#2 - #1.#3", regex: false },
  { name: "Numbered images", pattern: "^img_([0-9]+)\\.jpg$", replacement: "image-#1.jpg", regex: true },
  { name: "Strip leading zeros", pattern: "^0+([0-9].*)$", replacement: "#1", regex: true },
];

/** `$REN_CONFIG_DIR/patterns.json`, falling back to `~/.ren/patterns.json`. */
export function patternsPath(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env.REN_CONFIG_DIR || join(homedir(), ".ren");
  return join(dir, "patterns.json");
}

function isValidEntry(obj: unknown): obj is Omit<RenamePattern, "regex"> & { regex?: unknown } {
  if (obj === null || typeof obj !== "object") return false;
  const o = obj as Record<string, unknown>;
  return (
    typeof o.name === "string" &&
    o.name.length > 0 &&
    typeof o.pattern === "string" &&
    o.pattern.length > 0 &&
    typeof o.replacement === "string"
  );
}

/**
 * Load user patterns. Returns [] if the file is missing or invalid.
 */
export async function readUserPatterns(file: string = patternsPath()): Promise<RenamePattern[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, "utf-8"));
  } catch {
    return [];
  }
  if (!Array.isArray(data)) return [];
  const out: RenamePattern[] = [];
  for (const entry of data) {
    if (isValidEntry(entry)) {
      out.push({
        name: entry.name,
        pattern: entry.pattern,
        replacement: entry.replacement,
        regex: entry.regex === true,
      });
    }
  }
  return out;
}

/**
 * Append one pattern to the user file, creating its directory if needed. Throws on write error.
 */
export async function appendUserPattern(
  pattern: RenamePattern,
  file: string = patternsPath(),
): Promise<void> {
  const current = await readUserPatterns(file);
  current.push(pattern);
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(current, null, 2), "utf-8");
}

export async function loadAllPatterns(file?: string): Promise<RenamePattern[]> {
  return [...BUILT_IN_PRESETS, ...(await readUserPatterns(file))];
}

/** Case-insensitive lookup; the first pattern with the name wins. */
export function findPreset(
  name: string,
  patterns: readonly RenamePattern[],
): RenamePattern | undefined {
  const wanted = name.trim().toLowerCase();
  return patterns.find((p) => p.name.toLowerCase() === wanted);
}
