/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";

export const VERSION = "1.0.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  debug: boolean;
  regex: boolean;
  strict: boolean;
  interactive: boolean;
  preset: string | undefined;
  positionals: string[];
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "debug", "regex", "strict", "interactive"] as const,
  string: ["preset"] as const,
  alias: {
    h: "help",
    V: "version",
    d: "dry-run",
    D: "debug",
    E: "regex",
    s: "strict",
    i: "interactive",
    p: "preset",
  } as const,
};

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    debug: Boolean(raw.debug),
    regex: Boolean(raw.regex),
    strict: Boolean(raw.strict),
    interactive: Boolean(raw.interactive),
    preset: raw.preset,
    positionals: raw._.map((value) => String(value)),
  };
}

export const USAGE_LINE = "Usage: ren [OPTIONS] pattern replacement";

export function printHelp(): void {
  const usage = `ren – rename files in the current directory by pattern

${USAGE_LINE}

Each file whose whole name matches <pattern> is renamed to <replacement>,
where #0 is the whole name and #1, #2, … are the captured groups.
In wildcard mode every * and ? is a group; a space matches any whitespace.

Options:
  -d, --dry-run          Show the renames without performing them
  -D, --debug            Print a trace of matching and planning to stderr
  -E, --regex            Treat <pattern> as a regular expression
  -s, --strict           Fail on placeholders with no capture group
  -p, --preset <name>    Use a saved pattern (built-in or ~/.ren/patterns.json)
  -i, --interactive      Prompt for pattern and replacement
  -h, --help             Show this help
  -V, --version          Show version

Exit codes:
  0  success          2  two files would get the same name
  1  usage error      3  a target name already exists
                      4  some renames failed

Examples:
  ren "Screenshot from * ??-??-??.png" "Screenshot_#1_(#2#3:#4#5:#6#7).png"
  ren -E "^img_([0-9]+)\\.jpg$" "image-#1.jpg"
  ren -d "*.jpeg" "#1.jpg"`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
