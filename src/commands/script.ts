/**
 * Script mode: `ren [OPTIONS] pattern replacement` on the working directory.
 */

import { EXIT_CODES, RenError, UsageError } from "../errors.js";
import { executePlan } from "../executor.js";
import type { ParsedArgs } from "../flags.js";
import { USAGE_LINE } from "../flags.js";
import type { RenameHost } from "../host.js";
import type { Logger } from "../logger.js";
import type { RenamePattern } from "../patterns-config.js";
import { findPreset } from "../patterns-config.js";
import type { RenameRequest } from "./common.js";
import { formatMove, nothingToRename, pluralFiles, preparePlan } from "./common.js";

export interface ScriptDeps {
  host: RenameHost;
  logger: Logger;
  /** Receives the rename listing and summary lines. */
  out: (line: string) => void;
  loadPatterns: () => Promise<RenamePattern[]>;
}

export async function resolveRequest(
  args: ParsedArgs,
  loadPatterns: () => Promise<RenamePattern[]>,
): Promise<RenameRequest> {
  const missingGroups = args.strict ? "reject" : "keep";
  if (args.preset !== undefined) {
    if (args.positionals.length !== 0) {
      throw new UsageError(`--preset takes no positional arguments.\n${USAGE_LINE}`);
    }
    const preset = findPreset(args.preset, await loadPatterns());
    if (preset === undefined) {
      throw new UsageError(`Unknown preset: ${args.preset}`);
    }
    return {
      pattern: preset.pattern,
      replacement: preset.replacement,
      mode: preset.regex ? "regex" : "wildcard",
      missingGroups,
    };
  }
  if (args.positionals.length !== 2) {
    throw new UsageError(
      `Expected 2 arguments (pattern and replacement), got ${args.positionals.length}.\n${USAGE_LINE}`,
    );
  }
  const [pattern, replacement] = args.positionals;
  return { pattern, replacement, mode: args.regex ? "regex" : "wildcard", missingGroups };
}

/** Runs one invocation and returns the process exit code. */
export async function runScriptMode(args: ParsedArgs, deps: ScriptDeps): Promise<number> {
  const { host, logger, out } = deps;
  try {
    const request = await resolveRequest(args, deps.loadPatterns);
    const { plan } = preparePlan(host, request, logger);

    if (plan.entries.length === 0) {
      out(nothingToRename(plan));
      return EXIT_CODES.success;
    }

    const result = executePlan(host, plan, {
      dryRun: args.dryRun,
      onMove: (entry) => out(formatMove(entry)),
      onFailure: ({ entry, error }) =>
        logger.error(`Could not rename "${entry.oldName}" to "${entry.newName}": ${error.message}`),
      logger,
    });

    if (args.dryRun) {
      out(`Dry run: ${pluralFiles(plan.entries.length)} would be renamed.`);
      return EXIT_CODES.success;
    }
    if (result.failed.length > 0) {
      out(`Renamed ${result.moved.length} of ${pluralFiles(plan.entries.length)}.`);
      return EXIT_CODES.moveFailed;
    }
    out(`Renamed ${pluralFiles(result.moved.length)}.`);
    return EXIT_CODES.success;
  } catch (err: unknown) {
    if (err instanceof RenError) {
      logger.error(err);
      return err.exitCode;
    }
    throw err;
  }
}
