/**
 * Applies an accepted plan, or only reports it in dry-run mode.
 *
 * Sources that are also targets of another entry (chains, swaps) are first
 * moved to a temporary name so no file is clobbered mid-run. A failed move is
 * reported and the remaining entries still run.
 */

import { errorMessage } from "./errors.js";
import type { RenameHost } from "./host.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { RenameEntry, RenamePlan } from "./planner.js";

export interface MoveFailure {
  readonly entry: RenameEntry;
  readonly error: Error;
}

export interface ExecutionResult {
  readonly moved: readonly RenameEntry[];
  readonly failed: readonly MoveFailure[];
}

export interface ExecuteOptions {
  dryRun: boolean;
  onMove?: (entry: RenameEntry) => void;
  onFailure?: (failure: MoveFailure) => void;
  logger?: Logger;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function tempNameFor(
  host: RenameHost,
  targets: ReadonlySet<string>,
  index: number,
  name: string,
): string {
  let attempt = 0;
  let candidate = `.ren-${index}-${name}`;
  while (host.exists(candidate) || targets.has(candidate)) {
    attempt++;
    candidate = `.ren-${index}-${attempt}-${name}`;
  }
  return candidate;
}

export function executePlan(
  host: RenameHost,
  plan: RenamePlan,
  options: ExecuteOptions,
): ExecutionResult {
  const logger = options.logger ?? silentLogger;

  if (options.dryRun) {
    for (const entry of plan.entries) options.onMove?.(entry);
    return { moved: [...plan.entries], failed: [] };
  }

  const moved: RenameEntry[] = [];
  const failed: MoveFailure[] = [];
  const fail = (entry: RenameEntry, error: Error): void => {
    const failure = { entry, error };
    failed.push(failure);
    options.onFailure?.(failure);
  };

  const targets = new Set(plan.entries.map((e) => e.newName));
  const staged = new Map<string, string>();
  const skipped = new Set<RenameEntry>();

  plan.entries.forEach((entry, i) => {
    if (!targets.has(entry.oldName)) return;
    const tempName = tempNameFor(host, targets, i, entry.oldName);
    try {
      host.rename(entry.oldName, tempName);
      staged.set(entry.oldName, tempName);
      logger.debug("staged", { name: entry.oldName, temp: tempName });
    } catch (err: unknown) {
      skipped.add(entry);
      fail(entry, toError(err));
    }
  });

  for (const entry of plan.entries) {
    if (skipped.has(entry)) continue;
    const from = staged.get(entry.oldName) ?? entry.oldName;

    if (host.exists(entry.newName) && !isCaseOnlyRename(entry, from)) {
      fail(entry, new Error(`Target "${entry.newName}" appeared after planning; not overwriting.`));
      restore(host, entry, from, logger);
      continue;
    }
    try {
      host.rename(from, entry.newName);
      moved.push(entry);
      logger.debug("renamed", { from: entry.oldName, to: entry.newName });
      options.onMove?.(entry);
    } catch (err: unknown) {
      fail(entry, toError(err));
      restore(host, entry, from, logger);
    }
  }

  return { moved, failed };
}

/**
 * `a.txt` → `A.txt` in place: on a case-insensitive filesystem the target
 * "exists" because it is the source itself.
 */
function isCaseOnlyRename(entry: RenameEntry, from: string): boolean {
  return from === entry.oldName && entry.newName.toLowerCase() === entry.oldName.toLowerCase();
}

/** Moves a staged file back to its original name when that name is still free. */
function restore(host: RenameHost, entry: RenameEntry, from: string, logger: Logger): void {
  if (from === entry.oldName || host.exists(entry.oldName)) {
    if (from !== entry.oldName) logger.warn(`"${entry.oldName}" was left as "${from}".`);
    return;
  }
  try {
    host.rename(from, entry.oldName);
  } catch (err: unknown) {
    logger.warn(`"${entry.oldName}" was left as "${from}": ${errorMessage(err)}`);
  }
}
