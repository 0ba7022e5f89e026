/**
 * Builds and validates the full old → new mapping before anything is renamed.
 */

import { CollisionError, OverwriteError, TemplateError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { MatchResult } from "./matcher.js";
import { matchName } from "./matcher.js";
import type { CompiledPattern } from "./pattern.js";
import type { MissingGroupPolicy, ReplacementTemplate } from "./template.js";
import { expandTemplate, parseTemplate } from "./template.js";

/** One rename operation: original filename → new filename */
export interface RenameEntry {
  readonly oldName: string;
  readonly newName: string;
}

export interface RenamePlan {
  /** Moves to perform, in scan order. */
  readonly entries: readonly RenameEntry[];
  /** Matched names whose target is their own name. */
  readonly unchanged: readonly string[];
  /** Target → source, identity targets included. */
  readonly targets: ReadonlyMap<string, string>;
}

export interface PlanOptions {
  /** Every entry in the directory; defaults to the candidates. */
  existingNames?: Iterable<string>;
  missingGroups?: MissingGroupPolicy;
  logger?: Logger;
}

function checkTargetName(template: ReplacementTemplate, oldName: string, newName: string): void {
  if (newName === "") {
    throw new TemplateError(template.source, `Replacement would produce an empty filename for: ${oldName}`);
  }
  if (newName === "." || newName === ".." || newName.includes("/") || newName.includes("\0")) {
    throw new TemplateError(
      template.source,
      `Replacement would produce "${newName}" for "${oldName}", which is not a plain file name.`,
    );
  }
}

export function planRenames(
  candidates: readonly string[],
  pattern: CompiledPattern,
  template: ReplacementTemplate | string,
  options: PlanOptions = {},
): RenamePlan {
  const tpl = typeof template === "string" ? parseTemplate(template) : template;
  const policy = options.missingGroups ?? "keep";
  const logger = options.logger ?? silentLogger;

  if (policy === "reject" && tpl.maxIndex > pattern.groupCount) {
    throw new TemplateError(
      tpl.source,
      `Placeholder #${tpl.maxIndex} has no capture group (pattern has ${pattern.groupCount}).`,
    );
  }
  logger.debug("compiled pattern", {
    mode: pattern.mode,
    expression: pattern.expression,
    groups: pattern.groupCount,
  });

  // Every source is known before any target is judged, so a target whose
  // current owner is renamed later in the scan does not count as an overwrite.
  const matches: Array<{ oldName: string; match: MatchResult }> = [];
  const sources = new Set<string>();
  for (const oldName of candidates) {
    if (sources.has(oldName)) continue;
    const match = matchName(pattern, oldName);
    if (match === null) {
      logger.debug("skip", { name: oldName });
      continue;
    }
    sources.add(oldName);
    matches.push({ oldName, match });
  }

  const existing = new Set(options.existingNames ?? candidates);
  const targets = new Map<string, string>();
  const entries: RenameEntry[] = [];
  const unchanged: string[] = [];

  for (const { oldName, match } of matches) {
    const newName = expandTemplate(tpl, match, policy);
    checkTargetName(tpl, oldName, newName);

    const previous = targets.get(newName);
    if (previous !== undefined) {
      throw new CollisionError(newName, [previous, oldName]);
    }
    if (oldName !== newName && existing.has(newName) && !sources.has(newName)) {
      throw new OverwriteError(newName, oldName);
    }
    targets.set(newName, oldName);
    logger.debug("match", { name: oldName, target: newName, captures: match.captures.length - 1 });

    if (oldName === newName) unchanged.push(oldName);
    else entries.push({ oldName, newName });
  }

  logger.debug("plan accepted", { renames: entries.length, unchanged: unchanged.length });
  return { entries, unchanged, targets };
}
