/**
 * Shared utilities for script and interactive commands.
 */

import type { RenameHost } from "../host.js";
import type { Logger } from "../logger.js";
import { compilePattern } from "../pattern.js";
import type { CompiledPattern, PatternMode } from "../pattern.js";
import { planRenames } from "../planner.js";
import type { RenameEntry, RenamePlan } from "../planner.js";
import { parseTemplate } from "../template.js";
import type { MissingGroupPolicy } from "../template.js";

export const PREVIEW_MAX_LINES = 20;

export interface RenameRequest {
  pattern: string;
  replacement: string;
  mode: PatternMode;
  missingGroups: MissingGroupPolicy;
}

export interface PreparedPlan {
  files: string[];
  compiled: CompiledPattern;
  plan: RenamePlan;
}

export function formatMove(entry: RenameEntry): string {
  return `${entry.oldName} → ${entry.newName}`;
}

export function formatPreview(renames: readonly RenameEntry[], maxLines: number): string {
  const lines = renames.slice(0, maxLines).map(formatMove);
  if (renames.length > maxLines) {
    lines.push(`… and ${renames.length - maxLines} more`);
  }
  return lines.join("\n");
}

export function pluralFiles(n: number): string {
  return n === 1 ? "1 file" : `${n} files`;
}

/** Message for a plan with nothing to move; identity matches are not "no matches". */
export function nothingToRename(plan: RenamePlan): string {
  const n = plan.unchanged.length;
  if (n === 0) return "No renames to perform (no matches).";
  return `Nothing to rename: ${pluralFiles(n)} already ${n === 1 ? "has its" : "have their"} target name.`;
}

/** Compiles, lists and plans. Throws the planner's errors unchanged. */
export function preparePlan(host: RenameHost, request: RenameRequest, logger: Logger): PreparedPlan {
  const compiled = compilePattern(request.pattern, request.mode);
  const template = parseTemplate(request.replacement);
  const files = host.listFiles();
  logger.debug("listed directory", { files: files.length });
  const plan = planRenames(files, compiled, template, {
    existingNames: host.listEntries(),
    missingGroups: request.missingGroups,
    logger,
  });
  return { files, compiled, plan };
}
