/**
 * Interactive mode: prompts for mode, preset or pattern/replacement, then preview and confirm.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { EXIT_CODES, RenError, errorMessage } from "../errors.js";
import { executePlan } from "../executor.js";
import { VERSION } from "../flags.js";
import type { RenameHost } from "../host.js";
import type { Logger } from "../logger.js";
import { countMatches } from "../matcher.js";
import type { PatternMode } from "../pattern.js";
import type { RenamePattern } from "../patterns-config.js";
import { BUILT_IN_PRESETS, appendUserPattern, readUserPatterns } from "../patterns-config.js";
import type { PreparedPlan } from "./common.js";
import { PREVIEW_MAX_LINES, formatPreview, nothingToRename, pluralFiles, preparePlan } from "./common.js";

export interface InteractiveOptions {
  dryRun: boolean;
  strict: boolean;
}

class Cancelled extends Error {}

function orCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) throw new Cancelled();
  return value;
}

async function promptRequest(mode: PatternMode): Promise<{ pattern: string; replacement: string; custom: boolean }> {
  const userPatterns = await readUserPatterns();
  const presets: RenamePattern[] = [...BUILT_IN_PRESETS, ...userPatterns].filter(
    (pat) => pat.regex === (mode === "regex"),
  );
  const options = presets.map((pat, i) => ({
    value: String(i),
    label: pat.name,
    hint: `${pat.pattern} → ${pat.replacement}`,
  }));
  options.push({ value: "custom", label: "Custom…", hint: "" });

  const choice = orCancel(await p.select({ message: "Choose a pattern", options }));
  if (choice !== "custom") {
    const preset = presets[Number.parseInt(choice, 10)];
    return { pattern: preset.pattern, replacement: preset.replacement, custom: false };
  }

  const pattern = orCancel(
    await p.text({
      message: mode === "regex" ? "Regular expression" : "Wildcard pattern",
      placeholder: mode === "regex" ? "e.g. ^img_([0-9]+)\\.jpg$" : "e.g. img_*.jpg",
      validate: (value) => (value ? undefined : "Pattern cannot be empty."),
    }),
  );
  const replacement = orCancel(
    await p.text({
      message: "Replace with",
      placeholder: "#1, #2 … for captured groups",
      validate: (value) => (value ? undefined : "Replacement cannot be empty."),
    }),
  );
  return { pattern, replacement, custom: true };
}

export async function runInteractive(
  host: RenameHost,
  logger: Logger,
  options: InteractiveOptions,
): Promise<number> {
  p.intro(pc.bold(pc.magenta(`ren – interactive batch renamer v${VERSION}`)));

  try {
    const mode = orCancel(
      await p.select<PatternMode>({
        message: "Match type",
        options: [
          { value: "wildcard", label: "Wildcard (* and ?)" },
          { value: "regex", label: "Regex" },
        ],
      }),
    );
    const { pattern, replacement, custom } = await promptRequest(mode);

    let prepared: PreparedPlan;
    try {
      prepared = preparePlan(
        host,
        { pattern, replacement, mode, missingGroups: options.strict ? "reject" : "keep" },
        logger,
      );
    } catch (err: unknown) {
      if (err instanceof RenError) {
        p.log.error(err.message);
        p.outro(pc.red("Nothing was renamed."));
        return err.exitCode;
      }
      throw err;
    }
    const { files, compiled, plan } = prepared;
    p.log.info(`${pluralFiles(countMatches(files, compiled))} of ${files.length} match.`);

    if (plan.entries.length === 0) {
      p.outro(pc.yellow(nothingToRename(plan)));
      return EXIT_CODES.success;
    }

    p.note(formatPreview(plan.entries, PREVIEW_MAX_LINES), "Preview");

    if (options.dryRun) {
      p.note("Dry run: no files were renamed.", "Done");
      p.outro(pc.green("Done."));
      return EXIT_CODES.success;
    }

    const confirmed = orCancel(
      await p.confirm({ message: `Rename ${pluralFiles(plan.entries.length)}?`, initialValue: false }),
    );
    if (!confirmed) {
      p.cancel("Rename cancelled.");
      return EXIT_CODES.success;
    }

    const s = p.spinner();
    s.start("Renaming…");
    const result = executePlan(host, plan, { dryRun: false, logger });
    s.stop(`Renamed ${result.moved.length} of ${pluralFiles(plan.entries.length)}.`);
    for (const { entry, error } of result.failed) {
      p.log.error(`${entry.oldName}: ${error.message}`);
    }

    if (custom) {
      await offerSave({ pattern, replacement, regex: mode === "regex" });
    }

    if (result.failed.length > 0) {
      p.outro(pc.red("Some files could not be renamed."));
      return EXIT_CODES.moveFailed;
    }
    p.outro(pc.green("Done."));
    return EXIT_CODES.success;
  } catch (err: unknown) {
    if (err instanceof Cancelled) {
      p.cancel("Cancelled.");
      return EXIT_CODES.success;
    }
    throw err;
  }
}

async function offerSave(pattern: Omit<RenamePattern, "name">): Promise<void> {
  const save = await p.confirm({ message: "Save this pattern to your list?", initialValue: false });
  if (p.isCancel(save) || !save) return;
  const name = await p.text({ message: "Pattern name", placeholder: "e.g. My custom pattern" });
  if (p.isCancel(name) || !name.trim()) return;
  try {
    await appendUserPattern({ name: name.trim(), ...pattern });
    p.log.success(`Saved as "${name.trim()}".`);
  } catch (err: unknown) {
    p.log.error(`Could not save pattern: ${errorMessage(err)}`);
  }
}
