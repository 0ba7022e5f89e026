#!/usr/bin/env node
/**
 * ren – rename files in the current directory by wildcard or regex pattern.
 * Script mode by default; --interactive prompts for everything.
 */

import pc from "picocolors";
import { runInteractive } from "./commands/interactive.js";
import { runScriptMode } from "./commands/script.js";
import { EXIT_CODES, errorMessage } from "./errors.js";
import { parseArgs, printHelp, printVersion } from "./flags.js";
import { createNodeHost } from "./host.js";
import { createLogger } from "./logger.js";
import { loadAllPatterns } from "./patterns-config.js";

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return EXIT_CODES.success;
  }
  if (args.version) {
    printVersion();
    return EXIT_CODES.success;
  }

  const logger = createLogger({ debug: args.debug, colors: pc.isColorSupported });
  const host = createNodeHost(process.cwd());

  if (args.interactive) {
    return runInteractive(host, logger, { dryRun: args.dryRun, strict: args.strict });
  }
  return runScriptMode(args, {
    host,
    logger,
    out: (line) => console.log(line),
    loadPatterns: () => loadAllPatterns(),
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`${pc.red("error:")} ${errorMessage(err)}`);
    process.exitCode = EXIT_CODES.usage;
  },
);
