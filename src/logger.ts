/**
 * Diagnostics for the CLI. Everything goes to stderr so stdout only carries the
 * rename listing; debug lines are printed only when enabled with -D.
 */

import pc from "picocolors";

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string | Error): void;
}

export interface LoggerOptions {
  debug?: boolean;
  colors?: boolean;
  write?: (line: string) => void;
}

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${typeof value === "string" ? JSON.stringify(value) : String(value)}`)
    .join(" ");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const c = pc.createColors(options.colors ?? pc.isColorSupported);
  const debugEnabled = options.debug ?? false;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    debug(msg, meta) {
      if (!debugEnabled) return;
      const suffix = meta && Object.keys(meta).length > 0 ? ` ${c.dim(formatMeta(meta))}` : "";
      write(`${c.magenta("debug")} ${msg}${suffix}`);
    },
    info(msg) {
      write(msg);
    },
    warn(msg) {
      write(`${c.yellow("warn:")} ${msg}`);
    },
    error(msg) {
      const text = msg instanceof Error ? msg.message : msg;
      write(`${c.red("error:")} ${text}`);
    },
  };
}

/** A logger that discards everything; the default for library calls. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
