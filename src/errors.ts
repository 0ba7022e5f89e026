/**
 * Error taxonomy for planning and invocation failures. Each error carries the
 * process exit code the CLI reports for it.
 */

export type RenErrorCode = "USAGE" | "PATTERN" | "TEMPLATE" | "COLLISION" | "OVERWRITE";

export const EXIT_CODES = {
  success: 0,
  usage: 1,
  collision: 2,
  overwrite: 3,
  moveFailed: 4,
} as const;

export class RenError extends Error {
  readonly code: RenErrorCode;
  readonly exitCode: number;

  constructor(code: RenErrorCode, message: string, exitCode: number) {
    super(message);
    this.name = "RenError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

/** Wrong argument count or an unknown preset. */
export class UsageError extends RenError {
  constructor(message: string) {
    super("USAGE", message, EXIT_CODES.usage);
    this.name = "UsageError";
  }
}

export class PatternError extends RenError {
  readonly pattern: string;

  constructor(pattern: string, message: string) {
    super("PATTERN", message, EXIT_CODES.usage);
    this.name = "PatternError";
    this.pattern = pattern;
  }
}

export class TemplateError extends RenError {
  readonly template: string;

  constructor(template: string, message: string) {
    super("TEMPLATE", message, EXIT_CODES.usage);
    this.name = "TemplateError";
    this.template = template;
  }
}

/** Two or more sources would be renamed to the same target. */
export class CollisionError extends RenError {
  readonly target: string;
  readonly sources: readonly string[];

  constructor(target: string, sources: readonly string[]) {
    super(
      "COLLISION",
      `Multiple files would be renamed to "${target}": ${sources.map((s) => `"${s}"`).join(", ")}`,
      EXIT_CODES.collision,
    );
    this.name = "CollisionError";
    this.target = target;
    this.sources = sources;
  }
}

/** The target already exists and is not itself being renamed away. */
export class OverwriteError extends RenError {
  readonly target: string;
  readonly source: string;

  constructor(target: string, source: string) {
    super(
      "OVERWRITE",
      `Renaming "${source}" would overwrite existing file "${target}"`,
      EXIT_CODES.overwrite,
    );
    this.name = "OverwriteError";
    this.target = target;
    this.source = source;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
