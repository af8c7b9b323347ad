/**
 * Fatal error types. File-local problems are reported in the output
 * documents instead; these abort the run.
 */

/**
 * Two files produced the same fact identity. This can only happen if
 * identity stamping is broken, so it is never recovered from.
 */
export class FactCollisionError extends Error {
  readonly name = "FactCollisionError";

  constructor(
    readonly identity: string,
    readonly firstPath: string,
    readonly secondPath: string
  ) {
    super(`Duplicate fact identity ${identity} in ${firstPath} and ${secondPath}`);
  }
}

export class OutputWriteError extends Error {
  readonly name = "OutputWriteError";

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}

export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(`Invalid config ${path}: ${issues.join("; ")}`);
  }
}

export class SnapshotFormatError extends Error {
  readonly name = "SnapshotFormatError";

  constructor(
    readonly source: string,
    readonly issues: string[]
  ) {
    super(`Invalid facts document ${source}: ${issues.join("; ")}`);
  }
}
