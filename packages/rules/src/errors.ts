function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class IoError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`IO error at ${path}: ${describe(cause)}`, { cause });
    this.name = "IoError";
  }
}

/** Malformed frontmatter, store record or manifest. */
export class ParseError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Parse error in ${path}: ${describe(cause)}`, { cause });
    this.name = "ParseError";
  }
}

export class UnknownFormatError extends Error {
  constructor(
    readonly value: string,
    readonly valid: readonly string[],
  ) {
    super(`Unknown format: '${value}'. Valid formats: ${valid.join(", ")}`);
    this.name = "UnknownFormatError";
  }
}

export class StoreNotFoundError extends Error {
  constructor(readonly root: string) {
    super(`No store found at ${root}\nInitialize one with: ruleport init`);
    this.name = "StoreNotFoundError";
  }
}

export class WriteFailureError extends Error {
  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super(`Cannot write to ${path}: ${reason}`);
    this.name = "WriteFailureError";
  }
}

/** Carries the diagnostic text of the version-control tool as-is. */
export class VersionControlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VersionControlError";
  }
}
