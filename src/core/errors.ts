export type ErrorCode = "INVALID_ARGUMENT" | "CONFIGURATION" | "CORPUS_NOT_FOUND";

export class SpellError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller passed a value the operation cannot accept (e.g. n <= 0). */
export class InvalidArgumentError extends SpellError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

/**
 * Raised while building a vocabulary or reading settings.
 * Thrown at construction time so no query ever runs against an unusable table.
 */
export class ConfigurationError extends SpellError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}

export class CorpusNotFoundError extends SpellError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super("CORPUS_NOT_FOUND", `corpus not found: ${path}`, options);
  }
}
