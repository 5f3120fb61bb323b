/**
 * Thrown when an interface cannot be turned into an InterfaceModel: the
 * interface or a type it uses is missing, the request is ambiguous, an import
 * does not resolve, or the source uses a construct mockwright cannot mock.
 * Always fatal to the current run.
 */
export class ExtractionError extends Error {
  constructor(message: string, public readonly identifier?: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

/**
 * Thrown when a model cannot be rendered into source text in the
 * destination's import context.
 */
export class GenerationError extends Error {
  constructor(message: string, public readonly identifier?: string) {
    super(message);
    this.name = "GenerationError";
  }
}

/**
 * Thrown for malformed method signatures (misplaced variadic parameter,
 * duplicate names, ...). The TypeScript grammar rules most of these out, but
 * models can be built by hand.
 */
export class SignatureConstraintError extends Error {
  constructor(message: string, public readonly identifier: string) {
    super(message);
    this.name = "SignatureConstraintError";
  }
}

/** Invalid command-line arguments or flag combinations. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
