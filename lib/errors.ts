/**
 * Base class for every error formbind throws.
 *
 * These signal programming or template mistakes (a missing field name, a
 * path whose root object was never bound). Invalid user input is never
 * thrown; it is reported through the validation result.
 */
export abstract class FormBindError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a field or scope is created without a usable name, or when a
 * scope operation is called without its field name.
 */
export class MissingFieldNameError extends FormBindError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Field name required: ${reason}`, "FIELD_NAME_REQUIRED", details);
  }
}

/**
 * Thrown when the first token of a dotted path names nothing: no explicit
 * root was passed and the stash holds no such key.
 */
export class UnresolvedRootError extends FormBindError {
  constructor(path: string, root: string) {
    super(
      `Cannot resolve '${path}': no object named '${root}' was supplied or bound`,
      "ROOT_NOT_FOUND",
      { path, root },
    );
  }
}

export class NotACollectionError extends FormBindError {
  constructor(path: string, actual: string) {
    super(
      `Cannot iterate '${path}': expected an array, got ${actual}`,
      "NOT_A_COLLECTION",
      { path, actual },
    );
  }
}

export class InvalidConfigError extends FormBindError {
  constructor(issues: readonly string[]) {
    super(
      `Invalid formbind configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      "INVALID_CONFIG",
      { issues },
    );
  }
}
