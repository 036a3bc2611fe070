/**
 * Error taxonomy for entry construction and legacy migration.
 */

/**
 * A single violation found while validating an entity.
 */
export interface ValidationIssue {
  /** Dotted path to the offending field, e.g. "biosynthesis.modules[0].name" */
  readonly field: string;
  /** Human-readable error message */
  readonly message: string;
}

/**
 * Base class for every error raised by this package.
 */
export class MibigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MibigError";
  }
}

/**
 * Raised when an entity fails its invariants.
 * Always carries the complete list of violations for the validated subtree.
 */
export class ValidationError extends MibigError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], subject = "entity") {
    const count = issues.length;
    super(`Invalid ${subject}: ${count} validation error${count === 1 ? "" : "s"}`);
    this.name = "ValidationError";
    this.issues = Object.freeze([...issues]);
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field || "(root)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Raised when a legacy document cannot be carried over to the current schema:
 * unrecognized vocabulary, unsupported shapes or inconsistent changelog arrays.
 */
export class MigrationError extends MibigError {
  /** The legacy value that could not be classified, when there is one */
  public readonly value?: string;

  constructor(message: string, value?: string) {
    super(message);
    this.name = "MigrationError";
    this.value = value;
  }
}
