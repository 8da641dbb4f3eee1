export type ValidationErrorKind =
  | "empty-workflow"
  | "bad-syntax"
  | "unknown-tool"
  | "unknown-dependency"
  | "cyclic-dependency";

/**
 * A workflow definition rejected before any step runs.
 */
export class ValidationError extends Error {
  constructor(
    public readonly kind: ValidationErrorKind,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}
