import type { ZodError } from "zod";

/**
 * Raised when a problem, a set of solver options, or the choice of method is rejected before
 * any algorithm runs. Algorithmic outcomes (unbounded, infeasible, iteration limit) are never
 * reported this way; they come back as a `Result` status.
 */
export class ValidationError extends Error {
  /** Every issue found, formatted as `path: message` where a path is known */
  readonly reasons: readonly string[];

  constructor(reasons: string | readonly string[]) {
    const list = typeof reasons === "string" ? [reasons] : [...reasons];
    super(list.join(", "));
    this.name = "ValidationError";
    this.reasons = list;
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      error.errors.map((e) => {
        const path = e.path.join(".");
        return path ? `${path}: ${e.message}` : e.message;
      }),
    );
  }
}
