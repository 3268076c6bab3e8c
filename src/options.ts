import { z } from "zod";
import { ValidationError } from "./errors.js";
import { SolverOptionsSchema } from "./schemas.js";

export type SolverOptions = z.input<typeof SolverOptionsSchema>;
export type ResolvedOptions = z.output<typeof SolverOptionsSchema>;

/**
 * Applies defaults to the options of a single solve.
 * @throws {ValidationError} when an option is out of range
 */
export function resolveOptions(options: SolverOptions = {}): ResolvedOptions {
  const parsed = SolverOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }
  return parsed.data;
}

export function defaultIterationLimit(columns: number, rows: number): number {
  return Math.max(50, 10 * (columns + rows));
}
