import { z } from "zod";
import type { Problem } from "./problem.js";

/**
 * The parts of a HiGHS solution object the cross-check reads. Columns are keyed by variable
 * name; `Primal` is the solution value.
 */
const HighsSolutionSchema = z.object({
  Status: z.string(),
  ObjectiveValue: z.number().optional(),
  Columns: z.record(z.object({ Primal: z.number().optional() }).passthrough()).optional(),
});

/**
 * Reference solution for problems HiGHS solved to optimality.
 */
interface OptimalReference {
  /** Indicates the problem was solved to optimality */
  status: "optimal";
  /** The optimal objective function value */
  objectiveValue: number;
  /** Solution value of each variable, keyed by variable name */
  variables: Record<string, number>;
}

/**
 * Reference result for problems HiGHS did not solve to optimality.
 */
interface NonOptimalReference {
  /** The solver status (normalized to lowercase with underscores) */
  status: string;
  /** Human-readable message about the problem status */
  message: string;
}

/**
 * Union type representing all possible decoded results.
 * Narrow on `status === "optimal"` to reach the solution values.
 */
export type ReferenceSolution = OptimalReference | NonOptimalReference;

export function isOptimalReference(reference: ReferenceSolution): reference is OptimalReference {
  return reference.status === "optimal";
}

/**
 * Decodes the raw HiGHS solver output into a {@link ReferenceSolution}.
 *
 * For optimal solutions it provides the objective value and the value of each variable. Other
 * statuses ("Infeasible", "Unbounded", ...) are normalized to lowercase with underscores.
 *
 * @param result - The raw result object from HiGHS solver
 * @param problem - The problem that was solved (needed to map variable names)
 * @returns A decoded result object with consistent structure
 * @throws {Error} when the output does not look like a HiGHS solution
 *
 * @example
 * ```typescript
 * const decoded = decode(highs.solve(encode(problem)), problem);
 *
 * if (isOptimalReference(decoded)) {
 *   console.log("Objective:", decoded.objectiveValue);
 * } else {
 *   console.log("Failed:", decoded.message);
 * }
 * ```
 */
export function decode(result: unknown, problem: Problem): ReferenceSolution {
  const parsed = HighsSolutionSchema.safeParse(result);
  if (!parsed.success) {
    throw new Error(`Unexpected HiGHS output: ${parsed.error.message}`);
  }

  const { Status, ObjectiveValue, Columns } = parsed.data;

  if (Status === "Optimal") {
    // Variables HiGHS eliminated during presolve are missing from Columns and sit at zero
    const variables = Object.fromEntries(
      problem.variableNames.map((name) => [name, Columns?.[name]?.Primal ?? 0]),
    );

    return {
      status: "optimal",
      objectiveValue: ObjectiveValue ?? 0,
      variables,
    };
  }

  return {
    status: Status.toLowerCase().replace(/\s+/g, "_"),
    message: `Problem status: ${Status}`,
  };
}
