import { z } from "zod";
import { ValidationError } from "./errors.js";
import { ConstraintInputSchema, DirectionSchema, ProblemInputSchema } from "./schemas.js";

export type Direction = z.infer<typeof DirectionSchema>;
export type Relation = "<=" | ">=" | "=";

/** A constraint as the caller writes it; `≤` and `≥` are accepted for the relation. */
export type ConstraintInput = z.input<typeof ConstraintInputSchema>;

export interface Constraint {
  readonly coefficients: readonly number[];
  readonly relation: Relation;
  readonly rhs: number;
}

/**
 * A validated linear program. Frozen on construction; every engine reads it and none writes it.
 */
export interface Problem {
  readonly direction: Direction;
  /** Objective coefficient per decision variable; the index is the variable id */
  readonly objective: readonly number[];
  readonly constraints: readonly Constraint[];
  /** When true every decision variable is bounded below by zero */
  readonly nonNegative: boolean;
  readonly variableNames: readonly string[];
}

/**
 * Builds a {@link Problem} from numeric coefficients.
 *
 * @throws {ValidationError} on an empty objective, no constraints, a coefficient list whose
 * length differs from the objective's, a non-finite number, or bad variable names
 *
 * @example
 * ```typescript
 * const problem = normalize("maximize", [3, 2], [
 *   { coefficients: [2, 1], relation: "<=", rhs: 100 },
 *   { coefficients: [1, 2], relation: "<=", rhs: 80 },
 * ]);
 * ```
 */
export function normalize(
  direction: Direction,
  objective: readonly number[],
  constraints: readonly ConstraintInput[],
  nonNegative: boolean = true,
  variableNames?: readonly string[],
): Problem {
  return parseProblem({ direction, objective, constraints, nonNegative, variableNames });
}

/**
 * Validates JSON-shaped input and builds a {@link Problem} from it.
 * @throws {ValidationError} listing every issue found
 */
export function parseProblem(input: unknown): Problem {
  const parsed = ProblemInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }

  const { direction, objective, constraints, nonNegative, variableNames } = parsed.data;

  return Object.freeze({
    direction,
    objective: Object.freeze([...objective]),
    constraints: Object.freeze(
      constraints.map((constraint) =>
        Object.freeze({
          coefficients: Object.freeze([...constraint.coefficients]),
          relation: constraint.relation,
          rhs: constraint.rhs,
        }),
      ),
    ),
    nonNegative,
    variableNames: Object.freeze(variableNames ? [...variableNames] : objective.map((_, i) => `x${i + 1}`)),
  });
}
