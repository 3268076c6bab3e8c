import { z } from "zod";

const FiniteNumberSchema = z.number().finite("Value must be a finite number");

export const DirectionSchema = z
  .enum(["maximize", "minimize"])
  .describe("Optimization direction. Valid values: 'maximize' or 'minimize'.");

export const RelationSchema = z
  .enum(["<=", ">=", "="])
  .or(z.enum(["≤", "≥"]).transform((symbol): "<=" | ">=" => (symbol === "≤" ? "<=" : ">=")))
  .describe("Constraint relation: '<=', '>=' or '='. The symbols '≤' and '≥' are also accepted.");

export const VariableNameSchema = z
  .string()
  .regex(
    /^[A-Za-z_][A-Za-z0-9_]*$/,
    "Variable names must start with a letter or underscore and contain only letters, digits and underscores",
  );

export const ConstraintInputSchema = z.object({
  coefficients: z
    .array(FiniteNumberSchema)
    .describe(
      "Coefficient of each decision variable in this constraint. Must have exactly as many entries as the objective.",
    ),
  relation: RelationSchema,
  rhs: FiniteNumberSchema.describe("Right-hand side value (any sign)"),
});

export const ProblemInputSchema = z
  .object({
    direction: DirectionSchema,
    objective: z
      .array(FiniteNumberSchema)
      .min(1, "At least one objective coefficient is required")
      .describe(
        "Objective coefficients, one per decision variable. The length of this array defines the number of variables.",
      ),
    constraints: z
      .array(ConstraintInputSchema)
      .min(1, "At least one constraint is required")
      .describe("Constraints in the order they should appear in the step trace."),
    nonNegative: z
      .boolean()
      .default(true)
      .describe("Whether every decision variable is bounded below by zero. Defaults to true."),
    variableNames: z
      .array(VariableNameSchema)
      .optional()
      .describe("Optional variable names (defaults to x1, x2, ...)."),
  })
  .superRefine((data, ctx) => {
    const numVars = data.objective.length;

    data.constraints.forEach((constraint, index) => {
      if (constraint.coefficients.length !== numVars) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Constraint ${index + 1} has ${constraint.coefficients.length} coefficients but expected ${numVars} (matching the number of variables in the objective function)`,
          path: ["constraints", index, "coefficients"],
        });
      }
    });

    if (data.variableNames) {
      if (data.variableNames.length !== numVars) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Variable names array has ${data.variableNames.length} elements but expected ${numVars}`,
          path: ["variableNames"],
        });
      }
      const seen = new Set<string>();
      data.variableNames.forEach((name, index) => {
        if (seen.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Variable name '${name}' is used more than once`,
            path: ["variableNames", index],
          });
        }
        seen.add(name);
      });
    }
  });

export const SolveMethodSchema = z
  .enum(["simplex", "big-m", "graphical"])
  .describe(
    "Solution method. 'simplex' needs every constraint in <= form after making right-hand sides non-negative, 'big-m' accepts any mix of <=, >= and =, 'graphical' needs exactly 2 variables.",
  );

export const SolverOptionsSchema = z
  .object({
    tolerance: z
      .number()
      .positive()
      .max(1e-3)
      .default(1e-9)
      .describe("Values within this distance of zero count as zero when choosing pivots. Default is 1e-9."),
    feasibilityTolerance: z
      .number()
      .positive()
      .max(1e-3)
      .default(1e-9)
      .describe("Tolerance used when checking corner points against constraints. Default is 1e-9."),
    iterationLimit: z
      .number()
      .int()
      .positive()
      .optional()
      .describe(
        "Maximum number of pivots before giving up with an 'error' status. Defaults to max(50, 10 x (columns + rows)).",
      ),
  })
  .describe("Numeric settings for a single solve. All options are optional with sensible defaults.");

export const SolveArgsSchema = z.object({
  problem: ProblemInputSchema.describe(`The linear program to solve.

    DIMENSION CONSISTENCY REQUIREMENTS:
    - Every constraint must have exactly as many coefficients as the objective
    - variableNames, when given, must have one unique name per variable

    POSSIBLE STATUSES:
    - 'optimal': variables and objectiveValue are reported
    - 'unbounded': the objective can improve without limit
    - 'infeasible': no point satisfies every constraint
    - 'error': the iteration limit was reached (cycling on a degenerate problem)`),
  method: SolveMethodSchema.optional().describe(
    "Solution method. When omitted, 'simplex' is used if every constraint fits it, otherwise 'big-m'.",
  ),
  options: SolverOptionsSchema.optional(),
  crossCheck: z
    .boolean()
    .optional()
    .describe("Also solve with the HiGHS solver and report whether both answers agree."),
});

export const ValidateArgsSchema = z.object({
  problem: ProblemInputSchema.describe("The linear program to check, in the same shape as for solving."),
});
