import { solveBigM } from "./big-m.js";
import { ValidationError } from "./errors.js";
import { solveGraphical } from "./graphical.js";
import type { SolverOptions } from "./options.js";
import type { Problem } from "./problem.js";
import type { Result, SolveMethod } from "./result.js";
import { solveSimplex } from "./simplex.js";
import { needsArtificialVariables } from "./standard-form.js";

const METHODS: readonly SolveMethod[] = ["simplex", "big-m", "graphical"];

/**
 * Why `method` cannot solve `problem`, or undefined when it can.
 */
export function inapplicableReason(problem: Problem, method: SolveMethod): string | undefined {
  switch (method) {
    case "simplex":
      return needsArtificialVariables(problem)
        ? "The simplex method needs every constraint in '<=' form with a non-negative right-hand side; use the big-m method for '>=' and '=' constraints"
        : undefined;
    case "big-m":
      return undefined;
    case "graphical":
      return problem.objective.length === 2
        ? undefined
        : `The graphical method needs exactly 2 variables, but the problem has ${problem.objective.length}`;
  }
}

export function applicableMethods(problem: Problem): SolveMethod[] {
  return METHODS.filter((method) => inapplicableReason(problem, method) === undefined);
}

/**
 * The method to use when the caller has no preference: plain simplex when the slack variables
 * form a feasible starting basis, Big-M otherwise.
 */
export function recommendMethod(problem: Problem): SolveMethod {
  return needsArtificialVariables(problem) ? "big-m" : "simplex";
}

/**
 * Solves `problem` with the chosen method.
 *
 * @throws {ValidationError} when the method's preconditions do not hold or an option is out of
 * range. Unbounded, infeasible and iteration-limit outcomes are returned, not thrown.
 */
export function solve(problem: Problem, method: SolveMethod, options: SolverOptions = {}): Result {
  const reason = inapplicableReason(problem, method);
  if (reason !== undefined) {
    throw new ValidationError(reason);
  }

  switch (method) {
    case "simplex":
      return solveSimplex(problem, options);
    case "big-m":
      return solveBigM(problem, options);
    case "graphical":
      return solveGraphical(problem, options);
  }
}
