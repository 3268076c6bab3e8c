import type { Problem } from "./problem.js";
import { defaultIterationLimit, resolveOptions, type SolverOptions } from "./options.js";
import type { Result } from "./result.js";
import {
  describeInitialTableau,
  finishOptimal,
  iterationLimitResult,
  runPivotLoop,
  unboundedResult,
} from "./simplex.js";
import { describeStandardForm, standardize, toTableau } from "./standard-form.js";
import type { Tableau } from "./tableau.js";
import { StepTrace, formatNumber } from "./trace.js";

/**
 * Solves a problem with any mix of `<=`, `>=` and `=` constraints. Artificial variables give
 * every `>=` and `=` row a starting basic variable and carry a cost of -M. M stays symbolic: the
 * tableau keeps its coefficients in a row of their own and compares them before any plain
 * number, so the iteration pushes the artificials out of the basis whenever the problem is
 * feasible, however the data is scaled.
 *
 * @throws {ValidationError} when an option is out of range
 */
export function solveBigM(problem: Problem, options: SolverOptions = {}): Result {
  const { tolerance, iterationLimit } = resolveOptions(options);
  const form = standardize(problem, true);
  const trace = new StepTrace();

  trace.record({ title: "Standard Form", explanation: describeStandardForm(problem, form) });

  const tableau = toTableau(form, tolerance);
  const artificialRows = form.basis
    .map((column, row) => ({ column, row }))
    .filter(({ column }) => form.columns[column].kind === "artificial");

  if (artificialRows.length === 0) {
    trace.record({
      title: "Initial Tableau",
      explanation: describeInitialTableau(form),
      table: tableau.snapshot(),
    });
  } else {
    const names = artificialRows.map(({ column }) => form.columns[column].label).join(", ");
    trace.record({
      title: "Penalized Objective Row",
      explanation: `${describeInitialTableau(form)} The basic artificial variables ${names} still have the coefficient M in the objective row, so this row is not yet in canonical form.`,
      table: tableau.snapshot(),
    });

    for (const { row } of artificialRows) {
      tableau.priceOut(row);
    }

    trace.record({
      title: "Initial Tableau",
      explanation: `M times each artificial row (${artificialRows.map(({ row }) => `row ${row + 1}`).join(", ")}) is subtracted from the objective row, so every basic column is a unit vector. The M part of the objective-row RHS, ${formatNumber(tableau.penaltyValue())}, is minus the total artificial value.`,
      table: tableau.snapshot(),
    });
  }

  const limit = iterationLimit ?? defaultIterationLimit(form.columns.length, form.rows.length);
  const outcome = runPivotLoop(tableau, trace, limit);

  switch (outcome.kind) {
    case "optimal":
      return finishOptimal(problem, tableau, trace, "big-m", tolerance);
    case "infeasible":
      return infeasibleResult(tableau, trace);
    case "unbounded":
      return unboundedResult(tableau, outcome.column, trace, "big-m");
    case "iteration-limit":
      return iterationLimitResult(outcome.pivots, trace, "big-m");
  }
}

function infeasibleResult(tableau: Tableau, trace: StepTrace): Result {
  const remaining = tableau.columns
    .map((column, index) => ({ column, value: tableau.valueOf(index) }))
    .filter(({ column, value }) => column.kind === "artificial" && value > 0);
  const listing = remaining
    .map(({ column, value }) => `${column.label} = ${formatNumber(value)}`)
    .join(", ");
  const plural = remaining.length > 1;

  trace.record({
    title: "Artificial Variables Remain",
    explanation: `No column can lower the M part of the objective any further, but ${listing} ${plural ? "are" : "is"} still basic with a positive value. No choice of the decision variables satisfies every constraint, so the problem is infeasible.`,
    table: tableau.snapshot(),
  });

  return {
    status: "infeasible",
    method: "big-m",
    message: `The problem is infeasible: artificial variable${plural ? "s" : ""} ${listing} cannot be driven out of the basis.`,
    steps: trace.toArray(),
  };
}
