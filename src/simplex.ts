import type { Problem } from "./problem.js";
import { defaultIterationLimit, resolveOptions, type SolverOptions } from "./options.js";
import type { Result, SolveMethod } from "./result.js";
import { describeStandardForm, standardize, toTableau, type StandardForm } from "./standard-form.js";
import type { Tableau } from "./tableau.js";
import { StepTrace, formatLinear, formatNumber, formatPenalized } from "./trace.js";

export type LoopOutcome =
  | { kind: "optimal"; pivots: number }
  | { kind: "unbounded"; column: number; pivots: number }
  | { kind: "infeasible"; pivots: number }
  | { kind: "iteration-limit"; pivots: number };

/**
 * The simplex iteration shared by the Simplex and Big-M engines: choose the entering column,
 * run the ratio test, pivot, record the step, until the tableau is optimal, a column proves the
 * problem unbounded, or `iterationLimit` pivots have been made.
 *
 * With a penalty row the loop stops as `infeasible` as soon as the M part of the objective can
 * no longer be lowered while artificial variables are positive, before any column is judged
 * unbounded.
 */
export function runPivotLoop(tableau: Tableau, trace: StepTrace, iterationLimit: number): LoopOutcome {
  let pivots = 0;

  for (;;) {
    if (tableau.hasInfeasiblePenalty()) {
      return { kind: "infeasible", pivots };
    }

    const column = tableau.enteringColumn();
    if (column === undefined) {
      return { kind: "optimal", pivots };
    }

    const entering = tableau.label(column);
    const cost = formatPenalized(tableau.penaltyCost(column), tableau.reducedCost(column));

    if (pivots >= iterationLimit) {
      trace.record({
        title: "Iteration Limit",
        explanation: `${pivots} pivots were made and ${entering} can still improve the objective (reduced cost ${cost}). The solve stops here; the problem is probably cycling on a degenerate basis.`,
        table: tableau.snapshot(),
      });
      return { kind: "iteration-limit", pivots };
    }

    const { row, ratios } = tableau.ratioTest(column);
    if (row === undefined) {
      trace.record({
        title: "Unbounded Direction",
        explanation: `${entering} has reduced cost ${cost}, but no entry in its column is positive. ${entering} can increase without limit while every constraint stays satisfied, so the objective is unbounded.`,
        table: tableau.snapshot(),
      });
      return { kind: "unbounded", column, pivots };
    }

    const leaving = tableau.label(tableau.basicColumn(row));
    const element = formatNumber(tableau.entry(row, column));
    const ratioText = ratios
      .map(
        (entry) =>
          `${tableau.label(tableau.basicColumn(entry.row))}: ${formatNumber(entry.rhs)} / ${formatNumber(entry.coefficient)} = ${formatNumber(entry.ratio)}`,
      )
      .join(", ");

    tableau.pivot(row, column);
    pivots += 1;

    trace.record({
      title: `Pivot: enter ${entering}, leave ${leaving}`,
      explanation: [
        `${entering} has the most negative objective-row coefficient (${cost}), so it enters the basis.`,
        `Ratio test: ${ratioText}.`,
        `${leaving} has the smallest ratio and leaves the basis.`,
        `The pivot element ${element} (row ${row + 1}, column ${entering}) is scaled to 1 and the rest of its column is eliminated.`,
      ].join(" "),
      table: tableau.snapshot({ row, column }),
    });
  }
}

export interface Solution {
  /** Decision variable values in problem order */
  values: number[];
  objectiveValue: number;
}

/**
 * Reads decision variables from the RHS of their basic rows (zero when non-basic) and
 * substitutes them into the original objective.
 */
export function readSolution(problem: Problem, tableau: Tableau, tolerance: number): Solution {
  const values = problem.objective.map(() => 0);

  tableau.columns.forEach((column, index) => {
    if (column.kind === "decision") {
      values[column.variable] += column.sign * tableau.valueOf(index);
    }
  });

  const clean = (value: number) => (Math.abs(value) <= tolerance ? 0 : value);
  const cleaned = values.map(clean);
  const objectiveValue = clean(
    problem.objective.reduce((sum, coefficient, i) => sum + coefficient * cleaned[i], 0),
  );

  return { values: cleaned, objectiveValue };
}

/**
 * Records the final step of a tableau solve and builds the optimal result.
 */
export function finishOptimal(
  problem: Problem,
  tableau: Tableau,
  trace: StepTrace,
  method: SolveMethod,
  tolerance: number,
): Result {
  const { values, objectiveValue } = readSolution(problem, tableau, tolerance);

  const assignments = problem.variableNames
    .map((name, i) => `${name} = ${formatNumber(values[i])}`)
    .join(", ");
  const substitution = problem.objective
    .map((coefficient, i) => `${formatNumber(coefficient)}(${formatNumber(values[i])})`)
    .join(" + ");
  const lines = [
    "No objective-row coefficient is negative, so the current basis is optimal.",
    `${assignments}.`,
    `Z = ${substitution} = ${formatNumber(objectiveValue)}.`,
  ];

  const degenerate = Array.from({ length: tableau.rowCount }, (_, row) => row).filter(
    (row) => Math.abs(tableau.rhs(row)) <= tolerance,
  );
  if (degenerate.length > 0) {
    const names = degenerate.map((row) => tableau.label(tableau.basicColumn(row))).join(", ");
    lines.push(
      degenerate.length === 1
        ? `The solution is degenerate: basic variable ${names} is zero.`
        : `The solution is degenerate: basic variables ${names} are zero.`,
    );
  }

  // The twin of a basic split column always has a zero reduced cost without moving x itself.
  const isTwinOfBasic = (index: number) => {
    const column = tableau.columns[index];
    return (
      column.kind === "decision" &&
      tableau.columns.some(
        (other, otherIndex) =>
          other.kind === "decision" &&
          other.variable === column.variable &&
          otherIndex !== index &&
          tableau.basicRow(otherIndex) !== undefined,
      )
    );
  };
  const alternatives = tableau.columns
    .map((column, index) => ({ column, index }))
    .filter(
      ({ column, index }) =>
        column.kind !== "artificial" &&
        tableau.basicRow(index) === undefined &&
        Math.abs(tableau.reducedCost(index)) <= tolerance &&
        Math.abs(tableau.penaltyCost(index)) <= tolerance &&
        !isTwinOfBasic(index),
    );
  if (alternatives.length > 0) {
    const names = alternatives.map(({ column }) => column.label).join(", ");
    lines.push(
      `Non-basic ${names} has a zero objective-row coefficient, so other optimal solutions with the same Z exist.`,
    );
  }

  trace.record({ title: "Optimal Solution", explanation: lines.join(" "), table: tableau.snapshot() });

  return {
    status: "optimal",
    method,
    variables: Object.fromEntries(problem.variableNames.map((name, i) => [name, values[i]])),
    objectiveValue,
    steps: trace.toArray(),
  };
}

export function unboundedResult(tableau: Tableau, column: number, trace: StepTrace, method: SolveMethod): Result {
  return {
    status: "unbounded",
    method,
    message: `The objective is unbounded: ${tableau.label(column)} can increase without limit.`,
    steps: trace.toArray(),
  };
}

export function iterationLimitResult(pivots: number, trace: StepTrace, method: SolveMethod): Result {
  return {
    status: "error",
    method,
    message: `Iteration limit exceeded after ${pivots} pivots`,
    steps: trace.toArray(),
  };
}

export function describeInitialTableau(form: StandardForm): string {
  const basis = form.basis.map((column) => form.columns[column].label).join(", ");
  const equation = formatLinear([
    { coefficient: 1, label: "Z" },
    ...form.costs.map((cost, index) => ({ coefficient: -cost, label: form.columns[index].label })),
    ...form.penalties.map((penalty, index) => ({
      coefficient: -penalty,
      label: `M${form.columns[index].label}`,
    })),
  ]);
  return `The objective row holds the equation ${equation} = 0. The starting basis is ${basis}, with every decision variable at zero.`;
}

/**
 * Solves a problem whose constraints are all `<=` once right-hand sides are non-negative.
 *
 * @throws {ValidationError} when a `>=` or `=` constraint remains (use the Big-M method) or an
 * option is out of range
 */
export function solveSimplex(problem: Problem, options: SolverOptions = {}): Result {
  const { tolerance, iterationLimit } = resolveOptions(options);
  const form = standardize(problem);
  const trace = new StepTrace();

  trace.record({ title: "Standard Form", explanation: describeStandardForm(problem, form) });

  const tableau = toTableau(form, tolerance);
  trace.record({
    title: "Initial Tableau",
    explanation: describeInitialTableau(form),
    table: tableau.snapshot(),
  });

  const limit = iterationLimit ?? defaultIterationLimit(form.columns.length, form.rows.length);
  const outcome = runPivotLoop(tableau, trace, limit);

  switch (outcome.kind) {
    case "optimal":
      return finishOptimal(problem, tableau, trace, "simplex", tolerance);
    case "unbounded":
      return unboundedResult(tableau, outcome.column, trace, "simplex");
    case "iteration-limit":
      return iterationLimitResult(outcome.pivots, trace, "simplex");
    case "infeasible":
      throw new Error("A tableau without artificial variables cannot stop as infeasible");
  }
}
