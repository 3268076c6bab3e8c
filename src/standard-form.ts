import { ValidationError } from "./errors.js";
import type { Constraint, Problem, Relation } from "./problem.js";
import { Tableau, type Column } from "./tableau.js";
import { formatLinear, formatNumber } from "./trace.js";

/** A constraint after its right-hand side has been made non-negative. */
export interface OrientedConstraint extends Constraint {
  /** True when the row was multiplied by -1 */
  readonly flipped: boolean;
}

/**
 * The equality form of a problem: every column of the future tableau, the constraint rows
 * (coefficients then RHS), the maximization-form cost of each column and the starting basis.
 * The cost of a column is `penalties[j]·M + costs[j]` for a symbolic M.
 */
export interface StandardForm {
  readonly columns: readonly Column[];
  readonly rows: readonly (readonly number[])[];
  readonly costs: readonly number[];
  /** -1 for artificial columns, 0 elsewhere */
  readonly penalties: readonly number[];
  readonly basis: readonly number[];
}

const FLIPPED: Record<Relation, Relation> = { "<=": ">=", ">=": "<=", "=": "=" };

export function orient(constraint: Constraint): OrientedConstraint {
  if (constraint.rhs >= 0) {
    return { ...constraint, flipped: false };
  }
  return {
    coefficients: constraint.coefficients.map((c) => -c),
    relation: FLIPPED[constraint.relation],
    rhs: -constraint.rhs,
    flipped: true,
  };
}

/**
 * True when some constraint is `>=` or `=` once its right-hand side is non-negative, so the
 * slack variables alone cannot form a feasible starting basis.
 */
export function needsArtificialVariables(problem: Problem): boolean {
  return problem.constraints.some((constraint) => orient(constraint).relation !== "<=");
}

function decisionColumns(problem: Problem): Column[] {
  return problem.variableNames.flatMap((name, variable): Column[] =>
    problem.nonNegative
      ? [{ kind: "decision", label: name, variable, sign: 1 }]
      : [
          { kind: "decision", label: `${name}+`, variable, sign: 1 },
          { kind: "decision", label: `${name}-`, variable, sign: -1 },
        ],
  );
}

/**
 * Converts a problem to equality form. A `<=` row gets a slack `s<i>`, a `>=` row a surplus
 * `e<i>` and an artificial `a<i>`, an `=` row an artificial only.
 *
 * @param withArtificial - allow artificial variables, each with a cost of -M. Without them only
 * `<=` rows (after RHS normalization) are accepted.
 * @throws {ValidationError} when artificial variables are needed but not allowed
 */
export function standardize(problem: Problem, withArtificial = false): StandardForm {
  const oriented = problem.constraints.map(orient);

  if (!withArtificial) {
    const offending = oriented.findIndex((constraint) => constraint.relation !== "<=");
    if (offending !== -1) {
      throw new ValidationError(
        `Constraint ${offending + 1} is a '${oriented[offending].relation}' constraint after making its right-hand side non-negative; the simplex method needs every constraint in '<=' form, use the big-m method instead`,
      );
    }
  }

  const columns: Column[] = decisionColumns(problem);

  oriented.forEach((constraint, row) => {
    if (constraint.relation === "<=") {
      columns.push({ kind: "slack", label: `s${row + 1}`, row });
    } else if (constraint.relation === ">=") {
      columns.push({ kind: "surplus", label: `e${row + 1}`, row });
    }
  });
  oriented.forEach((constraint, row) => {
    if (constraint.relation !== "<=") {
      columns.push({ kind: "artificial", label: `a${row + 1}`, row });
    }
  });

  const rows = oriented.map((constraint, row) => [
    ...columns.map((column) => {
      switch (column.kind) {
        case "decision":
          return constraint.coefficients[column.variable] * column.sign;
        case "slack":
        case "artificial":
          return column.row === row ? 1 : 0;
        case "surplus":
          return column.row === row ? -1 : 0;
      }
    }),
    constraint.rhs,
  ]);

  const sense = problem.direction === "maximize" ? 1 : -1;
  const costs = columns.map((column) => {
    return column.kind === "decision" ? sense * problem.objective[column.variable] * column.sign : 0;
  });
  const penalties = columns.map((column) => (column.kind === "artificial" ? -1 : 0));

  const basis = oriented.map((constraint, row) =>
    columns.findIndex(
      (column) =>
        column.kind !== "decision" &&
        column.kind === (constraint.relation === "<=" ? "slack" : "artificial") &&
        column.row === row,
    ),
  );

  return { columns, rows, costs, penalties, basis };
}

export function hasArtificialColumns(form: StandardForm): boolean {
  return form.columns.some((column) => column.kind === "artificial");
}

/**
 * Builds the starting tableau. The objective row holds the negated costs and, with artificial
 * columns, a penalty row the negated M coefficients; basic artificial columns still carry their
 * penalty and must be priced out before pivoting.
 */
export function toTableau(form: StandardForm, tolerance: number): Tableau {
  const negate = (value: number) => (value === 0 ? 0 : -value);
  const objectiveRow = [...form.costs.map(negate), 0];
  const penaltyRow = hasArtificialColumns(form) ? [...form.penalties.map(negate), 0] : undefined;
  return new Tableau(form.columns, form.rows, objectiveRow, form.basis, tolerance, penaltyRow);
}

/**
 * Prose for the "Standard Form" step: how the objective is read and what each constraint
 * became.
 */
export function describeStandardForm(problem: Problem, form: StandardForm): string {
  const objective = formatLinear(
    problem.objective.map((coefficient, i) => ({ coefficient, label: problem.variableNames[i] })),
  );
  const lines: string[] = [];

  if (problem.direction === "maximize") {
    lines.push(`Maximize Z = ${objective}.`);
  } else {
    const negated = formatLinear(
      problem.objective.map((coefficient, i) => ({
        coefficient: -coefficient,
        label: problem.variableNames[i],
      })),
    );
    lines.push(`Minimize Z = ${objective}, solved as maximize -Z = ${negated}.`);
  }

  if (!problem.nonNegative) {
    for (const name of problem.variableNames) {
      lines.push(`${name} is unrestricted in sign, so ${name} = ${name}+ - ${name}-.`);
    }
  }

  problem.constraints.forEach((constraint, row) => {
    const oriented = orient(constraint);
    if (oriented.flipped) {
      lines.push(
        `Constraint ${row + 1} has a negative right-hand side, so it is multiplied by -1 and becomes '${oriented.relation}'.`,
      );
    }

    const terms = form.columns.map((column, index) => ({
      coefficient: form.rows[row][index],
      label: column.label,
    }));
    const added = form.columns.filter((column) => column.kind !== "decision" && column.row === row);
    const roles = added.map((column) => `${column.kind} ${column.label}`).join(", ");
    lines.push(
      `Constraint ${row + 1}: ${formatLinear(terms)} = ${formatNumber(oriented.rhs)} (${roles}).`,
    );
  });

  if (hasArtificialColumns(form)) {
    lines.push(
      "Artificial variables carry a cost of -M, where M is larger than any number it is compared with, so any optimal basis drives them to zero when the problem is feasible.",
    );
  }

  return lines.join("\n");
}
