import { ValidationError } from "./errors.js";
import type { Problem, Relation } from "./problem.js";
import { resolveOptions, type SolverOptions } from "./options.js";
import type { Result } from "./result.js";
import { StepTrace, formatLinear, formatNumber, type PlotLine, type PlotPoint } from "./trace.js";

/** A constraint of the plane, `a·x + b·y (relation) rhs`. */
interface Boundary {
  readonly label: string;
  readonly a: number;
  readonly b: number;
  readonly relation: Relation;
  readonly rhs: number;
  readonly axis: boolean;
}

interface Candidate {
  x: number;
  y: number;
  lines: string[];
}

interface Corner {
  readonly x: number;
  readonly y: number;
  readonly lines: readonly string[];
  readonly objectiveValue: number;
}

function boundariesOf(problem: Problem): Boundary[] {
  const [xName, yName] = problem.variableNames;
  const boundaries: Boundary[] = problem.constraints.map((constraint, index) => ({
    label: `C${index + 1}`,
    a: constraint.coefficients[0],
    b: constraint.coefficients[1],
    relation: constraint.relation,
    rhs: constraint.rhs,
    axis: false,
  }));

  if (problem.nonNegative) {
    boundaries.push(
      { label: `${xName} = 0`, a: 1, b: 0, relation: ">=", rhs: 0, axis: true },
      { label: `${yName} = 0`, a: 0, b: 1, relation: ">=", rhs: 0, axis: true },
    );
  }

  return boundaries;
}

function satisfies(boundary: Boundary, x: number, y: number, tolerance: number): boolean {
  const lhs = boundary.a * x + boundary.b * y;
  const slack = tolerance * Math.max(1, Math.abs(boundary.rhs));
  switch (boundary.relation) {
    case "<=":
      return lhs <= boundary.rhs + slack;
    case ">=":
      return lhs >= boundary.rhs - slack;
    case "=":
      return Math.abs(lhs - boundary.rhs) <= slack;
  }
}

// A direction d is a recession direction when moving along it never breaks a constraint,
// i.e. it satisfies every constraint with the right-hand side set to zero.
function isRecessionDirection(boundary: Boundary, dx: number, dy: number, tolerance: number): boolean {
  const lhs = boundary.a * dx + boundary.b * dy;
  const slack = tolerance * Math.max(1, Math.hypot(boundary.a, boundary.b));
  switch (boundary.relation) {
    case "<=":
      return lhs <= slack;
    case ">=":
      return lhs >= -slack;
    case "=":
      return Math.abs(lhs) <= slack;
  }
}

function cleanZero(value: number, tolerance: number): number {
  return Math.abs(value) <= tolerance ? 0 : value;
}

function formatPoint(x: number, y: number): string {
  return `(${formatNumber(x)}, ${formatNumber(y)})`;
}

function describeLine(boundary: Boundary, names: readonly string[]): string {
  const lhs = formatLinear([
    { coefficient: boundary.a, label: names[0] },
    { coefficient: boundary.b, label: names[1] },
  ]);
  return `${lhs} = ${formatNumber(boundary.rhs)}`;
}

/**
 * Pairwise intersections of the boundary lines in enumeration order. Parallel pairs are
 * skipped; points that coincide are merged into the first one found.
 */
function intersections(lines: readonly Boundary[], tolerance: number, mergeTolerance: number): Candidate[] {
  const candidates: Candidate[] = [];

  for (let i = 0; i < lines.length; i++) {
    for (let j = i + 1; j < lines.length; j++) {
      const p = lines[i];
      const q = lines[j];
      const det = p.a * q.b - q.a * p.b;
      if (Math.abs(det) <= tolerance * Math.hypot(p.a, p.b) * Math.hypot(q.a, q.b)) continue;

      const x = cleanZero((p.rhs * q.b - q.rhs * p.b) / det, tolerance);
      const y = cleanZero((p.a * q.rhs - q.a * p.rhs) / det, tolerance);

      const same = (u: number, v: number) => Math.abs(u - v) <= mergeTolerance * Math.max(1, Math.abs(u));
      const existing = candidates.find((candidate) => same(candidate.x, x) && same(candidate.y, y));
      if (existing) {
        for (const label of [p.label, q.label]) {
          if (!existing.lines.includes(label)) existing.lines.push(label);
        }
      } else {
        candidates.push({ x, y, lines: [p.label, q.label] });
      }
    }
  }

  return candidates;
}

/**
 * Points that lie on the region when it has no corner at all (free variables and a region that
 * contains a whole line): the origin and the point of each line closest to the origin.
 */
function anchorPoints(lines: readonly Boundary[]): Candidate[] {
  return [
    { x: 0, y: 0, lines: [] },
    ...lines.map((line) => {
      const scale = line.rhs / (line.a * line.a + line.b * line.b);
      return { x: line.a * scale, y: line.b * scale, lines: [line.label] };
    }),
  ];
}

/**
 * Looks for a recession direction of the region along which the objective improves. In the
 * plane the recession cone is spanned by directions along the boundary lines and the axes, or
 * contains the improving direction itself, so checking those candidates is exhaustive.
 */
function improvingDirection(
  boundaries: readonly Boundary[],
  lines: readonly Boundary[],
  improving: readonly [number, number],
  tolerance: number,
): [number, number] | undefined {
  const length = Math.hypot(improving[0], improving[1]);
  if (length <= tolerance) return undefined;

  const candidates: [number, number][] = [
    ...lines.flatMap((line): [number, number][] => [
      [-line.b, line.a],
      [line.b, -line.a],
    ]),
    [1, 0],
    [-1, 0],
    [0, 1],
    [0, -1],
    [improving[0], improving[1]],
  ];

  for (const [dx, dy] of candidates) {
    const norm = Math.hypot(dx, dy);
    if (norm <= tolerance) continue;
    const ux = dx / norm;
    const uy = dy / norm;

    const gain = (improving[0] * ux + improving[1] * uy) / length;
    if (gain <= tolerance) continue;
    if (boundaries.every((boundary) => isRecessionDirection(boundary, ux, uy, tolerance))) {
      return [cleanZero(ux, tolerance), cleanZero(uy, tolerance)];
    }
  }

  return undefined;
}

/**
 * Solves a two-variable problem by enumerating the corner points of the feasible region and
 * evaluating the objective at each.
 *
 * @throws {ValidationError} when the problem does not have exactly 2 variables, or an option is
 * out of range
 */
export function solveGraphical(problem: Problem, options: SolverOptions = {}): Result {
  if (problem.objective.length !== 2) {
    throw new ValidationError(
      `The graphical method needs exactly 2 variables, but the problem has ${problem.objective.length}`,
    );
  }

  const { tolerance, feasibilityTolerance } = resolveOptions(options);
  const names = problem.variableNames;
  const [c1, c2] = problem.objective;
  const maximize = problem.direction === "maximize";
  const trace = new StepTrace();

  const boundaries = boundariesOf(problem);
  const lines = boundaries.filter((boundary) => Math.hypot(boundary.a, boundary.b) > tolerance);
  const plotLines: PlotLine[] = lines.map((line) => ({
    label: line.label,
    coefficients: [line.a, line.b],
    relation: line.relation,
    rhs: line.rhs,
    axis: line.axis,
  }));

  trace.record({
    title: "Constraint Lines",
    explanation: [
      "Each constraint is drawn as the line where it holds with equality:",
      ...lines
        .filter((line) => !line.axis)
        .map((line) => `${line.label}: ${describeLine(line, names)} (feasible side: '${line.relation}').`),
      ...(problem.nonNegative
        ? [`The sign restrictions ${names[0]} >= 0 and ${names[1]} >= 0 add the two axes.`]
        : []),
    ].join("\n"),
    geometry: { lines: plotLines, points: [] },
  });

  const objectiveAt = (x: number, y: number) => cleanZero(c1 * x + c2 * y, tolerance);
  const isFeasible = (x: number, y: number) =>
    boundaries.every((boundary) => satisfies(boundary, x, y, feasibilityTolerance));

  const candidates = intersections(lines, tolerance, feasibilityTolerance);
  const points: PlotPoint[] = candidates.map((candidate) => {
    const feasible = isFeasible(candidate.x, candidate.y);
    return {
      x: candidate.x,
      y: candidate.y,
      feasible,
      lines: candidate.lines,
      ...(feasible ? { objectiveValue: objectiveAt(candidate.x, candidate.y) } : {}),
    };
  });

  let corners: Corner[] = candidates
    .filter((candidate) => isFeasible(candidate.x, candidate.y))
    .map((candidate) => ({ ...candidate, objectiveValue: objectiveAt(candidate.x, candidate.y) }));

  trace.record({
    title: "Corner Points",
    explanation:
      candidates.length === 0
        ? "No two boundary lines intersect."
        : candidates
            .map(
              (candidate, index) =>
                `${formatPoint(candidate.x, candidate.y)} from ${candidate.lines.join(" and ")}: ${points[index].feasible ? "feasible corner point" : "violates a constraint"}.`,
            )
            .join("\n"),
    geometry: { lines: plotLines, points },
  });

  if (corners.length === 0 && !problem.nonNegative) {
    const anchors = anchorPoints(lines)
      .filter((anchor) => isFeasible(anchor.x, anchor.y))
      .map((anchor) => ({
        x: cleanZero(anchor.x, tolerance),
        y: cleanZero(anchor.y, tolerance),
        lines: anchor.lines,
        objectiveValue: objectiveAt(anchor.x, anchor.y),
      }));

    if (anchors.length > 0) {
      trace.record({
        title: "Region Without Corners",
        explanation: `No intersection is feasible, but ${anchors.map((anchor) => formatPoint(anchor.x, anchor.y)).join(", ")} satisfy every constraint. The region contains a whole line and has no corner point, so these boundary points are evaluated instead.`,
        geometry: {
          lines: plotLines,
          points: anchors.map((anchor) => ({ ...anchor, feasible: true })),
        },
      });
      corners = anchors;
    }
  }

  if (corners.length === 0) {
    trace.record({
      title: "Empty Feasible Region",
      explanation: "No candidate point satisfies every constraint, so the feasible region is empty.",
      geometry: { lines: plotLines, points },
    });
    return {
      status: "infeasible",
      method: "graphical",
      message: "The problem is infeasible: no point satisfies every constraint.",
      steps: trace.toArray(),
    };
  }

  const sense = maximize ? 1 : -1;
  const direction = improvingDirection(boundaries, lines, [sense * c1, sense * c2], tolerance);
  if (direction) {
    const shown = formatPoint(direction[0], direction[1]);
    trace.record({
      title: "Unbounded Region",
      explanation: `The feasible region extends forever in the direction ${shown}, and moving that way ${maximize ? "increases" : "decreases"} Z without limit.`,
      geometry: {
        lines: plotLines,
        points: corners.map((corner) => ({ ...corner, feasible: true })),
        direction,
      },
    });
    return {
      status: "unbounded",
      method: "graphical",
      message: `The objective is unbounded: Z ${maximize ? "increases" : "decreases"} without limit along the direction ${shown}.`,
      steps: trace.toArray(),
    };
  }

  let best = corners[0];
  for (const corner of corners) {
    const where =
      corner.lines.length === 0 ? "The origin" : `The point on ${corner.lines.join(" and ")}`;
    trace.record({
      title: `Evaluate ${formatPoint(corner.x, corner.y)}`,
      explanation: `${where}: Z = ${formatNumber(c1)}(${formatNumber(corner.x)}) + ${formatNumber(c2)}(${formatNumber(corner.y)}) = ${formatNumber(corner.objectiveValue)}.`,
    });
    if (sense * (corner.objectiveValue - best.objectiveValue) > tolerance) {
      best = corner;
    }
  }

  const ties = corners.filter(
    (corner) => corner !== best && Math.abs(corner.objectiveValue - best.objectiveValue) <= tolerance,
  );
  const explanation = [
    `The ${maximize ? "largest" : "smallest"} objective value is Z = ${formatNumber(best.objectiveValue)} at ${formatPoint(best.x, best.y)}, so ${names[0]} = ${formatNumber(best.x)} and ${names[1]} = ${formatNumber(best.y)} is optimal.`,
    ...(ties.length > 0
      ? [
          `${ties.map((corner) => formatPoint(corner.x, corner.y)).join(", ")} ${ties.length === 1 ? "reaches" : "reach"} the same value, so every point of the edge between them is optimal too.`,
        ]
      : []),
  ].join(" ");

  trace.record({
    title: "Optimal Vertex",
    explanation,
    geometry: {
      lines: plotLines,
      points: corners.map((corner) => ({ ...corner, feasible: true })),
      optimum: { x: best.x, y: best.y },
    },
  });

  return {
    status: "optimal",
    method: "graphical",
    variables: { [names[0]]: best.x, [names[1]]: best.y },
    objectiveValue: best.objectiveValue,
    steps: trace.toArray(),
  };
}
