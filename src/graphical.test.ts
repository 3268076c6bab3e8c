import { describe, it, expect } from "vitest";
import { ValidationError } from "./errors.js";
import { solveGraphical } from "./graphical.js";
import { normalize } from "./problem.js";
import type { Result } from "./result.js";

function titles(result: Result): string[] {
  return result.steps.map((step) => step.title);
}

describe("solveGraphical", () => {
  const production = normalize("maximize", [3, 2], [
    { coefficients: [2, 1], relation: "<=", rhs: 100 },
    { coefficients: [1, 2], relation: "<=", rhs: 80 },
  ]);

  it("should evaluate every feasible corner and pick the best", () => {
    const result = solveGraphical(production);

    expect(result).toMatchObject({
      status: "optimal",
      method: "graphical",
      variables: { x1: 40, x2: 20 },
      objectiveValue: 160,
    });
    expect(titles(result)).toEqual([
      "Constraint Lines",
      "Corner Points",
      "Evaluate (40, 20)",
      "Evaluate (50, 0)",
      "Evaluate (0, 40)",
      "Evaluate (0, 0)",
      "Optimal Vertex",
    ]);
  });

  it("should describe the constraint lines", () => {
    const [lines] = solveGraphical(production).steps;

    expect(lines.explanation).toBe(
      [
        "Each constraint is drawn as the line where it holds with equality:",
        "C1: 2x1 + x2 = 100 (feasible side: '<=').",
        "C2: x1 + 2x2 = 80 (feasible side: '<=').",
        "The sign restrictions x1 >= 0 and x2 >= 0 add the two axes.",
      ].join("\n"),
    );
    expect(lines.geometry?.lines.map((line) => line.label)).toEqual([
      "C1",
      "C2",
      "x1 = 0",
      "x2 = 0",
    ]);
  });

  it("should flag infeasible intersections", () => {
    const [, corners] = solveGraphical(production).steps;

    expect(corners.geometry?.points).toEqual([
      { x: 40, y: 20, feasible: true, lines: ["C1", "C2"], objectiveValue: 160 },
      { x: 0, y: 100, feasible: false, lines: ["C1", "x1 = 0"] },
      { x: 50, y: 0, feasible: true, lines: ["C1", "x2 = 0"], objectiveValue: 150 },
      { x: 0, y: 40, feasible: true, lines: ["C2", "x1 = 0"], objectiveValue: 80 },
      { x: 80, y: 0, feasible: false, lines: ["C2", "x2 = 0"] },
      { x: 0, y: 0, feasible: true, lines: ["x1 = 0", "x2 = 0"], objectiveValue: 0 },
    ]);
  });

  it("should explain each evaluation and the optimum", () => {
    const steps = solveGraphical(production).steps;

    expect(steps[2].explanation).toBe("The point on C1 and C2: Z = 3(40) + 2(20) = 160.");
    expect(steps[6].explanation).toBe(
      "The largest objective value is Z = 160 at (40, 20), so x1 = 40 and x2 = 20 is optimal.",
    );
    expect(steps[6].geometry?.optimum).toEqual({ x: 40, y: 20 });
  });

  it("should solve a minimization problem", () => {
    const problem = normalize("minimize", [2, 3], [
      { coefficients: [1, 2], relation: ">=", rhs: 8 },
      { coefficients: [3, 1], relation: ">=", rhs: 12 },
    ]);

    const result = solveGraphical(problem);

    expect(result.status).toBe("optimal");
    if (result.status !== "optimal") return;
    expect(result.variables.x1).toBeCloseTo(3.2, 9);
    expect(result.variables.x2).toBeCloseTo(2.4, 9);
    expect(result.objectiveValue).toBeCloseTo(13.6, 9);
    expect(titles(result)).toEqual([
      "Constraint Lines",
      "Corner Points",
      "Evaluate (3.2, 2.4)",
      "Evaluate (8, 0)",
      "Evaluate (0, 12)",
      "Optimal Vertex",
    ]);
  });

  it("should report an unbounded objective with its direction", () => {
    const problem = normalize("maximize", [1, 1], [{ coefficients: [1, -1], relation: "<=", rhs: 1 }]);

    const result = solveGraphical(problem);

    expect(result).toMatchObject({
      status: "unbounded",
      message:
        "The objective is unbounded: Z increases without limit along the direction (0.7071, 0.7071).",
    });
    expect(titles(result)).toEqual(["Constraint Lines", "Corner Points", "Unbounded Region"]);
    const direction = result.steps[2].geometry?.direction;
    expect(direction?.[0]).toBeCloseTo(Math.SQRT1_2, 12);
    expect(direction?.[1]).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it("should find the optimum of an unbounded region when the objective is bounded", () => {
    const problem = normalize("minimize", [1, 1], [{ coefficients: [1, -1], relation: "<=", rhs: 1 }]);

    const result = solveGraphical(problem);

    expect(result).toMatchObject({ status: "optimal", variables: { x1: 0, x2: 0 }, objectiveValue: 0 });
  });

  it("should detect an empty feasible region", () => {
    const problem = normalize("minimize", [1, 1], [
      { coefficients: [1, 1], relation: ">=", rhs: 10 },
      { coefficients: [1, 1], relation: "<=", rhs: 5 },
    ]);

    const result = solveGraphical(problem);

    expect(result).toMatchObject({
      status: "infeasible",
      message: "The problem is infeasible: no point satisfies every constraint.",
    });
    expect(titles(result)).toEqual(["Constraint Lines", "Corner Points", "Empty Feasible Region"]);
  });

  it("should mention every optimal corner on a tied edge", () => {
    const problem = normalize("maximize", [1, 1], [{ coefficients: [1, 1], relation: "<=", rhs: 4 }]);

    const result = solveGraphical(problem);
    const final = result.steps[result.steps.length - 1];

    expect(result).toMatchObject({ status: "optimal", variables: { x1: 0, x2: 4 }, objectiveValue: 4 });
    expect(final.explanation).toBe(
      "The largest objective value is Z = 4 at (0, 4), so x1 = 0 and x2 = 4 is optimal. (4, 0) reaches the same value, so every point of the edge between them is optimal too.",
    );
  });

  it("should evaluate boundary points of a region without corners", () => {
    const problem = normalize(
      "maximize",
      [1, 1],
      [
        { coefficients: [1, 1], relation: "<=", rhs: 4 },
        { coefficients: [1, 1], relation: ">=", rhs: -2 },
      ],
      false,
    );

    const result = solveGraphical(problem);

    expect(titles(result)).toEqual([
      "Constraint Lines",
      "Corner Points",
      "Region Without Corners",
      "Evaluate (0, 0)",
      "Evaluate (2, 2)",
      "Evaluate (-1, -1)",
      "Optimal Vertex",
    ]);
    expect(result).toMatchObject({ status: "optimal", variables: { x1: 2, x2: 2 }, objectiveValue: 4 });
  });

  it("should refuse problems without exactly two variables", () => {
    const problem = normalize("maximize", [1, 1, 1], [
      { coefficients: [1, 1, 1], relation: "<=", rhs: 4 },
    ]);

    expect(() => solveGraphical(problem)).toThrow(ValidationError);
    expect(() => solveGraphical(problem)).toThrow(
      "The graphical method needs exactly 2 variables, but the problem has 3",
    );
  });
});
