export { ValidationError } from "./errors.js";
export {
  normalize,
  parseProblem,
  type Constraint,
  type ConstraintInput,
  type Direction,
  type Problem,
  type Relation,
} from "./problem.js";
export type { SolverOptions } from "./options.js";
export type { NonOptimalResult, OptimalResult, Result, SolveMethod, SolveStatus } from "./result.js";
export type { GeometrySnapshot, PlotLine, PlotPoint, Step, TableauSnapshot } from "./trace.js";
export { solveSimplex } from "./simplex.js";
export { solveBigM } from "./big-m.js";
export { solveGraphical } from "./graphical.js";
export { applicableMethods, recommendMethod, solve } from "./solve.js";
export { encode } from "./encode.js";
export type { ReferenceSolution } from "./decode.js";
export { compareWithReference, solveReference, type Comparison } from "./reference.js";
export { createServer } from "./server.js";
