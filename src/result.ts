import { z } from "zod";
import { SolveMethodSchema } from "./schemas.js";
import type { Step } from "./trace.js";

export type SolveMethod = z.infer<typeof SolveMethodSchema>;

export type SolveStatus = "optimal" | "unbounded" | "infeasible" | "error";

/**
 * Result of a solve that reached an optimal point.
 */
export interface OptimalResult {
  status: "optimal";
  method: SolveMethod;
  /** Value of each decision variable, keyed by variable name */
  variables: Readonly<Record<string, number>>;
  /** Objective value in the problem's own direction */
  objectiveValue: number;
  steps: readonly Step[];
}

/**
 * Result of a solve that ended without an optimal point. Unbounded and infeasible problems are
 * normal outcomes; `error` means the iteration limit was reached.
 */
export interface NonOptimalResult {
  status: Exclude<SolveStatus, "optimal">;
  method: SolveMethod;
  /** Human-readable cause */
  message: string;
  steps: readonly Step[];
}

/**
 * Union of every solve outcome. Narrow on `status` to reach the variable values.
 */
export type Result = OptimalResult | NonOptimalResult;
