import { decode, isOptimalReference, type ReferenceSolution } from "./decode.js";
import { encode } from "./encode.js";
import type { Problem } from "./problem.js";
import type { Result } from "./result.js";

interface HighsSolver {
  solve(model: string, options?: Record<string, unknown>): unknown;
}

type HighsLoader = () => Promise<unknown>;

function isHighsLoader(value: unknown): value is HighsLoader {
  return typeof value === "function";
}

function isHighsSolver(value: unknown): value is HighsSolver {
  return (
    typeof value === "object" && value !== null && "solve" in value && typeof value.solve === "function"
  );
}

function defaultExport(value: unknown): unknown {
  return typeof value === "object" && value !== null && "default" in value ? value.default : undefined;
}

let highsInstance: Promise<HighsSolver> | null = null;

// The WebAssembly module is a CommonJS default export, so depending on the loader the factory
// sits one or two `default`s deep.
async function loadHighs(): Promise<HighsSolver> {
  const imported: unknown = await import("highs");
  const loader = [defaultExport(imported), defaultExport(defaultExport(imported)), imported].find(
    isHighsLoader,
  );
  if (!loader) {
    throw new Error("The highs package does not export a loader function");
  }

  const instance = await loader();
  if (!isHighsSolver(instance)) {
    throw new Error("The highs loader did not return a solver");
  }
  return instance;
}

async function getHighsInstance(): Promise<HighsSolver> {
  if (!highsInstance) {
    highsInstance = loadHighs().catch((error: unknown) => {
      highsInstance = null;
      throw error;
    });
  }
  return highsInstance;
}

/**
 * Solves `problem` with HiGHS. The WebAssembly module is loaded on first use and shared by
 * every later call.
 */
export async function solveReference(problem: Problem): Promise<ReferenceSolution> {
  const highs = await getHighsInstance();
  return decode(highs.solve(encode(problem)), problem);
}

export interface Comparison {
  agrees: boolean;
  /** Stepwise objective value minus the reference value, when both are optimal */
  difference?: number;
}

/**
 * Compares a stepwise result with the HiGHS answer. Two optimal results agree when their
 * objective values differ by at most `tolerance`, relative to the reference magnitude once it
 * exceeds 1. Non-optimal results agree when HiGHS reports the same status, including its
 * combined "infeasible or unbounded" status.
 */
export function compareWithReference(
  result: Result,
  reference: ReferenceSolution,
  tolerance: number = 1e-6,
): Comparison {
  if (result.status === "optimal" && isOptimalReference(reference)) {
    const difference = result.objectiveValue - reference.objectiveValue;
    return {
      agrees: Math.abs(difference) <= tolerance * Math.max(1, Math.abs(reference.objectiveValue)),
      difference,
    };
  }

  if (result.status === "optimal" || result.status === "error" || isOptimalReference(reference)) {
    return { agrees: false };
  }

  return { agrees: reference.status.split("_").includes(result.status) };
}
