import type { Relation } from "./problem.js";

/** A copy of the tableau at one point of a solve. */
export interface TableauSnapshot {
  /** Column labels, ending with `RHS` */
  readonly columns: readonly string[];
  /** Label of the basic variable of each constraint row */
  readonly basis: readonly string[];
  /** Constraint rows followed by the objective row */
  readonly rows: readonly (readonly number[])[];
  /** Coefficients of M in the objective row, when artificial variables are present */
  readonly penaltyRow?: readonly number[];
  /** Position of the pivot element used to reach this tableau */
  readonly pivot?: { readonly row: number; readonly column: number };
}

export interface PlotLine {
  readonly label: string;
  /** Coefficients of the boundary line `a1·x + a2·y = rhs` */
  readonly coefficients: readonly [number, number];
  readonly relation: Relation;
  readonly rhs: number;
  /** True for the `x = 0` and `y = 0` lines of the sign restrictions */
  readonly axis: boolean;
}

export interface PlotPoint {
  readonly x: number;
  readonly y: number;
  readonly feasible: boolean;
  /** Labels of the lines meeting at this point */
  readonly lines: readonly string[];
  readonly objectiveValue?: number;
}

/** What a renderer needs to draw the graphical method. */
export interface GeometrySnapshot {
  readonly lines: readonly PlotLine[];
  readonly points: readonly PlotPoint[];
  readonly optimum?: { readonly x: number; readonly y: number };
  /** Unit direction along which the objective improves forever */
  readonly direction?: readonly [number, number];
}

export interface Step {
  readonly title: string;
  readonly explanation: string;
  readonly table?: TableauSnapshot;
  readonly geometry?: GeometrySnapshot;
}

/**
 * Ordered, append-only record of the steps of one solve. Recorded steps are frozen, so a
 * renderer can hold on to them without seeing later changes to solver state.
 */
export class StepTrace {
  private readonly steps: Step[] = [];

  record(step: Step): void {
    deepFreeze(step);
    this.steps.push(step);
  }

  get length(): number {
    return this.steps.length;
  }

  toArray(): readonly Step[] {
    return [...this.steps];
  }
}

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  const children: unknown[] = Object.values(value);
  children.forEach(deepFreeze);
  Object.freeze(value);
}

/** Rounds for display in step prose: at most `digits` decimals, no trailing zeros, no `-0`. */
export function formatNumber(value: number, digits: number = 4): string {
  const rounded = Number(value.toFixed(digits));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/** Writes a reduced cost `pM + c`: `-4M + 2`, `M`, `-0.5`. Parts that round to zero are left out. */
export function formatPenalized(penalty: number, constant: number): string {
  const magnitude = formatNumber(Math.abs(penalty));
  if (magnitude === "0") return formatNumber(constant);

  const mPart = `${penalty < 0 ? "-" : ""}${magnitude === "1" ? "" : magnitude}M`;
  const rest = formatNumber(Math.abs(constant));
  if (rest === "0") return mPart;
  return `${mPart} ${constant < 0 ? "-" : "+"} ${rest}`;
}

/**
 * Writes `Σ coefficient·label` the way it appears in a textbook: `2x1 + x2 - s1`.
 * Zero terms are left out; an expression with no terms is `0`.
 */
export function formatLinear(terms: readonly { coefficient: number; label: string }[]): string {
  let result = "";

  for (const { coefficient, label } of terms) {
    if (coefficient === 0) continue;

    const magnitude = Math.abs(coefficient);
    const body = magnitude === 1 ? label : `${formatNumber(magnitude)}${label}`;

    if (result === "") {
      result = coefficient < 0 ? `-${body}` : body;
    } else {
      result += coefficient < 0 ? ` - ${body}` : ` + ${body}`;
    }
  }

  return result === "" ? "0" : result;
}
