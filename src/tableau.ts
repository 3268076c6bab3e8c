import type { TableauSnapshot } from "./trace.js";

/**
 * A tableau column. Decision columns remember which problem variable they stand for; a free
 * variable is split into two decision columns with opposite signs.
 */
export type Column =
  | { readonly kind: "decision"; readonly label: string; readonly variable: number; readonly sign: 1 | -1 }
  | { readonly kind: "slack" | "surplus" | "artificial"; readonly label: string; readonly row: number };

export interface RatioEntry {
  readonly row: number;
  readonly rhs: number;
  readonly coefficient: number;
  readonly ratio: number;
}

export interface RatioTest {
  /** Row that leaves the basis, or undefined when the entering column has no positive entry */
  readonly row: number | undefined;
  readonly ratios: readonly RatioEntry[];
}

// Snapshots should never show -0.
function positiveZero(value: number): number {
  return value === 0 ? 0 : value;
}

/**
 * Dense simplex tableau: one row per constraint followed by the objective row, one column per
 * variable followed by the right-hand side. The objective row holds reduced costs of the
 * maximization form, so a negative entry marks an improving column.
 *
 * With artificial variables the objective row is split in two: the penalty row holds the
 * coefficients of a symbolic M, the objective row the plain numbers. A reduced cost `pM + c` is
 * negative when `p` is, or when `p` is zero and `c` is.
 *
 * Every basic column is a unit vector (1 in its row, 0 elsewhere including both objective rows)
 * once the objective rows have been priced out, and {@link Tableau.pivot} keeps it that way.
 */
export class Tableau {
  private readonly grid: number[][];
  private readonly basis: number[];
  private readonly penaltyIndex: number | undefined;

  constructor(
    readonly columns: readonly Column[],
    rows: readonly (readonly number[])[],
    objectiveRow: readonly number[],
    basis: readonly number[],
    private readonly tolerance: number,
    penaltyRow?: readonly number[],
  ) {
    const width = columns.length + 1;
    if (rows.length !== basis.length) {
      throw new Error(`Tableau has ${rows.length} rows but ${basis.length} basic variables`);
    }
    const objectiveRows = penaltyRow ? [objectiveRow, penaltyRow] : [objectiveRow];
    for (const row of [...rows, ...objectiveRows]) {
      if (row.length !== width) {
        throw new Error(`Tableau row has ${row.length} entries but expected ${width}`);
      }
    }

    this.grid = [...rows, ...objectiveRows].map((row) => row.map(positiveZero));
    this.basis = [...basis];
    this.penaltyIndex = penaltyRow ? basis.length + 1 : undefined;
  }

  /** Number of constraint rows (the objective row is not counted) */
  get rowCount(): number {
    return this.basis.length;
  }

  private get objectiveIndex(): number {
    return this.basis.length;
  }

  private get rhsIndex(): number {
    return this.columns.length;
  }

  entry(row: number, column: number): number {
    return this.grid[row][column];
  }

  rhs(row: number): number {
    return this.grid[row][this.rhsIndex];
  }

  reducedCost(column: number): number {
    return this.grid[this.objectiveIndex][column];
  }

  /** Coefficient of M in the reduced cost of `column`; zero without a penalty row */
  penaltyCost(column: number): number {
    return this.penaltyIndex === undefined ? 0 : this.grid[this.penaltyIndex][column];
  }

  /** Objective value of the current basic solution, in the maximization form */
  objectiveValue(): number {
    return this.grid[this.objectiveIndex][this.rhsIndex];
  }

  /** Coefficient of M in the objective value: minus the sum of the artificial variables */
  penaltyValue(): number {
    return this.penaltyIndex === undefined ? 0 : this.grid[this.penaltyIndex][this.rhsIndex];
  }

  /**
   * True when no column can lower the M part of the objective but the artificial variables
   * still sum to a positive value, so no point satisfies every constraint.
   */
  hasInfeasiblePenalty(): boolean {
    if (this.penaltyIndex === undefined) return false;
    const lowers = this.columns.some((_, column) => this.penaltyCost(column) < -this.tolerance);
    return !lowers && this.penaltyValue() < -this.tolerance;
  }

  basicColumn(row: number): number {
    return this.basis[row];
  }

  basicRow(column: number): number | undefined {
    const row = this.basis.indexOf(column);
    return row === -1 ? undefined : row;
  }

  label(column: number): string {
    return this.columns[column].label;
  }

  /** Value of a variable in the current basic solution; non-basic variables are zero */
  valueOf(column: number): number {
    const row = this.basicRow(column);
    return row === undefined ? 0 : this.rhs(row);
  }

  /**
   * Subtracts multiples of `row` from the objective rows so that the basic column of `row` has
   * a zero reduced cost.
   */
  priceOut(row: number): void {
    const column = this.basis[row];
    for (const target of [this.objectiveIndex, this.penaltyIndex]) {
      if (target === undefined) continue;
      const factor = this.grid[target][column];
      if (factor !== 0) {
        this.subtractRow(target, row, factor);
      }
    }
  }

  /**
   * Column with the most negative reduced cost, comparing the M part first, ties going to the
   * lowest index. Undefined when no reduced cost is negative, i.e. the tableau is optimal.
   */
  enteringColumn(): number | undefined {
    let best: number | undefined;
    for (let column = 0; column < this.columns.length; column++) {
      if (this.improves(column) && (best === undefined || this.cheaper(column, best))) {
        best = column;
      }
    }
    return best;
  }

  private improves(column: number): boolean {
    const penalty = this.penaltyCost(column);
    return (
      penalty < -this.tolerance ||
      (penalty <= this.tolerance && this.reducedCost(column) < -this.tolerance)
    );
  }

  private cheaper(column: number, than: number): boolean {
    const penalty = this.penaltyCost(column);
    const other = this.penaltyCost(than);
    if (Math.abs(penalty - other) > this.tolerance) return penalty < other;
    return this.reducedCost(column) < this.reducedCost(than);
  }

  /**
   * Minimum-ratio test over rows with a positive entry in `column`. Ratios within the tolerance
   * of the minimum count as ties and go to the lowest row.
   */
  ratioTest(column: number): RatioTest {
    const ratios: RatioEntry[] = [];
    let best: RatioEntry | undefined;

    for (let row = 0; row < this.rowCount; row++) {
      const coefficient = this.entry(row, column);
      if (coefficient <= this.tolerance) continue;

      const entry = { row, rhs: this.rhs(row), coefficient, ratio: this.rhs(row) / coefficient };
      ratios.push(entry);
      if (best === undefined || entry.ratio < best.ratio - this.tolerance) {
        best = entry;
      }
    }

    return { row: best?.row, ratios };
  }

  /**
   * Makes `column` basic in `row`: divides the row by the pivot element, then eliminates the
   * column from every other row including the objective rows.
   */
  pivot(row: number, column: number): void {
    const element = this.grid[row][column];
    if (Math.abs(element) <= this.tolerance) {
      throw new Error(`Pivot element at row ${row}, column ${column} is zero`);
    }

    this.grid[row] = this.grid[row].map((value) => this.clean(value / element));
    for (let other = 0; other < this.grid.length; other++) {
      if (other === row) continue;
      const factor = this.grid[other][column];
      if (factor !== 0) {
        this.subtractRow(other, row, factor);
      }
    }

    this.basis[row] = column;
  }

  snapshot(pivot?: { row: number; column: number }): TableauSnapshot {
    return {
      columns: [...this.columns.map((column) => column.label), "RHS"],
      basis: this.basis.map((column) => this.columns[column].label),
      rows: this.grid.slice(0, this.objectiveIndex + 1).map((row) => [...row]),
      ...(this.penaltyIndex !== undefined ? { penaltyRow: [...this.grid[this.penaltyIndex]] } : {}),
      ...(pivot ? { pivot: { ...pivot } } : {}),
    };
  }

  private subtractRow(target: number, source: number, factor: number): void {
    const sourceRow = this.grid[source];
    this.grid[target] = this.grid[target].map((value, index) =>
      this.clean(value - factor * sourceRow[index]),
    );
  }

  private clean(value: number): number {
    return Math.abs(value) <= this.tolerance ? 0 : value;
  }
}
