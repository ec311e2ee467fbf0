import { InvariantError, PreconditionError } from '../errors';

export type TransportProblem = {
  costs: number[][];
  supply: number[];
  demand: number[];
};

export type Cell = {
  row: number;
  col: number;
};

export type Allocation = Cell & {
  amount: number;
};

export type ValidateOptions = {
  tolerance?: number;
};

export const DEFAULT_BALANCE_TOLERANCE = 1e-2;

const sum = (values: ReadonlyArray<number>) => values.reduce((acc, value) => acc + value, 0);

const isNonNegative = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0;

export function validateProblem(problem: TransportProblem, options: ValidateOptions = {}): TransportProblem {
  const tolerance = options.tolerance ?? DEFAULT_BALANCE_TOLERANCE;
  const { costs, supply, demand } = problem;

  if (supply.length === 0) {
    throw new PreconditionError('Transportation problem requires at least one source.', 'supply');
  }
  if (demand.length === 0) {
    throw new PreconditionError('Transportation problem requires at least one destination.', 'demand');
  }
  if (costs.length !== supply.length) {
    throw new PreconditionError(
      `costs has ${costs.length} row(s); expected ${supply.length} to match supply.`,
      'costs',
    );
  }

  for (let i = 0; i < costs.length; i += 1) {
    const row = costs[i];
    if (row.length !== demand.length) {
      throw new PreconditionError(
        `costs[${i}] has ${row.length} column(s); expected ${demand.length} to match demand.`,
        `costs[${i}]`,
      );
    }
    for (let j = 0; j < row.length; j += 1) {
      if (!isNonNegative(row[j])) {
        throw new PreconditionError(`costs[${i}][${j}] must be a finite, non-negative number.`, `costs[${i}][${j}]`);
      }
    }
  }
  supply.forEach((value, i) => {
    if (!isNonNegative(value)) {
      throw new PreconditionError(`supply[${i}] must be a finite, non-negative number.`, `supply[${i}]`);
    }
  });
  demand.forEach((value, j) => {
    if (!isNonNegative(value)) {
      throw new PreconditionError(`demand[${j}] must be a finite, non-negative number.`, `demand[${j}]`);
    }
  });

  const totalSupply = sum(supply);
  const totalDemand = sum(demand);
  if (Math.abs(totalSupply - totalDemand) > tolerance) {
    throw new PreconditionError(
      `Unbalanced problem: total supply ${totalSupply} differs from total demand ${totalDemand} by more than ${tolerance}.`,
      'supply',
    );
  }

  return {
    costs: costs.map((row) => [...row]),
    supply: [...supply],
    demand: [...demand],
  };
}

export function allocationCost(costs: ReadonlyArray<ReadonlyArray<number>>, allocations: Iterable<Allocation>): number {
  let total = 0;
  for (const { row, col, amount } of allocations) {
    total += (costs[row]?.[col] ?? 0) * amount;
  }
  return total;
}

export function toAllocationMatrix(rows: number, cols: number, allocations: Iterable<Allocation>): number[][] {
  const matrix = Array.from({ length: rows }, () => Array<number>(cols).fill(0));
  for (const { row, col, amount } of allocations) {
    matrix[row][col] += amount;
  }
  return matrix;
}

export type FeasibilityReport = {
  ok: boolean;
  errors: string[];
};

export function checkFeasibility(
  problem: TransportProblem,
  allocations: ReadonlyArray<Allocation>,
  tolerance = 1e-6,
): FeasibilityReport {
  const errors: string[] = [];
  const rows = problem.supply.length;
  const cols = problem.demand.length;
  const shipped = Array<number>(rows).fill(0);
  const received = Array<number>(cols).fill(0);

  for (const { row, col, amount } of allocations) {
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || row >= rows || col >= cols) {
      errors.push(`Cell (${row}, ${col}) is outside the ${rows}x${cols} table.`);
      continue;
    }
    if (!isNonNegative(amount)) {
      errors.push(`Cell (${row}, ${col}) carries an invalid amount ${amount}.`);
      continue;
    }
    shipped[row] += amount;
    received[col] += amount;
  }

  shipped.forEach((value, i) => {
    if (Math.abs(value - problem.supply[i]) > tolerance) {
      errors.push(`Row ${i} ships ${value} but supplies ${problem.supply[i]}.`);
    }
  });
  received.forEach((value, j) => {
    if (Math.abs(value - problem.demand[j]) > tolerance) {
      errors.push(`Column ${j} receives ${value} but demands ${problem.demand[j]}.`);
    }
  });

  return { ok: errors.length === 0, errors };
}

export type EliminatedLine = 'row' | 'column' | 'both';

export type AllocationStep = {
  allocation: Allocation;
  eliminated: EliminatedLine;
};

// Lines are never physically removed, so allocations keep their source coordinates.
export class ProblemTable {
  private readonly _costs: number[][];
  private readonly _supply: number[];
  private readonly _demand: number[];
  private readonly _rows: number[];
  private readonly _cols: number[];
  private readonly _allocations: Allocation[] = [];

  constructor(problem: TransportProblem) {
    this._costs = problem.costs;
    this._supply = [...problem.supply];
    this._demand = [...problem.demand];
    this._rows = problem.supply.map((_, i) => i);
    this._cols = problem.demand.map((_, j) => j);
  }

  activeRows(): ReadonlyArray<number> {
    return this._rows;
  }

  activeColumns(): ReadonlyArray<number> {
    return this._cols;
  }

  cost(row: number, col: number): number {
    return this._costs[row][col];
  }

  remainingSupply(row: number): number {
    return this._supply[row];
  }

  remainingDemand(col: number): number {
    return this._demand[col];
  }

  capacity(row: number, col: number): number {
    return Math.min(this._supply[row], this._demand[col]);
  }

  // With a balance residue one side can run out first; the leftover lines stay unallocated.
  isDone(): boolean {
    return this._rows.length === 0 || this._cols.length === 0;
  }

  allocate(row: number, col: number): AllocationStep {
    const rowIndex = this._rows.indexOf(row);
    const colIndex = this._cols.indexOf(col);
    if (rowIndex === -1 || colIndex === -1) {
      throw new InvariantError(`Cannot allocate to (${row}, ${col}): the row or column was already eliminated.`, {
        basis: this.allocations(),
        iteration: 0,
      });
    }

    const supply = this._supply[row];
    const demand = this._demand[col];
    const amount = Math.min(supply, demand);
    const allocation: Allocation = { row, col, amount };
    this._allocations.push(allocation);

    let eliminated: EliminatedLine;
    if (supply < demand) {
      this._rows.splice(rowIndex, 1);
      this._supply[row] = 0;
      this._demand[col] -= amount;
      eliminated = 'row';
    } else if (demand < supply) {
      this._cols.splice(colIndex, 1);
      this._demand[col] = 0;
      this._supply[row] -= amount;
      eliminated = 'column';
    } else {
      this._rows.splice(rowIndex, 1);
      this._cols.splice(colIndex, 1);
      this._supply[row] = 0;
      this._demand[col] = 0;
      eliminated = 'both';
    }

    return { allocation: { ...allocation }, eliminated };
  }

  allocations(): Allocation[] {
    return this._allocations.map((allocation) => ({ ...allocation }));
  }
}
