import { ProblemTable, validateProblem } from '../problem';
import type { Allocation, TransportProblem, ValidateOptions } from '../problem';

export type RussellCandidate = {
  row: number;
  col: number;
  delta: number;
};

// U and V are the largest active costs of the row and column; ties keep the first cell.
export function selectRussellCell(table: ProblemTable): RussellCandidate {
  const rows = table.activeRows();
  const cols = table.activeColumns();
  const rowMax = rows.map((row) => cols.reduce((acc, col) => Math.max(acc, table.cost(row, col)), -Infinity));
  const colMax = cols.map((col) => rows.reduce((acc, row) => Math.max(acc, table.cost(row, col)), -Infinity));

  let best: RussellCandidate | null = null;
  for (let i = 0; i < rows.length; i += 1) {
    const row = rows[i];
    for (let j = 0; j < cols.length; j += 1) {
      const col = cols[j];
      const delta = table.cost(row, col) - (rowMax[i] + colMax[j]);
      if (best === null || delta < best.delta) best = { row, col, delta };
    }
  }
  if (best === null) throw new Error('Russell selection requires a non-empty table.');
  return best;
}

export function russellApproximation(problem: TransportProblem, options: ValidateOptions = {}): Allocation[] {
  const table = new ProblemTable(validateProblem(problem, options));
  while (!table.isDone()) {
    const { row, col } = selectRussellCell(table);
    table.allocate(row, col);
  }
  return table.allocations();
}
