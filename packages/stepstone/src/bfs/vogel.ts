import { ProblemTable, validateProblem } from '../problem';
import type { Allocation, TransportProblem, ValidateOptions } from '../problem';

export type VogelCandidate = {
  row: number;
  col: number;
  amount: number;
};

// Gap between the two cheapest costs; a lone cost is measured against 0.
export function vogelPenalty(costs: ReadonlyArray<number>): number {
  if (costs.length === 0) return 0;
  if (costs.length === 1) return Math.abs(costs[0]);
  let lowest = Infinity;
  let second = Infinity;
  for (const cost of costs) {
    if (cost < lowest) {
      second = lowest;
      lowest = cost;
    } else if (cost < second) {
      second = cost;
    }
  }
  return second - lowest;
}

const maxOf = (values: ReadonlyArray<number>) => values.reduce((acc, value) => (value > acc ? value : acc), -Infinity);
const minOf = (values: ReadonlyArray<number>) => values.reduce((acc, value) => (value < acc ? value : acc), Infinity);

/**
 * Picks the next cell by Vogel's rule. Among all lines sharing the maximum penalty, the
 * cheapest cell with the largest feasible amount wins; rows are scanned before columns and
 * the first candidate is kept on equal amounts.
 */
export function selectVogelCell(table: ProblemTable): VogelCandidate {
  const rows = table.activeRows();
  const cols = table.activeColumns();
  const rowPenalty = rows.map((row) => vogelPenalty(cols.map((col) => table.cost(row, col))));
  const colPenalty = cols.map((col) => vogelPenalty(rows.map((row) => table.cost(row, col))));
  const maxPenalty = Math.max(maxOf(rowPenalty), maxOf(colPenalty));

  const candidates: Array<[number, number]> = [];
  rows.forEach((row, i) => {
    if (rowPenalty[i] !== maxPenalty) return;
    const cheapest = minOf(cols.map((col) => table.cost(row, col)));
    for (const col of cols) {
      if (table.cost(row, col) === cheapest) candidates.push([row, col]);
    }
  });
  cols.forEach((col, j) => {
    if (colPenalty[j] !== maxPenalty) return;
    const cheapest = minOf(rows.map((row) => table.cost(row, col)));
    for (const row of rows) {
      if (table.cost(row, col) === cheapest) candidates.push([row, col]);
    }
  });

  let best: VogelCandidate | null = null;
  for (const [row, col] of candidates) {
    const amount = table.capacity(row, col);
    if (best === null || amount > best.amount) best = { row, col, amount };
  }
  if (best === null) throw new Error('Vogel selection requires a non-empty table.');
  return best;
}

export function vogelApproximation(problem: TransportProblem, options: ValidateOptions = {}): Allocation[] {
  const table = new ProblemTable(validateProblem(problem, options));
  while (!table.isDone()) {
    const { row, col } = selectVogelCell(table);
    table.allocate(row, col);
  }
  return table.allocations();
}
