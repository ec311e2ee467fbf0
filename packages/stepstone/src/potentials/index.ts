import type { BasisView } from '../basis';
import { InvariantError } from '../errors';

export type Potentials = {
  u: number[];
  v: number[];
};

// A sweep without progress means the basis does not span every row and column.
export function computePotentials(
  costs: ReadonlyArray<ReadonlyArray<number>>,
  basis: BasisView,
  iteration = 0,
): Potentials {
  const rows = costs.length;
  const cols = costs[0]?.length ?? 0;
  const u: Array<number | null> = Array(rows).fill(null);
  const v: Array<number | null> = Array(cols).fill(null);
  u[0] = 0;

  const cells = basis.cells();
  let known = 1;
  let changed = true;
  while (known < rows + cols && changed) {
    changed = false;
    for (const { row, col } of cells) {
      const ui = u[row];
      const vj = v[col];
      if (ui !== null && vj === null) {
        v[col] = costs[row][col] - ui;
        known += 1;
        changed = true;
      } else if (vj !== null && ui === null) {
        u[row] = costs[row][col] - vj;
        known += 1;
        changed = true;
      }
    }
  }

  if (known < rows + cols) {
    throw new InvariantError(
      `Dual potentials are underdetermined: ${rows + cols - known} row/column potential(s) unreachable from the basis.`,
      { basis: cells, iteration },
    );
  }

  return { u: u.map((value) => value ?? 0), v: v.map((value) => value ?? 0) };
}

export function opportunity(
  costs: ReadonlyArray<ReadonlyArray<number>>,
  potentials: Potentials,
  row: number,
  col: number,
): number {
  return potentials.u[row] + potentials.v[col] - costs[row][col];
}

export function opportunityMatrix(
  costs: ReadonlyArray<ReadonlyArray<number>>,
  basis: BasisView,
  potentials: Potentials,
): Array<Array<number | null>> {
  return costs.map((row, i) =>
    row.map((_, j) => (basis.has(i, j) ? null : opportunity(costs, potentials, i, j))),
  );
}
