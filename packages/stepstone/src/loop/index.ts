import type { BasisView } from '../basis';
import type { Cell } from '../problem';

const key = (cell: Cell) => `${cell.row},${cell.col}`;

/**
 * Alternates row and column moves through basic cells, row first. The loop closes with a
 * column move back onto `entering` once at least four cells are on the path.
 */
export function findLoop(basis: BasisView, entering: Cell): Cell[] | null {
  if (basis.has(entering.row, entering.col)) return null;

  const path: Cell[] = [entering];
  const onPath = new Set<string>([key(entering)]);

  const search = (current: Cell, alongRow: boolean): boolean => {
    const candidates: Cell[] = alongRow
      ? basis.cellsInRow(current.row).map((col) => ({ row: current.row, col }))
      : basis.cellsInColumn(current.col).map((row) => ({ row, col: current.col }));

    for (const next of candidates) {
      const nextKey = key(next);
      if (onPath.has(nextKey)) continue;
      path.push(next);
      onPath.add(nextKey);
      if (search(next, !alongRow)) return true;
      path.pop();
      onPath.delete(nextKey);
    }

    return !alongRow && current.col === entering.col && path.length >= 4;
  };

  return search(entering, true) ? [...path] : null;
}

export type LoopCheck = { ok: boolean; errors: string[] };

export function validateLoop(basis: BasisView, loop: ReadonlyArray<Cell>): LoopCheck {
  const errors: string[] = [];
  if (loop.length < 4 || loop.length % 2 !== 0) {
    errors.push(`Loop must have an even number of cells, at least 4 (got ${loop.length}).`);
  }
  const seen = new Set<string>();
  loop.forEach((cell, index) => {
    const k = key(cell);
    if (seen.has(k)) errors.push(`Loop visits (${cell.row}, ${cell.col}) twice.`);
    seen.add(k);
    if (index > 0 && !basis.has(cell.row, cell.col)) {
      errors.push(`Loop cell (${cell.row}, ${cell.col}) is not basic.`);
    }
    const next = loop[(index + 1) % loop.length];
    if (!next) return;
    const sameRow = cell.row === next.row;
    const sameCol = cell.col === next.col;
    if (index % 2 === 0 && !sameRow) errors.push(`Move ${index} must stay in row ${cell.row}.`);
    if (index % 2 === 1 && !sameCol) errors.push(`Move ${index} must stay in column ${cell.col}.`);
  });
  return { ok: errors.length === 0, errors };
}
