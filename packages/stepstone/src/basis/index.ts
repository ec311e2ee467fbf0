import { InvariantError } from '../errors';
import { findLoop } from '../loop';
import type { Allocation, Cell } from '../problem';

export const cellKey = (row: number, col: number) => `${row},${col}`;

export interface BasisView {
  has(row: number, col: number): boolean;
  cellsInRow(row: number): ReadonlyArray<number>;
  cellsInColumn(col: number): ReadonlyArray<number>;
  cells(): Allocation[];
}

export class Basis implements BasisView {
  private readonly _rows: number;
  private readonly _cols: number;
  private readonly _flow = new Map<string, Allocation>();
  private readonly _byRow: Array<Set<number>>;
  private readonly _byCol: Array<Set<number>>;

  constructor(rows: number, cols: number) {
    this._rows = rows;
    this._cols = cols;
    this._byRow = Array.from({ length: rows }, () => new Set<number>());
    this._byCol = Array.from({ length: cols }, () => new Set<number>());
  }

  static fromAllocations(rows: number, cols: number, allocations: Iterable<Allocation>): Basis {
    const basis = new Basis(rows, cols);
    for (const { row, col, amount } of allocations) {
      basis.set(row, col, (basis.get(row, col) ?? 0) + amount);
    }
    return basis;
  }

  rowCount(): number {
    return this._rows;
  }

  columnCount(): number {
    return this._cols;
  }

  size(): number {
    return this._flow.size;
  }

  requiredSize(): number {
    return this._rows + this._cols - 1;
  }

  has(row: number, col: number): boolean {
    return this._flow.has(cellKey(row, col));
  }

  get(row: number, col: number): number | undefined {
    return this._flow.get(cellKey(row, col))?.amount;
  }

  set(row: number, col: number, amount: number): void {
    if (row < 0 || col < 0 || row >= this._rows || col >= this._cols) {
      throw new Error(`Cell (${row}, ${col}) is outside the ${this._rows}x${this._cols} table.`);
    }
    const key = cellKey(row, col);
    const existing = this._flow.get(key);
    if (existing) {
      existing.amount = amount;
      return;
    }
    this._flow.set(key, { row, col, amount });
    this._byRow[row].add(col);
    this._byCol[col].add(row);
  }

  delete(row: number, col: number): boolean {
    if (!this._flow.delete(cellKey(row, col))) return false;
    this._byRow[row].delete(col);
    this._byCol[col].delete(row);
    return true;
  }

  cellsInRow(row: number): ReadonlyArray<number> {
    return [...(this._byRow[row] ?? [])];
  }

  cellsInColumn(col: number): ReadonlyArray<number> {
    return [...(this._byCol[col] ?? [])];
  }

  cells(): Allocation[] {
    return [...this._flow.values()].map((cell) => ({ ...cell }));
  }

  totalCost(costs: ReadonlyArray<ReadonlyArray<number>>): number {
    let total = 0;
    for (const { row, col, amount } of this._flow.values()) {
      total += costs[row][col] * amount;
    }
    return total;
  }

  clone(): Basis {
    return Basis.fromAllocations(this._rows, this._cols, this._flow.values());
  }
}

export function repairDegeneracy(basis: Basis): Cell[] {
  const required = basis.requiredSize();
  if (basis.size() > required) {
    throw new InvariantError(`Basis has ${basis.size()} cells; a spanning basis has exactly ${required}.`, {
      basis: basis.cells(),
      iteration: 0,
    });
  }

  const inserted: Cell[] = [];
  for (let row = 0; row < basis.rowCount() && basis.size() < required; row += 1) {
    for (let col = 0; col < basis.columnCount() && basis.size() < required; col += 1) {
      if (basis.has(row, col)) continue;
      if (closesCycle(basis, { row, col })) continue;
      basis.set(row, col, 0);
      inserted.push({ row, col });
    }
  }
  return inserted;
}

export function closesCycle(basis: BasisView, cell: Cell): boolean {
  return findLoop(basis, cell) !== null;
}

export function containsCycle(rows: number, cols: number, cells: Iterable<Cell>): boolean {
  const parent = Array.from({ length: rows + cols }, (_, i) => i);
  const find = (x: number): number => {
    let root = x;
    while (parent[root] !== root) root = parent[root];
    while (parent[x] !== root) {
      const next = parent[x];
      parent[x] = root;
      x = next;
    }
    return root;
  };

  for (const { row, col } of cells) {
    const a = find(row);
    const b = find(rows + col);
    if (a === b) return true;
    parent[a] = b;
  }
  return false;
}
