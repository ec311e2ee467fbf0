import { describe, expect, it } from 'vitest';

import { Basis } from '../src/basis';
import { vogelApproximation } from '../src/bfs';
import { InvariantError } from '../src/errors';
import { computePotentials, opportunity, opportunityMatrix } from '../src/potentials';
import type { TransportProblem } from '../src/problem';

const threeByFour: TransportProblem = {
  costs: [
    [4, 6, 8, 8],
    [6, 8, 6, 7],
    [5, 7, 6, 8],
  ],
  supply: [40, 60, 50],
  demand: [20, 30, 50, 50],
};

describe('computePotentials', () => {
  it('anchors u[0] at zero and satisfies every basic cell', () => {
    const basis = Basis.fromAllocations(3, 4, vogelApproximation(threeByFour));
    const potentials = computePotentials(threeByFour.costs, basis);
    expect(potentials).toEqual({ u: [0, 0, 1], v: [4, 6, 6, 7] });
    for (const { row, col } of basis.cells()) {
      expect(opportunity(threeByFour.costs, potentials, row, col)).toBe(0);
    }
  });

  it('reports opportunity values for non-basic cells only', () => {
    const basis = Basis.fromAllocations(3, 4, vogelApproximation(threeByFour));
    const potentials = computePotentials(threeByFour.costs, basis);
    expect(opportunityMatrix(threeByFour.costs, basis, potentials)).toEqual([
      [null, null, -2, -1],
      [-2, -2, null, null],
      [0, null, 1, null],
    ]);
  });

  it('fails when the basis leaves a component unreached', () => {
    const costs = [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ];
    const basis = Basis.fromAllocations(3, 3, [
      { row: 0, col: 0, amount: 1 },
      { row: 0, col: 1, amount: 1 },
      { row: 1, col: 0, amount: 1 },
      { row: 1, col: 1, amount: 1 },
      { row: 2, col: 2, amount: 1 },
    ]);
    let caught: unknown = null;
    try {
      computePotentials(costs, basis, 3);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvariantError);
    if (caught instanceof InvariantError) {
      expect(caught.message).toBe(
        'Dual potentials are underdetermined: 2 row/column potential(s) unreachable from the basis.',
      );
      expect(caught.state?.iteration).toBe(3);
      expect(caught.state?.basis).toHaveLength(5);
    }
  });
});
