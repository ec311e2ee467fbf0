import { describe, expect, it } from 'vitest';

import {
  constructInitialBasis,
  russellApproximation,
  selectRussellCell,
  selectVogelCell,
  vogelApproximation,
  vogelPenalty,
} from '../src/bfs';
import { PreconditionError } from '../src/errors';
import { ProblemTable, allocationCost, type TransportProblem } from '../src/problem';

const threeByFour: TransportProblem = {
  costs: [
    [4, 6, 8, 8],
    [6, 8, 6, 7],
    [5, 7, 6, 8],
  ],
  supply: [40, 60, 50],
  demand: [20, 30, 50, 50],
};

const twoByTwo: TransportProblem = {
  costs: [
    [1, 2],
    [3, 4],
  ],
  supply: [5, 5],
  demand: [5, 5],
};

describe('vogel', () => {
  it('measures penalties between the two cheapest costs', () => {
    expect(vogelPenalty([4, 6, 8, 8])).toBe(2);
    expect(vogelPenalty([8, 6, 6])).toBe(0);
    expect(vogelPenalty([5])).toBe(5);
    expect(vogelPenalty([])).toBe(0);
  });

  it('builds the initial basis of the 3x4 instance', () => {
    const allocations = vogelApproximation(threeByFour);
    expect(allocations).toEqual([
      { row: 0, col: 0, amount: 20 },
      { row: 0, col: 1, amount: 20 },
      { row: 1, col: 2, amount: 50 },
      { row: 1, col: 3, amount: 10 },
      { row: 2, col: 3, amount: 40 },
      { row: 2, col: 1, amount: 10 },
    ]);
    expect(allocationCost(threeByFour.costs, allocations)).toBe(960);
  });

  it('breaks penalty ties by the larger feasible amount', () => {
    const table = new ProblemTable({
      costs: [
        [1, 4],
        [2, 5],
      ],
      supply: [10, 30],
      demand: [25, 15],
    });
    expect(selectVogelCell(table)).toEqual({ row: 1, col: 0, amount: 25 });
  });

  it('stops short of a full basis on simultaneous ties', () => {
    expect(vogelApproximation(twoByTwo)).toEqual([
      { row: 0, col: 0, amount: 5 },
      { row: 1, col: 1, amount: 5 },
    ]);
  });
});

describe('russell', () => {
  it('selects the most negative reduced cost first', () => {
    expect(selectRussellCell(new ProblemTable(threeByFour))).toEqual({ row: 0, col: 0, delta: -10 });
  });

  it('builds the initial basis of the 3x4 instance', () => {
    const allocations = russellApproximation(threeByFour);
    expect(allocations).toEqual([
      { row: 0, col: 0, amount: 20 },
      { row: 0, col: 1, amount: 20 },
      { row: 1, col: 3, amount: 50 },
      { row: 1, col: 1, amount: 10 },
      { row: 2, col: 2, amount: 50 },
    ]);
    expect(allocationCost(threeByFour.costs, allocations)).toBe(930);
  });

  it('handles the degenerate 2x2 instance', () => {
    expect(russellApproximation(twoByTwo)).toEqual([
      { row: 0, col: 0, amount: 5 },
      { row: 1, col: 1, amount: 5 },
    ]);
  });
});

describe('constructInitialBasis', () => {
  it('dispatches on the method name', () => {
    expect(constructInitialBasis(threeByFour)).toEqual(vogelApproximation(threeByFour));
    expect(constructInitialBasis(threeByFour, 'russell')).toEqual(russellApproximation(threeByFour));
  });

  it('validates before touching the table', () => {
    const unbalanced = { ...threeByFour, supply: [40, 60, 51] };
    expect(() => constructInitialBasis(unbalanced, 'vogel')).toThrow(PreconditionError);
    expect(() => constructInitialBasis(unbalanced, 'russell')).toThrow(PreconditionError);
  });

  it('ships every unit of supply', () => {
    for (const method of ['vogel', 'russell'] as const) {
      const allocations = constructInitialBasis(threeByFour, method);
      const shipped = allocations.reduce((acc, { amount }) => acc + amount, 0);
      expect(shipped).toBe(150);
      expect(allocations.length).toBeLessThanOrEqual(6);
    }
  });
});
