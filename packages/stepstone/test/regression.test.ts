import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { parseProblemJson } from '../src/io';
import { solveTransportation } from '../src/modi';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const loadCase = (name: string) => {
  const file = path.join(__dirname, '../testdata', name);
  const { problem, metadata } = parseProblemJson(JSON.parse(fs.readFileSync(file, 'utf8')));
  const optimalCost = metadata?.optimalCost;
  if (typeof optimalCost !== 'number') throw new Error(`${name} has no metadata.optimalCost`);
  return { problem, optimalCost };
};

describe('regression corpus', () => {
  it('solves the depot instance from either start', () => {
    const { problem, optimalCost } = loadCase('depot-4x5.json');
    const vogel = solveTransportation(problem, { method: 'vogel' });
    const russell = solveTransportation(problem, { method: 'russell' });
    expect(vogel.initialCost).toBe(1065);
    expect(russell.initialCost).toBe(1040);
    expect(vogel.iterations).toBe(3);
    expect(russell.iterations).toBe(2);
    expect(vogel.totalCost).toBe(optimalCost);
    expect(russell.totalCost).toBe(optimalCost);
  });

  it('repairs two degenerate ties on the staircase instance', () => {
    const { problem, optimalCost } = loadCase('staircase-3x3.json');
    const vogel = solveTransportation(problem);
    expect(vogel.iterations).toBe(0);
    expect(vogel.totalCost).toBe(optimalCost);

    const russell = solveTransportation(problem, { method: 'russell' });
    expect(russell.initialCost).toBe(240);
    expect(russell.repairedCells).toEqual([
      { row: 0, col: 1 },
      { row: 0, col: 2 },
    ]);
    expect(russell.iterations).toBe(3);
    expect(russell.totalCost).toBe(optimalCost);
  });

  it('handles fractional costs and quantities', () => {
    const { problem, optimalCost } = loadCase('fractional-3x3.json');
    for (const method of ['vogel', 'russell'] as const) {
      const result = solveTransportation(problem, { method });
      expect(result.iterations).toBe(0);
      expect(result.totalCost).toBeCloseTo(optimalCost, 9);
    }
  });
});
