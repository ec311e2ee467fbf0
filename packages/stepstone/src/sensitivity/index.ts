import { BFS_METHODS, type BfsMethod } from '../bfs';
import { InvariantError } from '../errors';
import { solveTransportation, type RefineOptions } from '../modi';
import { validateProblem, type Allocation, type Cell, type TransportProblem } from '../problem';

export type Trapezoid = [number, number, number, number];

export type MembershipFunction = {
  points: Trapezoid;
  height: number;
};

export type It2FuzzyNumber = {
  upper: MembershipFunction;
  lower: MembershipFunction;
};

const MIN_SUPPORT = 0.01;

// Support is 40% of the value, shifted right by `level * value`.
export function crispToIt2(value: number, level: number): It2FuzzyNumber {
  const shift = value * level;
  const width = 0.4 * value;
  return {
    upper: {
      points: [
        Math.max(MIN_SUPPORT, value - width / 2 + shift),
        value - width / 4 + shift,
        value + width / 4 + shift,
        value + width / 2 + shift,
      ],
      height: 1,
    },
    lower: {
      points: [
        Math.max(MIN_SUPPORT, value - width / 3 + shift),
        value - width / 6 + shift,
        value + width / 6 + shift,
        value + width / 3 + shift,
      ],
      height: 0.7,
    },
  };
}

export function defuzzify(fuzzy: It2FuzzyNumber): number {
  const points = [...fuzzy.upper.points, ...fuzzy.lower.points];
  return points.reduce((acc, point) => acc + point, 0) / points.length;
}

export type WorstCell = Cell & {
  contribution: number;
};

export function worstCell(
  costs: ReadonlyArray<ReadonlyArray<number>>,
  allocations: ReadonlyArray<Allocation>,
): WorstCell | null {
  let worst: WorstCell | null = null;
  for (const { row, col, amount } of allocations) {
    const contribution = costs[row][col] * amount;
    if (worst === null || contribution > worst.contribution) worst = { row, col, contribution };
  }
  return worst;
}

export function perturbCost(problem: TransportProblem, cell: Cell, level: number): TransportProblem {
  const costs = problem.costs.map((row) => [...row]);
  costs[cell.row][cell.col] = defuzzify(crispToIt2(problem.costs[cell.row][cell.col], level));
  return { costs, supply: [...problem.supply], demand: [...problem.demand] };
}

export type PerturbationRun = {
  level: number;
  perturbedCost: number;
  optimalCost: number;
  change: number;
};

export type MethodSensitivity = {
  method: BfsMethod;
  initialCost: number;
  baseOptimal: number;
  cell: WorstCell;
  runs: PerturbationRun[];
  meanChange: number;
};

export type SensitivityVerdict =
  | { kind: 'robust' }
  | { kind: 'sensitive'; method: BfsMethod; ratio: number };

export type SensitivityReport = {
  levels: number[];
  methods: MethodSensitivity[];
  verdict: SensitivityVerdict;
};

export type SensitivityOptions = {
  methods?: ReadonlyArray<BfsMethod>;
  levels?: ReadonlyArray<number>;
  solveOptions?: RefineOptions;
};

export const DEFAULT_SENSITIVITY_LEVELS: ReadonlyArray<number> = [0.05, 0.1, 0.15];

export function analyzeSensitivity(problem: TransportProblem, options: SensitivityOptions = {}): SensitivityReport {
  const methods = options.methods ?? BFS_METHODS;
  const levels = [...(options.levels ?? DEFAULT_SENSITIVITY_LEVELS)];
  const validated = validateProblem(problem, options.solveOptions);

  const results = methods.map((method): MethodSensitivity => {
    const base = solveTransportation(validated, { ...options.solveOptions, method });
    const cell = worstCell(validated.costs, base.initialAllocations);
    if (cell === null) {
      throw new InvariantError(`Sensitivity analysis found no allocation in the ${method} solution.`, {
        basis: base.initialAllocations,
        iteration: 0,
      });
    }
    const runs = levels.map((level): PerturbationRun => {
      const perturbed = perturbCost(validated, cell, level);
      const solved = solveTransportation(perturbed, { ...options.solveOptions, method });
      return {
        level,
        perturbedCost: perturbed.costs[cell.row][cell.col],
        optimalCost: solved.totalCost,
        change: Math.abs(solved.totalCost - base.totalCost),
      };
    });
    const meanChange = runs.length ? runs.reduce((acc, run) => acc + run.change, 0) / runs.length : 0;
    return {
      method,
      initialCost: base.initialCost,
      baseOptimal: base.totalCost,
      cell,
      runs,
      meanChange,
    };
  });

  return { levels, methods: results, verdict: sensitivityVerdict(results) };
}

export function sensitivityVerdict(results: ReadonlyArray<MethodSensitivity>): SensitivityVerdict {
  if (results.every((result) => result.meanChange === 0)) return { kind: 'robust' };
  let most = results[0];
  let least = results[0];
  for (const result of results) {
    if (result.meanChange > most.meanChange) most = result;
    if (result.meanChange < least.meanChange) least = result;
  }
  const ratio = least.meanChange === 0 ? Infinity : most.meanChange / least.meanChange;
  return { kind: 'sensitive', method: most.method, ratio };
}
