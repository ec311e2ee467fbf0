import { BFS_METHODS, constructInitialBasis, type BfsMethod } from '../bfs';
import { refine, type RefineOptions } from '../modi';
import { allocationCost, validateProblem, type TransportProblem } from '../problem';

export type StrategyTiming = {
  method: BfsMethod;
  initialCost: number;
  constructMs: number;
  refineMs: number | null;
  totalMs: number;
  optimalCost: number | null;
  iterations: number | null;
  optimal: boolean | null;
};

export type ComparisonResult = {
  strategies: StrategyTiming[];
  faster: BfsMethod | 'tie';
  sameOptimum: boolean | null;
};

export type CompareOptions = {
  methods?: ReadonlyArray<BfsMethod>;
  refine?: boolean;
  refineOptions?: RefineOptions;
  tolerance?: number;
  clock?: () => number;
};

export function compareStrategies(problem: TransportProblem, options: CompareOptions = {}): ComparisonResult {
  const methods = options.methods ?? BFS_METHODS;
  const withRefine = options.refine ?? true;
  const tolerance = options.tolerance ?? 1e-6;
  const clock = options.clock ?? (() => performance.now());
  const validated = validateProblem(problem, options.refineOptions);

  const strategies = methods.map((method): StrategyTiming => {
    const constructStart = clock();
    const allocations = constructInitialBasis(validated, method, options.refineOptions);
    const constructMs = clock() - constructStart;
    const initialCost = allocationCost(validated.costs, allocations);

    if (!withRefine) {
      return {
        method,
        initialCost,
        constructMs,
        refineMs: null,
        totalMs: constructMs,
        optimalCost: null,
        iterations: null,
        optimal: null,
      };
    }

    const refineStart = clock();
    const result = refine(validated, allocations, options.refineOptions);
    const refineMs = clock() - refineStart;
    return {
      method,
      initialCost,
      constructMs,
      refineMs,
      totalMs: constructMs + refineMs,
      optimalCost: result.totalCost,
      iterations: result.iterations,
      optimal: result.optimal,
    };
  });

  let faster: BfsMethod | 'tie' = 'tie';
  let bestMs = Infinity;
  for (const strategy of strategies) {
    if (strategy.totalMs < bestMs) {
      bestMs = strategy.totalMs;
      faster = strategy.method;
    } else if (strategy.totalMs === bestMs) {
      faster = 'tie';
    }
  }

  let sameOptimum: boolean | null = null;
  if (withRefine && strategies.length > 1) {
    const costs = strategies.map((strategy) => strategy.optimalCost ?? NaN);
    sameOptimum = costs.every((cost) => Math.abs(cost - costs[0]) <= tolerance);
  }

  return { strategies, faster, sameOptimum };
}
