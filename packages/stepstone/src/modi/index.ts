import { Basis, containsCycle, repairDegeneracy } from '../basis';
import type { BasisView } from '../basis';
import { constructInitialBasis, type BfsMethod } from '../bfs';
import { InvariantError, NonConvergenceError, PreconditionError } from '../errors';
import { findLoop } from '../loop';
import { computePotentials, opportunity, type Potentials } from '../potentials';
import {
  DEFAULT_BALANCE_TOLERANCE,
  allocationCost,
  checkFeasibility,
  validateProblem,
  type Allocation,
  type Cell,
  type TransportProblem,
  type ValidateOptions,
} from '../problem';

export type RefinePhase = 'compute-duals' | 'select-entering' | 'find-loop' | 'reallocate' | 'optimal' | 'failed';

export type RefineStatus = 'optimal' | 'max-iterations';

export type ProgressStage = 'validate' | 'construct' | 'repair' | 'iteration' | 'done';

export type ProgressEvent = {
  stage: ProgressStage;
  detail: string;
  iteration?: number;
  cost?: number;
};

export type RefineOptions = ValidateOptions & {
  maxIterations?: number;
  epsilon?: number;
  throwOnNonConvergence?: boolean;
  onProgress?: (event: ProgressEvent) => void;
};

export type SolveOptions = RefineOptions & {
  method?: BfsMethod;
};

export type EnteringCell = Cell & {
  value: number;
};

export type Reallocation = {
  theta: number;
  leaving: Cell | null;
};

export type RefinementResult = {
  allocations: Allocation[];
  totalCost: number;
  iterations: number;
  optimal: boolean;
  status: RefineStatus;
  potentials: Potentials;
  repairedCells: Cell[];
};

export type SolveResult = RefinementResult & {
  method: BfsMethod;
  initialAllocations: Allocation[];
  initialCost: number;
};

export const DEFAULT_EPSILON = 1e-9;

export const defaultMaxIterations = (rows: number, cols: number) => Math.max(100, 10 * (rows + cols));

// First in row-major order on ties; null certifies the basis as optimal.
export function selectEnteringCell(
  costs: ReadonlyArray<ReadonlyArray<number>>,
  basis: BasisView,
  potentials: Potentials,
  epsilon = DEFAULT_EPSILON,
): EnteringCell | null {
  let best: EnteringCell | null = null;
  for (let row = 0; row < costs.length; row += 1) {
    for (let col = 0; col < costs[row].length; col += 1) {
      if (basis.has(row, col)) continue;
      const value = opportunity(costs, potentials, row, col);
      if (value <= epsilon) continue;
      if (best === null || value > best.value) best = { row, col, value };
    }
  }
  return best;
}

/**
 * Even loop positions gain `theta`, odd positions lose it. Only the first minus cell that
 * reaches zero leaves the basis; any others stay as zero-valued cells.
 */
export function reallocate(
  basis: Basis,
  loop: ReadonlyArray<Cell>,
  epsilon = DEFAULT_EPSILON,
  iteration = 0,
): Reallocation {
  const minus = loop.filter((_, index) => index % 2 === 1);
  let theta = Infinity;
  for (const cell of minus) {
    const flow = basis.get(cell.row, cell.col);
    if (flow === undefined) {
      throw new InvariantError(`Loop cell (${cell.row}, ${cell.col}) is not in the basis.`, {
        basis: basis.cells(),
        iteration,
      });
    }
    theta = Math.min(theta, flow);
  }
  if (!Number.isFinite(theta)) {
    throw new InvariantError('Loop has no cell to take flow from.', { basis: basis.cells(), iteration });
  }

  loop.forEach((cell, index) => {
    const flow = basis.get(cell.row, cell.col) ?? 0;
    if (index % 2 === 0) {
      basis.set(cell.row, cell.col, flow + theta);
    } else {
      const next = flow - theta;
      basis.set(cell.row, cell.col, Math.abs(next) <= epsilon ? 0 : next);
    }
  });

  const leaving = minus.find((cell) => basis.get(cell.row, cell.col) === 0) ?? null;
  if (leaving) basis.delete(leaving.row, leaving.col);
  return { theta, leaving };
}

const formatCell = (cell: Cell) => `(${cell.row}, ${cell.col})`;

function completeBasis(basis: Basis, emit: (event: ProgressEvent) => void): Cell[] {
  const repaired = repairDegeneracy(basis);
  if (repaired.length > 0) {
    emit({
      stage: 'repair',
      detail: `Inserted ${repaired.length} zero-valued cell(s) to complete the basis: ${repaired.map(formatCell).join(', ')}.`,
    });
  }
  return repaired;
}

function runRefinement(
  problem: TransportProblem,
  basis: Basis,
  repairedCells: Cell[],
  options: RefineOptions,
): RefinementResult {
  const rows = problem.supply.length;
  const cols = problem.demand.length;
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  const maxIterations = options.maxIterations ?? defaultMaxIterations(rows, cols);
  const emit = options.onProgress ?? (() => undefined);

  let phase: RefinePhase = 'compute-duals';
  let status: RefineStatus = 'optimal';
  let iterations = 0;
  let potentials: Potentials = { u: [], v: [] };
  let entering: EnteringCell | null = null;
  let loop: Cell[] | null = null;

  while (phase !== 'optimal' && phase !== 'failed') {
    switch (phase) {
      case 'compute-duals':
        potentials = computePotentials(problem.costs, basis, iterations);
        phase = 'select-entering';
        break;
      case 'select-entering':
        entering = selectEnteringCell(problem.costs, basis, potentials, epsilon);
        if (entering === null) {
          phase = 'optimal';
        } else if (iterations >= maxIterations) {
          status = 'max-iterations';
          phase = 'failed';
        } else {
          phase = 'find-loop';
        }
        break;
      case 'find-loop':
        loop = entering ? findLoop(basis, entering) : null;
        if (loop === null) {
          throw new InvariantError(
            `No stepping-stone loop through ${entering ? formatCell(entering) : 'the entering cell'}; the basis is not a spanning tree.`,
            { basis: basis.cells(), iteration: iterations },
          );
        }
        phase = 'reallocate';
        break;
      case 'reallocate': {
        if (loop === null) throw new InvariantError('Reallocation requires a loop.');
        const { theta, leaving } = reallocate(basis, loop, epsilon, iterations);
        iterations += 1;
        const entered = loop[0];
        emit({
          stage: 'iteration',
          iteration: iterations,
          detail: `Entered ${formatCell(entered)} with theta ${theta}; ${leaving ? formatCell(leaving) : 'no cell'} left the basis.`,
          cost: basis.totalCost(problem.costs),
        });
        phase = 'compute-duals';
        break;
      }
    }
  }

  const allocations = basis.cells();
  const totalCost = allocationCost(problem.costs, allocations);
  if (status === 'max-iterations' && options.throwOnNonConvergence) {
    throw new NonConvergenceError(`MODI refinement did not converge within ${maxIterations} iteration(s).`, {
      basis: allocations,
      iteration: iterations,
    });
  }
  emit({
    stage: 'done',
    detail:
      status === 'optimal'
        ? `Optimal after ${iterations} iteration(s).`
        : `Stopped after ${iterations} iteration(s) without an optimality certificate.`,
    iteration: iterations,
    cost: totalCost,
  });

  return {
    allocations,
    totalCost,
    iterations,
    optimal: status === 'optimal',
    status,
    potentials,
    repairedCells,
  };
}

export function refine(
  problem: TransportProblem,
  allocations: ReadonlyArray<Allocation>,
  options: RefineOptions = {},
): RefinementResult {
  const validated = validateProblem(problem, options);
  const rows = validated.supply.length;
  const cols = validated.demand.length;
  const emit = options.onProgress ?? (() => undefined);

  allocations.forEach(({ row, col, amount }, index) => {
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || row >= rows || col >= cols) {
      throw new PreconditionError(
        `allocations[${index}] refers to (${row}, ${col}) outside the ${rows}x${cols} table.`,
        `allocations[${index}]`,
      );
    }
    if (!Number.isFinite(amount) || amount < 0) {
      throw new PreconditionError(
        `allocations[${index}] must carry a finite, non-negative amount.`,
        `allocations[${index}].amount`,
      );
    }
  });
  const feasibility = checkFeasibility(validated, allocations, options.tolerance ?? DEFAULT_BALANCE_TOLERANCE);
  if (!feasibility.ok) {
    throw new PreconditionError(`Initial allocation is infeasible: ${feasibility.errors[0]}`, 'allocations');
  }
  emit({ stage: 'validate', detail: `Validated ${rows}x${cols} problem and ${allocations.length} allocation(s).` });

  const basis = Basis.fromAllocations(rows, cols, allocations);
  if (basis.size() > basis.requiredSize()) {
    throw new PreconditionError(
      `Initial allocation uses ${basis.size()} cells; a basic solution has at most ${basis.requiredSize()}.`,
      'allocations',
    );
  }
  if (containsCycle(rows, cols, basis.cells())) {
    throw new PreconditionError('Initial allocation contains a cycle; a basic solution must be acyclic.', 'allocations');
  }
  const repaired = completeBasis(basis, emit);
  return runRefinement(validated, basis, repaired, options);
}

export function solveTransportation(problem: TransportProblem, options: SolveOptions = {}): SolveResult {
  const method = options.method ?? 'vogel';
  const emit = options.onProgress ?? (() => undefined);
  const validated = validateProblem(problem, options);
  const rows = validated.supply.length;
  const cols = validated.demand.length;
  emit({ stage: 'validate', detail: `Validated ${rows}x${cols} problem.` });

  const initialAllocations = constructInitialBasis(validated, method, options);
  const initialCost = allocationCost(validated.costs, initialAllocations);
  emit({
    stage: 'construct',
    detail: `${method} construction produced ${initialAllocations.length} allocation(s).`,
    cost: initialCost,
  });

  const basis = Basis.fromAllocations(rows, cols, initialAllocations);
  const repaired = completeBasis(basis, emit);
  const result = runRefinement(validated, basis, repaired, options);
  return { ...result, method, initialAllocations, initialCost };
}
