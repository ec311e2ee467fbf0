import type { Allocation, TransportProblem, ValidateOptions } from '../problem';
import { russellApproximation } from './russell';
import { vogelApproximation } from './vogel';

export { russellApproximation, selectRussellCell, type RussellCandidate } from './russell';
export { selectVogelCell, vogelApproximation, vogelPenalty, type VogelCandidate } from './vogel';

export type BfsMethod = 'vogel' | 'russell';

export const BFS_METHODS: ReadonlyArray<BfsMethod> = ['vogel', 'russell'];

export function constructInitialBasis(
  problem: TransportProblem,
  method: BfsMethod = 'vogel',
  options: ValidateOptions = {},
): Allocation[] {
  switch (method) {
    case 'vogel':
      return vogelApproximation(problem, options);
    case 'russell':
      return russellApproximation(problem, options);
    default: {
      const unknown: never = method;
      throw new Error(`Unknown BFS method: ${String(unknown)}`);
    }
  }
}
