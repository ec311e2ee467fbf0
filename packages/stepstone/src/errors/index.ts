import type { Allocation } from '../problem';

export type TransportationErrorCode = 'precondition' | 'invariant' | 'non-convergence';

export type SolverState = {
  basis: Allocation[];
  iteration: number;
};

export class TransportationError extends Error {
  readonly code: TransportationErrorCode;

  constructor(code: TransportationErrorCode, message: string) {
    super(message);
    this.name = 'TransportationError';
    this.code = code;
  }
}

export class PreconditionError extends TransportationError {
  readonly path: string;

  constructor(message: string, path: string) {
    super('precondition', message);
    this.name = 'PreconditionError';
    this.path = path;
  }
}

export class InvariantError extends TransportationError {
  readonly state: SolverState | undefined;

  constructor(message: string, state?: SolverState) {
    super('invariant', message);
    this.name = 'InvariantError';
    this.state = state;
  }
}

export class NonConvergenceError extends TransportationError {
  readonly state: SolverState;

  constructor(message: string, state: SolverState) {
    super('non-convergence', message);
    this.name = 'NonConvergenceError';
    this.state = state;
  }
}
