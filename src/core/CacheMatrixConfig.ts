// CacheMatrixConfig.ts - Options and defaults for memoized solving

import { Matrix } from './Matrix';

/** Returns X such that A·X = B. */
export type LinearSolver = (A: number[][], B: number[][]) => number[][];

export type SolverName = 'lu' | 'gauss-jordan';

export const Solvers: Readonly<Record<SolverName, LinearSolver>> = Object.freeze({
    'lu': Matrix.solveLU,
    'gauss-jordan': Matrix.solveGaussJordan,
});

export interface CacheSolveOptions {
    solver?: SolverName | LinearSolver;

    // Logging
    log?: {
        name?: string;
        verbose?: boolean;
        sink?: (message: string) => void;
    };
}

export const defaultConfig = {
    solver: 'lu',
    log: {
        name: 'CacheMatrix',
        verbose: true,
    },
} satisfies CacheSolveOptions;

export function resolveSolver(solver: SolverName | LinearSolver): LinearSolver {
    return typeof solver === 'function' ? solver : Solvers[solver];
}
