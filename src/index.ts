export { CacheMatrix } from './core/CacheMatrix';
export { cacheSolve } from './core/cacheSolve';
export { Matrix } from './core/Matrix';
export { InvalidMatrixError, SingularMatrixError } from './core/Errors';
export { Solvers, defaultConfig } from './core/CacheMatrixConfig';
export type { CacheSolveOptions, LinearSolver, SolverName } from './core/CacheMatrixConfig';
export { IO } from './utils/IO';
