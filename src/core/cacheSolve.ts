// cacheSolve.ts - Memoized inversion of a CacheMatrix

import { CacheMatrix } from './CacheMatrix';
import { type CacheSolveOptions, defaultConfig, resolveSolver } from './CacheMatrixConfig';
import { Matrix } from './Matrix';

/**
 * Returns the inverse of the matrix stored in `holder`.
 *
 * The first call after construction or `set` solves `matrix · X = I` and
 * caches X on the holder; later calls return the cached inverse without
 * reading the matrix. Assumes the matrix is invertible: a singular one makes
 * the solver throw SingularMatrixError and the cache stays empty.
 */
export function cacheSolve(holder: CacheMatrix, options: CacheSolveOptions = {}): number[][] {
    const solver = resolveSolver(options.solver ?? defaultConfig.solver);
    const name = options.log?.name ?? defaultConfig.log.name;
    const verbose = options.log?.verbose ?? defaultConfig.log.verbose;
    const sink = options.log?.sink ?? console.log;
    const log = (message: string) => {
        if (verbose) sink(message);
    };

    const cached = holder.getInverse();
    if (cached) {
        log(`♻️ ${name}: cache hit, returning cached inverse`);
        return cached;
    }

    const data = holder.get();
    const n = data.length;
    log(`🧮 ${name}: cache miss, solving ${n}×${n} system`);

    const inverse = solver(data, Matrix.identity(n));
    holder.setInverse(inverse);
    return inverse;
}
