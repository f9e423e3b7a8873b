// CacheMatrix.ts - Square matrix holder with a cached inverse

import { Matrix } from './Matrix';

/**
 * Owns a square matrix and, optionally, its inverse.
 *
 * Replacing the matrix through `set` always drops the cached inverse, so an
 * inverse read from `getInverse` belongs to the matrix returned by `get`.
 * Matrices are copied on the way in and out; callers never hold the
 * internal arrays.
 */
export class CacheMatrix {
    private matrix: number[][];
    private inverse: number[][] | null = null;

    constructor(value: unknown) {
        this.matrix = Matrix.clone(Matrix.validateSquare(value));
    }

    get size(): number {
        return this.matrix.length;
    }

    get(): number[][] {
        return Matrix.clone(this.matrix);
    }

    set(value: unknown): void {
        const next = Matrix.clone(Matrix.validateSquare(value));
        this.matrix = next;
        this.inverse = null;
    }

    getInverse(): number[][] | null {
        return this.inverse ? Matrix.clone(this.inverse) : null;
    }

    // Trusted: no check that `value` inverts the current matrix.
    setInverse(value: number[][]): void {
        this.inverse = Matrix.clone(value);
    }

    hasInverse(): boolean {
        return this.inverse !== null;
    }
}
