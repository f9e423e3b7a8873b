// Matrix.ts - Dense matrix helpers and linear-solve primitives

import { LuDecomposition, Matrix as MlMatrix } from 'ml-matrix';
import { InvalidMatrixError, SingularMatrixError } from './Errors';

// Largest accepted max|A·X - B|, relative to max(1, max|B|).
const RESIDUAL_TOLERANCE = 1e-8;

function describeShape(rows: unknown[]): string {
    const first = rows[0];
    const cols = Array.isArray(first) ? first.length : 0;
    return `${rows.length}×${cols}`;
}

export class Matrix {
    static identity(size: number): number[][] {
        return Array.from({ length: size }, (_, i) =>
            Array.from({ length: size }, (_, j) => (i === j ? 1 : 0))
        );
    }

    static multiply(A: number[][], B: number[][]): number[][] {
        if (A[0]?.length !== B.length) {
            throw new InvalidMatrixError(
                `Cannot multiply ${describeShape(A)} by ${describeShape(B)}`
            );
        }
        const result: number[][] = [];
        for (let i = 0; i < A.length; i++) {
            result[i] = [];
            for (let j = 0; j < (B[0]?.length ?? 0); j++) {
                let sum = 0;
                for (let k = 0; k < B.length; k++) {
                    sum += A[i][k] * B[k][j];
                }
                result[i][j] = sum;
            }
        }
        return result;
    }

    static clone(A: number[][]): number[][] {
        return A.map(row => [...row]);
    }

    static approxEqual(A: number[][], B: number[][], tolerance = 1e-9): boolean {
        if (A.length !== B.length) return false;
        return A.every((row, i) =>
            row.length === B[i].length &&
            row.every((val, j) => Math.abs(val - B[i][j]) <= tolerance)
        );
    }

    static maxAbs(A: number[][]): number {
        return A.reduce((max, row) => row.reduce((m, val) => Math.max(m, Math.abs(val)), max), 0);
    }

    /**
     * Checks that `value` is a non-empty square 2-D array of finite numbers
     * and returns it typed. Throws InvalidMatrixError otherwise.
     */
    static validateSquare(value: unknown): number[][] {
        if (value === null || value === undefined) {
            throw new InvalidMatrixError('No matrix specified');
        }
        if (!Array.isArray(value) || !value.every(row => Array.isArray(row))) {
            throw new InvalidMatrixError('Matrix must be a 2-D array');
        }
        if (value.length === 0) {
            throw new InvalidMatrixError('Matrix must have at least one row');
        }

        const n = value.length;
        const rows: number[][] = [];
        for (let i = 0; i < n; i++) {
            const row: unknown[] = value[i];
            if (row.length !== n) {
                throw new InvalidMatrixError(
                    `Matrix must be square: row ${i} has ${row.length} columns, expected ${n}`
                );
            }
            const numeric: number[] = [];
            for (const cell of row) {
                if (typeof cell !== 'number' || !Number.isFinite(cell)) {
                    throw new InvalidMatrixError(`Matrix row ${i} contains a non-numeric entry`);
                }
                numeric.push(cell);
            }
            rows.push(numeric);
        }
        return rows;
    }

    // Solves A·X = B through ml-matrix's LU decomposition.
    static solveLU(A: number[][], B: number[][]): number[][] {
        Matrix.assertSolvable(A, B);
        const n = A.length;
        const tolerance = Matrix.pivotTolerance(A);
        const lu = new LuDecomposition(new MlMatrix(A));
        const U = lu.upperTriangularMatrix;
        for (let i = 0; i < n; i++) {
            if (Math.abs(U.get(i, i)) <= tolerance) throw new SingularMatrixError();
        }

        const X = lu.solve(new MlMatrix(B)).to2DArray();
        Matrix.assertAccurate(A, X, B);
        return X;
    }

    // Gauss-Jordan elimination with partial pivoting, on copies of A and B.
    static solveGaussJordan(A: number[][], B: number[][]): number[][] {
        Matrix.assertSolvable(A, B);
        const n = A.length;
        const M = Matrix.clone(A);
        const X = Matrix.clone(B);
        const tolerance = Matrix.pivotTolerance(A);

        for (let i = 0; i < n; i++) {
            let maxEl = Math.abs(M[i][i]);
            let maxRow = i;
            for (let k = i + 1; k < n; k++) {
                if (Math.abs(M[k][i]) > maxEl) {
                    maxEl = Math.abs(M[k][i]);
                    maxRow = k;
                }
            }

            [M[i], M[maxRow]] = [M[maxRow], M[i]];
            [X[i], X[maxRow]] = [X[maxRow], X[i]];

            const div = M[i][i];
            if (Math.abs(div) <= tolerance) throw new SingularMatrixError();

            for (let j = 0; j < n; j++) M[i][j] /= div;
            for (let j = 0; j < X[i].length; j++) X[i][j] /= div;

            for (let k = 0; k < n; k++) {
                if (k === i) continue;
                const factor = M[k][i];
                for (let j = 0; j < n; j++) M[k][j] -= factor * M[i][j];
                for (let j = 0; j < X[k].length; j++) X[k][j] -= factor * X[i][j];
            }
        }

        Matrix.assertAccurate(A, X, B);
        return X;
    }

    // Pivots at or below rounding noise for A's scale count as zero.
    private static pivotTolerance(A: number[][]): number {
        return A.length * Number.EPSILON * Matrix.maxAbs(A);
    }

    // A numerically singular system can pass the pivot check and still yield
    // an X that does not satisfy A·X = B.
    private static assertAccurate(A: number[][], X: number[][], B: number[][]): void {
        if (X.some(row => row.some(val => !Number.isFinite(val)))) {
            throw new SingularMatrixError();
        }
        const product = Matrix.multiply(A, X);
        const limit = RESIDUAL_TOLERANCE * Math.max(1, Matrix.maxAbs(B));
        const residual = product.reduce(
            (max, row, i) => row.reduce((m, val, j) => Math.max(m, Math.abs(val - B[i][j])), max),
            0
        );
        if (residual > limit) {
            throw new SingularMatrixError('Matrix is computationally singular and cannot be inverted');
        }
    }

    private static assertSolvable(A: number[][], B: number[][]): void {
        if (A.length === 0 || A.some(row => row.length !== A.length)) {
            throw new InvalidMatrixError(`Coefficient matrix must be square, got ${describeShape(A)}`);
        }
        if (B.length !== A.length) {
            throw new InvalidMatrixError(
                `Right-hand side has ${B.length} rows, expected ${A.length}`
            );
        }
    }
}
