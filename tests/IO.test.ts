// IO.test.ts - Unit tests for matrix IO utilities

import { describe, it, expect } from 'vitest';
import { IO } from '../src/utils/IO';
import { InvalidMatrixError } from '../src/core/Errors';

describe('IO', () => {
    it('imports CSV correctly', () => {
        expect(IO.importCSV('3,0\n1,2')).toEqual([[3, 0], [1, 2]]);
    });

    it('trims cells and skips blank lines', () => {
        expect(IO.importCSV(' 1 , 2.5 \n\n-3, 4\n')).toEqual([[1, 2.5], [-3, 4]]);
    });

    it('imports TSV correctly', () => {
        expect(IO.importTSV('1\t0\t0\n0\t1\t0\n0\t0\t1')).toEqual([
            [1, 0, 0],
            [0, 1, 0],
            [0, 0, 1],
        ]);
    });

    it('rejects non-numeric cells', () => {
        expect(() => IO.importCSV('1,x\n2,3')).toThrow('Row 0 contains a non-numeric cell: x');
        expect(() => IO.importCSV('1,\n2,3')).toThrow(InvalidMatrixError);
    });

    it('rejects non-square and empty input', () => {
        expect(() => IO.importCSV('1,2,3\n4,5,6')).toThrow('Matrix must be square');
        expect(() => IO.importCSV('1,2\n3')).toThrow('Matrix must be square: row 1 has 1 columns, expected 2');
        expect(() => IO.importCSV('')).toThrow('Matrix must have at least one row');
    });

    it('exports CSV and TSV correctly', () => {
        expect(IO.exportCSV([[1, 2], [3, 4]])).toBe('1,2\n3,4');
        expect(IO.exportTSV([[1, 2], [3, 4]])).toBe('1\t2\n3\t4');
    });

    it('imports JSON correctly', () => {
        expect(IO.importJSON('[[1, 2], [3, 4]]')).toEqual([[1, 2], [3, 4]]);
    });

    it('exports JSON correctly', () => {
        expect(IO.exportJSON([[0.5, 0], [0, 0.25]])).toBe('[[0.5,0],[0,0.25]]');
    });

    it('rejects malformed or non-square JSON', () => {
        expect(() => IO.importJSON('{invalid json')).toThrow(/Failed to parse matrix JSON/);
        expect(() => IO.importJSON('[[1, 2]]')).toThrow(InvalidMatrixError);
        expect(() => IO.importJSON('null')).toThrow('No matrix specified');
    });
});
